/**
 * Kubernetes Module
 *
 * Client construction, the cluster operations the reconciler uses, error
 * classification and typed views of the managed kinds.
 */

export {
  KubernetesClientProvider,
  createClusterClientFromEnv,
  getClientConfigFromEnv,
} from './client-provider.js';
export type { KubernetesClientConfig } from './client-provider.js';

export { KubernetesObjectClusterClient, withSignal } from './cluster-client.js';
export type { ClusterClient, RequestOptions } from './cluster-client.js';

export {
  formatKubernetesError,
  getErrorStatusCode,
  getStatusBody,
  isAbortError,
  isAlreadyExistsError,
  isConflictError,
  isNotFoundError,
} from './errors.js';
export type { KubernetesApiError, KubernetesStatusBody } from './errors.js';

export * from './type-guards.js';
