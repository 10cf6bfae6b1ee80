/**
 * Kubernetes Client Provider
 *
 * Loads a KubeConfig and builds the KubernetesObjectApi the reconciler talks
 * to. The configuration comes from explicit options or from the environment.
 */

import * as k8s from '@kubernetes/client-node';
import { type } from 'arktype';
import { ReconcilerError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { type ClusterClient, KubernetesObjectClusterClient } from './cluster-client.js';

/**
 * Configuration options for the Kubernetes client provider
 */
export interface KubernetesClientConfig {
  /**
   * Custom kubeconfig file path. The default loading rules apply when unset.
   */
  kubeconfigPath?: string;

  /**
   * Context to switch to after loading
   */
  context?: string;

  /**
   * SECURITY WARNING: only for non-production clusters. Disables TLS
   * certificate verification for the current cluster.
   *
   * @default false
   */
  skipTLSVerify?: boolean;
}

const clientEnvSchema = type({
  'KUBECONFIG?': 'string',
  'RECONCILER_KUBE_CONTEXT?': 'string',
  'RECONCILER_SKIP_TLS_VERIFY?': "'true' | 'false'",
});

/**
 * Read client configuration from KUBECONFIG, RECONCILER_KUBE_CONTEXT and
 * RECONCILER_SKIP_TLS_VERIFY
 *
 * @throws ReconcilerError when a variable holds an unsupported value
 */
export function getClientConfigFromEnv(env: NodeJS.ProcessEnv = process.env): KubernetesClientConfig {
  const result = clientEnvSchema({
    ...(env.KUBECONFIG ? { KUBECONFIG: env.KUBECONFIG } : {}),
    ...(env.RECONCILER_KUBE_CONTEXT ? { RECONCILER_KUBE_CONTEXT: env.RECONCILER_KUBE_CONTEXT } : {}),
    ...(env.RECONCILER_SKIP_TLS_VERIFY
      ? { RECONCILER_SKIP_TLS_VERIFY: env.RECONCILER_SKIP_TLS_VERIFY }
      : {}),
  });

  if (result instanceof type.errors) {
    throw new ReconcilerError(`Invalid client environment: ${result.summary}`, 'CLIENT_CONFIG', {
      problems: result.summary,
    });
  }

  const config: KubernetesClientConfig = {};
  if (result.KUBECONFIG) {
    config.kubeconfigPath = result.KUBECONFIG;
  }
  if (result.RECONCILER_KUBE_CONTEXT) {
    config.context = result.RECONCILER_KUBE_CONTEXT;
  }
  if (result.RECONCILER_SKIP_TLS_VERIFY) {
    config.skipTLSVerify = result.RECONCILER_SKIP_TLS_VERIFY === 'true';
  }
  return config;
}

export class KubernetesClientProvider {
  private readonly logger = getComponentLogger('kubernetes-client-provider');
  private kubeConfig: k8s.KubeConfig | null = null;
  private api: k8s.KubernetesObjectApi | null = null;

  constructor(private readonly config: KubernetesClientConfig = {}) {}

  /**
   * Build the provider around an already loaded KubeConfig
   */
  static fromKubeConfig(kubeConfig: k8s.KubeConfig): KubernetesClientProvider {
    const provider = new KubernetesClientProvider();
    provider.kubeConfig = kubeConfig;
    return provider;
  }

  getKubeConfig(): k8s.KubeConfig {
    if (!this.kubeConfig) {
      this.kubeConfig = this.loadKubeConfig();
    }
    return this.kubeConfig;
  }

  getKubernetesApi(): k8s.KubernetesObjectApi {
    if (!this.api) {
      this.api = this.getKubeConfig().makeApiClient(k8s.KubernetesObjectApi);
    }
    return this.api;
  }

  createClusterClient(): ClusterClient {
    return new KubernetesObjectClusterClient(this.getKubernetesApi());
  }

  private loadKubeConfig(): k8s.KubeConfig {
    const kc = new k8s.KubeConfig();

    if (this.config.kubeconfigPath) {
      kc.loadFromFile(this.config.kubeconfigPath);
    } else {
      kc.loadFromDefault();
    }

    if (this.config.context) {
      if (!kc.getContexts().some((c) => c.name === this.config.context)) {
        throw new ReconcilerError(
          `Context '${this.config.context}' not found in kubeconfig`,
          'CLIENT_CONFIG',
          { availableContexts: kc.getContexts().map((c) => c.name) }
        );
      }
      kc.setCurrentContext(this.config.context);
    }

    const cluster = kc.getCurrentCluster();
    if (this.config.skipTLSVerify !== undefined && cluster) {
      const modified = { ...cluster, skipTLSVerify: this.config.skipTLSVerify };
      kc.clusters = kc.clusters.map((c) => (c === cluster ? modified : c));
    }

    if (kc.getCurrentCluster()?.skipTLSVerify) {
      // Keep TLS warnings at warn level - these are important security notices
      this.logger.warn('TLS verification disabled - this is insecure', {
        server: kc.getCurrentCluster()?.server,
      });
    }

    this.logger.debug('Loaded kubeconfig', {
      currentContext: kc.getCurrentContext(),
      server: kc.getCurrentCluster()?.server,
    });
    return kc;
  }
}

/**
 * Create a cluster client from the environment's kubeconfig settings
 */
export function createClusterClientFromEnv(env: NodeJS.ProcessEnv = process.env): ClusterClient {
  return new KubernetesClientProvider(getClientConfigFromEnv(env)).createClusterClient();
}
