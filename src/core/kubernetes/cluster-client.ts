/**
 * The cluster operations the reconciler needs, and their implementation over
 * the KubernetesObjectApi of @kubernetes/client-node.
 */

import type * as k8s from '@kubernetes/client-node';
import { InvalidResourceError } from '../errors.js';
import type { ManagedResource, ResourceIdentity } from '../types/kubernetes.js';
import { isManagedResource } from './type-guards.js';

export interface RequestOptions {
  /** Aborts the request; the returned promise rejects with the abort reason */
  signal?: AbortSignal;
}

/**
 * Errors are the client's own: 404 for missing objects, 409 for stale
 * resourceVersions. See errors.ts for their classification.
 */
export interface ClusterClient {
  get(identity: ResourceIdentity, options?: RequestOptions): Promise<ManagedResource>;
  create(resource: ManagedResource, options?: RequestOptions): Promise<ManagedResource>;
  update(resource: ManagedResource, options?: RequestOptions): Promise<ManagedResource>;
  delete(identity: ResourceIdentity, options?: RequestOptions): Promise<void>;
}

/**
 * Settle with the request, or reject as soon as the signal aborts
 */
export async function withSignal<T>(request: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return request();
  }
  signal.throwIfAborted();

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void request()
      .then(resolve, reject)
      .finally(() => signal.removeEventListener('abort', onAbort));
  });
}

function headerOf(identity: ResourceIdentity) {
  return {
    apiVersion: identity.apiVersion,
    kind: identity.kind,
    metadata: {
      name: identity.name,
      ...(identity.namespace ? { namespace: identity.namespace } : {}),
    },
  };
}

function asManaged(body: k8s.KubernetesObject, operation: string): ManagedResource {
  if (!isManagedResource(body)) {
    throw new InvalidResourceError(
      `Unexpected ${operation} response from the API server`,
      body.kind ?? 'Unknown',
      body.metadata?.name ?? 'unknown'
    );
  }
  return body;
}

export class KubernetesObjectClusterClient implements ClusterClient {
  constructor(private readonly api: k8s.KubernetesObjectApi) {}

  async get(identity: ResourceIdentity, options: RequestOptions = {}): Promise<ManagedResource> {
    const body = await withSignal(() => this.api.read(headerOf(identity)), options.signal);
    return asManaged(body, 'read');
  }

  async create(resource: ManagedResource, options: RequestOptions = {}): Promise<ManagedResource> {
    const body = await withSignal(() => this.api.create(resource), options.signal);
    return asManaged(body, 'create');
  }

  async update(resource: ManagedResource, options: RequestOptions = {}): Promise<ManagedResource> {
    const body = await withSignal(() => this.api.replace(resource), options.signal);
    return asManaged(body, 'replace');
  }

  async delete(identity: ResourceIdentity, options: RequestOptions = {}): Promise<void> {
    await withSignal(() => this.api.delete(headerOf(identity)), options.signal);
  }
}
