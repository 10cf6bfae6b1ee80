/**
 * Component Reconciler
 *
 * Converges the cluster onto the objects a component renders: each desired
 * object is mutated, compared with the live object through the kind's merge
 * strategy and written only when the deduplication cache says the write is
 * not redundant. Obsolete objects are deleted afterwards.
 */

import type { DeduplicationCache } from '../cache/dedup-cache.js';
import type { InstallationConfigLookup } from '../config/installation.js';
import { AlreadyExistsError } from '../errors.js';
import { deepCopy, describeIdentity, identityOf, namespacedNameOf } from '../identity/identity.js';
import { createDefaultKindRegistry } from '../kinds/index.js';
import type { KindRegistry } from '../kinds/registry.js';
import type { ClusterClient } from '../kubernetes/cluster-client.js';
import {
  formatKubernetesError,
  isAlreadyExistsError,
  isConflictError,
  isNotFoundError,
} from '../kubernetes/errors.js';
import { getComponentLogger } from '../logging/index.js';
import type { ReconcilerLogger } from '../logging/types.js';
import { evaluateMerge } from '../merge/policy.js';
import { mutateDesired } from '../mutation/pipeline.js';
import type { Component, DesiredObject, OSType } from '../types/component.js';
import type { ManagedResource, OwnerObject, ResourceIdentity } from '../types/kubernetes.js';
import { type StatusCollaborator, WorkloadTracker, reportRemoved } from './status.js';

/**
 * Attempts per object when the API server reports a write conflict
 */
export const MAX_CONFLICT_ATTEMPTS = 2;

/**
 * Existing objects carrying this annotation with the value "true" are left as
 * they are
 */
export const IGNORE_ANNOTATION = 'unsupported.reconciler.dev/ignore';

export interface ComponentReconcilerOptions {
  client: ClusterClient;
  /** Shared by every reconciler of the process */
  cache: DeduplicationCache;
  /** Owner attached to every object; none when unset */
  owner?: OwnerObject;
  registry?: KindRegistry;
  /** Source of the TLS cipher suites injected into standard workloads */
  installation?: InstallationConfigLookup;
  logger?: ReconcilerLogger;
  createOnly?: boolean;
}

export interface ReconcileOptions {
  signal?: AbortSignal;
}

/**
 * What happened to one desired object
 */
export type ObjectResult = 'created' | 'updated' | 'recreated' | 'unchanged' | 'skipped' | 'exists';

interface ObjectContext {
  osType: OSType;
  tlsCipherSuites?: string;
  signal?: AbortSignal;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Clear the fields the API server rejects on create
 */
function forCreate(resource: ManagedResource): ManagedResource {
  const fresh = deepCopy(resource);
  delete fresh.metadata.resourceVersion;
  delete fresh.metadata.uid;
  delete fresh.metadata.creationTimestamp;
  return fresh;
}

export class ComponentReconciler {
  private readonly client: ClusterClient;
  private readonly cache: DeduplicationCache;
  private readonly owner: OwnerObject | undefined;
  private readonly registry: KindRegistry;
  private readonly installation: InstallationConfigLookup | undefined;
  private readonly logger: ReconcilerLogger;
  private createOnly: boolean;

  constructor(options: ComponentReconcilerOptions) {
    this.client = options.client;
    this.cache = options.cache;
    this.owner = options.owner;
    this.registry = options.registry ?? createDefaultKindRegistry();
    this.installation = options.installation;
    this.logger = options.logger ?? getComponentLogger('component-reconciler');
    this.createOnly = options.createOnly ?? false;
  }

  /**
   * From now on only create missing objects; existing ones are reported
   * through an AlreadyExistsError and never updated
   */
  setCreateOnly(): void {
    this.createOnly = true;
  }

  isCreateOnly(): boolean {
    return this.createOnly;
  }

  /**
   * Create or update every object the component renders and delete the
   * obsolete ones.
   *
   * Processing stops at the first failure. In create-only mode, objects that
   * already exist are collected and reported together once everything else
   * has been processed.
   *
   * @throws AlreadyExistsError in create-only mode when some objects existed
   */
  async createOrUpdateOrDelete(
    component: Component,
    status?: StatusCollaborator,
    options: ReconcileOptions = {}
  ): Promise<void> {
    const { signal } = options;
    const log = this.logger.child({ reconciling: component.name ?? component.constructor.name });

    if (!component.ready()) {
      log.info('Component is not ready, skipping');
      return;
    }

    const { toCreate, toDelete } = component.objects();
    const context: ObjectContext = {
      osType: component.supportedOSType(),
      signal,
    };
    const tlsCipherSuites = await this.resolveTLSCipherSuites(toCreate, signal);
    if (tlsCipherSuites) {
      context.tlsCipherSuites = tlsCipherSuites;
    }

    const tracker = new WorkloadTracker();
    const existing: ResourceIdentity[] = [];

    for (const desiredObject of toCreate) {
      signal?.throwIfAborted();
      const identity = identityOf(desiredObject.object);
      const result = await this.reconcileWithRetry(desiredObject, context, log);
      if (result === 'exists') {
        existing.push(identity);
      }
      tracker.track(this.registry.lookup(desiredObject.object).workload, namespacedNameOf(identity));
    }

    if (status) {
      tracker.reportAdded(status);
    }

    for (const obsolete of toDelete) {
      signal?.throwIfAborted();
      const identity = identityOf(obsolete);
      try {
        await this.deleteObject(identity, log, signal);
      } catch (error) {
        log.error('Failed to delete object', toError(error), {
          object: describeIdentity(identity),
          reason: formatKubernetesError(error),
        });
        throw error;
      }
      if (status) {
        reportRemoved(status, this.registry.lookup(obsolete).workload, namespacedNameOf(identity));
      }
    }

    status?.readyToMonitor();

    if (existing.length > 0) {
      throw new AlreadyExistsError(existing);
    }
  }

  private async resolveTLSCipherSuites(
    toCreate: DesiredObject[],
    signal?: AbortSignal
  ): Promise<string | undefined> {
    if (!this.installation) {
      return undefined;
    }
    const needed = toCreate.some((d) => this.registry.lookup(d.object).standardWorkload);
    return needed ? this.installation.tlsCipherSuites(signal ? { signal } : {}) : undefined;
  }

  private async reconcileWithRetry(
    desiredObject: DesiredObject,
    context: ObjectContext,
    log: ReconcilerLogger
  ): Promise<ObjectResult> {
    let attempt = 0;
    while (true) {
      attempt++;
      try {
        return await this.reconcileObject(desiredObject, context, log);
      } catch (error) {
        const identity = describeIdentity(identityOf(desiredObject.object));
        if (isAlreadyExistsError(error)) {
          log.info('Object was created concurrently', { object: identity });
          return 'exists';
        }
        if (isConflictError(error) && attempt < MAX_CONFLICT_ATTEMPTS) {
          log.info('Conflict writing object, retrying', { object: identity, attempt });
          continue;
        }
        log.error('Failed to create or update object', toError(error), {
          object: identity,
          reason: formatKubernetesError(error),
        });
        throw error;
      }
    }
  }

  private async reconcileObject(
    desiredObject: DesiredObject,
    context: ObjectContext,
    parentLog: ReconcilerLogger
  ): Promise<ObjectResult> {
    const strategy = this.registry.lookup(desiredObject.object);
    const obj = mutateDesired(desiredObject.object, {
      ...(this.owner ? { owner: this.owner } : {}),
      ownership: desiredObject.ownership,
      osType: context.osType,
      ...(context.tlsCipherSuites ? { tlsCipherSuites: context.tlsCipherSuites } : {}),
      strategy,
    });
    const identity = identityOf(obj);
    const log = parentLog.child({
      kind: identity.kind,
      namespace: identity.namespace,
      name: identity.name,
    });
    const { signal } = context;

    let current: ManagedResource;
    try {
      current = await this.client.get(identity, signal ? { signal } : {});
    } catch (error) {
      this.cache.delete(identity);
      if (!isNotFoundError(error)) {
        throw error;
      }
      return this.createMissing(obj, identity, log, signal);
    }

    if (this.createOnly) {
      log.debug('Object exists and the reconciler is create-only');
      return 'exists';
    }

    if (current.metadata.annotations?.[IGNORE_ANNOTATION] === 'true') {
      log.info('Ignoring annotated object');
      return 'skipped';
    }

    const outcome = evaluateMerge(obj, current, {
      registry: this.registry,
      ownership: desiredObject.ownership,
    });

    switch (outcome.type) {
      case 'noChange':
        log.debug('Object is up to date');
        return 'unchanged';
      case 'recreate':
        await this.recreate(outcome.object, identity, log, signal);
        return 'recreated';
      case 'update':
        return this.update(outcome.object, identity, log, signal);
    }
  }

  private async createMissing(
    obj: ManagedResource,
    identity: ResourceIdentity,
    log: ReconcilerLogger,
    signal?: AbortSignal
  ): Promise<ObjectResult> {
    if (identity.namespace && (await this.isNamespaceTerminating(identity.namespace, signal))) {
      log.info('Namespace is terminating, skipping create');
      return 'skipped';
    }
    await this.create(obj, identity, log, signal);
    return 'created';
  }

  private async isNamespaceTerminating(namespace: string, signal?: AbortSignal): Promise<boolean> {
    try {
      const ns = await this.client.get(
        { apiVersion: 'v1', kind: 'Namespace', namespace: '', name: namespace },
        signal ? { signal } : {}
      );
      return Boolean(ns.metadata.deletionTimestamp);
    } catch (error) {
      // Creating into a missing namespace surfaces its own error
      if (isNotFoundError(error)) {
        return false;
      }
      throw error;
    }
  }

  private async create(
    obj: ManagedResource,
    identity: ResourceIdentity,
    log: ReconcilerLogger,
    signal?: AbortSignal
  ): Promise<void> {
    const snapshot = deepCopy(obj);
    log.debug('Creating object');
    try {
      const created = await this.client.create(obj, signal ? { signal } : {});
      this.cache.set(snapshot, created.metadata.generation ?? 0);
    } catch (error) {
      this.cache.delete(identity);
      throw error;
    }
  }

  private async update(
    obj: ManagedResource,
    identity: ResourceIdentity,
    log: ReconcilerLogger,
    signal?: AbortSignal
  ): Promise<ObjectResult> {
    if (!this.cache.needsUpdate(obj)) {
      log.debug('Object does not need to be updated, skipping');
      return 'unchanged';
    }

    const snapshot = deepCopy(obj);
    log.debug('Updating object');
    try {
      const updated = await this.client.update(obj, signal ? { signal } : {});
      this.cache.set(snapshot, updated.metadata.generation ?? obj.metadata.generation ?? 0);
    } catch (error) {
      this.cache.delete(identity);
      throw error;
    }
    return 'updated';
  }

  /**
   * Delete then create. Between the two calls the object does not exist; a
   * failed create leaves it deleted until the next reconcile.
   */
  private async recreate(
    obj: ManagedResource,
    identity: ResourceIdentity,
    log: ReconcilerLogger,
    signal?: AbortSignal
  ): Promise<void> {
    log.info('Recreating object');
    await this.deleteObject(identity, log, signal);
    await this.create(forCreate(obj), identity, log, signal);
  }

  private async deleteObject(
    identity: ResourceIdentity,
    log: ReconcilerLogger,
    signal?: AbortSignal
  ): Promise<void> {
    const options = signal ? { signal } : {};
    try {
      await this.client.get(identity, options);
    } catch (error) {
      if (isNotFoundError(error)) {
        this.cache.delete(identity);
        log.debug('Object already absent', { object: describeIdentity(identity) });
        return;
      }
      throw error;
    }

    try {
      await this.client.delete(identity, options);
    } catch (error) {
      this.cache.delete(identity);
      if (isNotFoundError(error)) {
        return;
      }
      throw error;
    }
    this.cache.delete(identity);
    log.info('Deleted object', { object: describeIdentity(identity) });
  }
}

export function createComponentReconciler(options: ComponentReconcilerOptions): ComponentReconciler {
  return new ComponentReconciler(options);
}
