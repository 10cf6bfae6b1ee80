/**
 * Deduplication cache
 *
 * Remembers the last object the reconciler wrote for each resource, and the
 * generation the server reported for it, so that unchanged objects are not
 * written again on every reconcile.
 *
 * One instance is created at process start and handed to every reconciler:
 * redundant writes recur across reconciles of unrelated custom resources, so
 * the cache outlives any single reconciler. Every operation is synchronous,
 * which makes each of them atomic for all reconcile loops sharing the event loop.
 */

import { deepCopy, identityKey, identityOf, isSameObject } from '../identity/identity.js';
import { getComponentLogger } from '../logging/index.js';
import type { ManagedResource, ResourceIdentity } from '../types/kubernetes.js';

export interface CacheEntry {
  snapshot: ManagedResource;
  generation: number;
}

export class DeduplicationCache {
  private entries = new Map<string, CacheEntry>();
  private logger = getComponentLogger('dedup-cache');

  get size(): number {
    return this.entries.size;
  }

  /**
   * The cached entry for a resource. The snapshot is a copy.
   */
  get(identity: ResourceIdentity): CacheEntry | undefined {
    const entry = this.entries.get(identityKey(identity));
    return entry && { snapshot: deepCopy(entry.snapshot), generation: entry.generation };
  }

  /**
   * Store a copy of `resource` as the last written state, replacing any previous entry
   */
  set(resource: ManagedResource, generation: number): void {
    this.entries.set(identityKey(identityOf(resource)), {
      snapshot: deepCopy(resource),
      generation,
    });
  }

  /**
   * Forget a resource. Deleting an absent entry is a no-op.
   */
  delete(identity: ResourceIdentity): void {
    this.entries.delete(identityKey(identity));
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Whether `resource` (the merged object about to be written, whose generation
   * is the live generation) has to be sent to the cluster.
   */
  needsUpdate(resource: ManagedResource): boolean {
    const identity = identityOf(resource);
    const entry = this.entries.get(identityKey(identity));
    const logger = this.logger.child({
      kind: identity.kind,
      namespace: identity.namespace,
      name: identity.name,
    });

    if (!entry) {
      logger.trace('Object is not in the cache');
      return true;
    }

    if (entry.generation < (resource.metadata.generation ?? 0)) {
      logger.debug('Object on cluster has been modified since the last write', {
        cachedGeneration: entry.generation,
        liveGeneration: resource.metadata.generation,
      });
      return true;
    }

    if (isSameObject(entry.snapshot, resource)) {
      return false;
    }

    logger.debug('Desired object has changed since the last write');
    return true;
  }
}
