/**
 * Kind Strategy Registry
 *
 * Maps kind keys (`apps/Deployment`, `Service`, `projectcalico.org/Tier`) to the
 * strategy used when mutating and merging objects of that kind. Kinds without a
 * registration get the default behavior: no kind-specific mutation, and an
 * update with the merged object.
 */

import { kindKey } from '../identity/identity.js';
import type { ManagedResource } from '../types/kubernetes.js';
import type { KindStrategy } from './types.js';

const DEFAULT_STRATEGY: KindStrategy = Object.freeze({});

export class KindRegistry {
  private strategies = new Map<string, KindStrategy>();

  /**
   * Register (or replace) the strategy of a kind
   */
  register(apiVersion: string, kind: string, strategy: KindStrategy): this {
    this.strategies.set(kindKey(apiVersion, kind), strategy);
    return this;
  }

  /**
   * The strategy for a resource's kind, or the default strategy
   */
  lookup(resource: Pick<ManagedResource, 'apiVersion' | 'kind'>): KindStrategy {
    return this.strategies.get(kindKey(resource.apiVersion, resource.kind)) ?? DEFAULT_STRATEGY;
  }

  has(apiVersion: string, kind: string): boolean {
    return this.strategies.has(kindKey(apiVersion, kind));
  }

  kinds(): string[] {
    return Array.from(this.strategies.keys()).sort();
  }
}
