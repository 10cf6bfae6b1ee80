import type { KindRegistry } from '../kinds/registry.js';
import type { OwnershipMode } from '../types/component.js';
import type { ManagedResource } from '../types/kubernetes.js';
import { mergeCommonMetadata } from './metadata.js';
import { type MergeOutcome, update } from './outcome.js';

export interface MergeOptions {
  registry: KindRegistry;
  ownership: OwnershipMode;
}

/**
 * Decide how to converge an existing object onto the desired state.
 * Neither argument is modified.
 */
export function evaluateMerge(
  desired: ManagedResource,
  current: ManagedResource,
  options: MergeOptions
): MergeOutcome {
  const merged = mergeCommonMetadata(desired, current, options.ownership);
  const strategy = options.registry.lookup(merged);
  return strategy.merge ? strategy.merge(merged, current) : update(merged);
}
