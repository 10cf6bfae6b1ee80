import type { ManagedResource } from '../types/kubernetes.js';

/**
 * What the reconciler has to do with an object that already exists
 */
export type MergeOutcome =
  | { type: 'noChange' }
  | { type: 'update'; object: ManagedResource }
  | { type: 'recreate'; object: ManagedResource };

export function noChange(): MergeOutcome {
  return { type: 'noChange' };
}

export function update(object: ManagedResource): MergeOutcome {
  return { type: 'update', object };
}

/**
 * Delete the live object and create `object` in its place, for changes to
 * fields the API server refuses to update
 */
export function recreate(object: ManagedResource): MergeOutcome {
  return { type: 'recreate', object };
}
