/**
 * Mutation Pipeline
 *
 * Normalizes every desired object before it is written. The order is fixed,
 * and every step is idempotent, so that the same desired object always
 * produces the same output and the deduplication cache can recognize it.
 */

import { deepCopy } from '../identity/identity.js';
import type { ManagedResource } from '../types/kubernetes.js';
import type { MutationContext, MutationStep } from './context.js';
import { setStandardSelectorAndLabels } from './labels.js';
import { setOwnerReference } from './owner-reference.js';
import { orderVolumes, setImagePullPolicy } from './pod-spec.js';
import { setProbeDefaults } from './probes.js';
import { ensureOSScheduling } from './scheduling.js';
import { ensureTLSCiphers } from './tls-ciphers.js';

export const MUTATION_STEPS: readonly MutationStep[] = [
  setOwnerReference,
  ensureOSScheduling,
  setImagePullPolicy,
  orderVolumes,
  setProbeDefaults,
  setStandardSelectorAndLabels,
  ensureTLSCiphers,
];

/**
 * Returns the mutated copy of a desired object; the argument is left untouched
 */
export function mutateDesired(resource: ManagedResource, context: MutationContext): ManagedResource {
  const working = deepCopy(resource);
  for (const step of MUTATION_STEPS) {
    step(working, context);
  }
  return working;
}
