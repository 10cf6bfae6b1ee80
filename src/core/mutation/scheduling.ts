import type { ManagedResource } from '../types/kubernetes.js';
import type { MutationContext } from './context.js';

export const OS_NODE_SELECTOR_LABEL = 'kubernetes.io/os';

/**
 * Pin the pods of the object to nodes running the component's operating system
 */
export function ensureOSScheduling(resource: ManagedResource, context: MutationContext): void {
  if (context.osType === 'any') {
    return;
  }

  const { strategy } = context;
  const holders = strategy.nodeSelectorHolders?.(resource) ?? strategy.podSpecs?.(resource) ?? [];
  for (const holder of holders) {
    holder.nodeSelector = { ...holder.nodeSelector, [OS_NODE_SELECTOR_LABEL]: context.osType };
  }
}
