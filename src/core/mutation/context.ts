import type { KindStrategy } from '../kinds/types.js';
import type { OSType, OwnershipMode } from '../types/component.js';
import type { ManagedResource, OwnerObject } from '../types/kubernetes.js';

export interface MutationContext {
  /** Owner attached to every object, if any */
  owner?: OwnerObject;
  ownership: OwnershipMode;
  osType: OSType;
  /** Comma separated cipher suites from the installation, if configured */
  tlsCipherSuites?: string;
  /** Strategy registered for the object's kind */
  strategy: KindStrategy;
}

/**
 * One step of the mutation pipeline. Steps modify the working copy they are
 * given and must be idempotent.
 */
export type MutationStep = (resource: ManagedResource, context: MutationContext) => void;
