/**
 * component-reconciler - converge a Kubernetes cluster onto the objects a
 * component renders.
 */

// =============================================================================
// RECONCILIATION
// =============================================================================
export {
  ComponentReconciler,
  IGNORE_ANNOTATION,
  MAX_CONFLICT_ATTEMPTS,
  WorkloadTracker,
  createComponentReconciler,
  reportRemoved,
  type ComponentReconcilerOptions,
  type ObjectResult,
  type ReconcileOptions,
  type StatusCollaborator,
} from './core/reconcile/index.js';
export { DeduplicationCache, type CacheEntry } from './core/cache/index.js';
export { ReadyFlag } from './core/readiness/index.js';

// =============================================================================
// MERGE POLICY AND MUTATION
// =============================================================================
export * from './core/kinds/index.js';
export * from './core/merge/index.js';
export * from './core/mutation/index.js';

// =============================================================================
// CLUSTER ACCESS AND CONFIGURATION
// =============================================================================
export * from './core/kubernetes/index.js';
export * from './core/config/index.js';

// =============================================================================
// SHARED TYPES, IDENTITY, ERRORS AND LOGGING
// =============================================================================
export * from './core/types/index.js';
export * from './core/identity/index.js';
export {
  AlreadyExistsError,
  InstallationConfigError,
  InvalidResourceError,
  OwnerReferenceError,
  ReconcilerError,
  isAlreadyExistsOutcome,
} from './core/errors.js';
export * from './core/logging/index.js';
