export {
  ComponentReconciler,
  IGNORE_ANNOTATION,
  MAX_CONFLICT_ATTEMPTS,
  createComponentReconciler,
} from './engine.js';
export type { ComponentReconcilerOptions, ObjectResult, ReconcileOptions } from './engine.js';
export { WorkloadTracker, reportRemoved } from './status.js';
export type { StatusCollaborator } from './status.js';
