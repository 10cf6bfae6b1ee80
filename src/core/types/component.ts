/**
 * The unit of work handed to the reconciler
 */

import type { ManagedResource } from './kubernetes.js';

/**
 * Operating system the component's pods must be scheduled on
 */
export type OSType = 'any' | 'linux' | 'windows';

/**
 * How the configured owner is attached to a desired object.
 *
 * - `Controller`: a single controlling owner reference
 * - `SharedNonController`: a non-controlling reference appended to, and later
 *   merged with, the references other owners already hold
 */
export type OwnershipMode = 'Controller' | 'SharedNonController';

export interface DesiredObject {
  object: ManagedResource;
  ownership: OwnershipMode;
}

export interface ComponentObjects {
  /** Objects to create or update, in dependency order */
  toCreate: DesiredObject[];
  /** Objects to remove */
  toDelete: ManagedResource[];
}

export interface Component {
  /** Used in log context; defaults to the class name */
  readonly name?: string;
  /**
   * Whether the component can be reconciled now. Components that depend on
   * others return false until those are in place.
   */
  ready(): boolean;
  objects(): ComponentObjects;
  supportedOSType(): OSType;
}

/**
 * Wrap a desired object, defaulting to a controlling owner reference
 */
export function desired(object: ManagedResource, ownership: OwnershipMode = 'Controller'): DesiredObject {
  return { object, ownership };
}
