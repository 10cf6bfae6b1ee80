/**
 * Error types raised by the reconciler.
 * Errors returned by the cluster API are not wrapped; see kubernetes/errors.ts
 * for their classification.
 */

import type { ResourceIdentity } from './types/kubernetes.js';

export class ReconcilerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ReconcilerError';
  }
}

/**
 * Returned by a create-only reconciler once every object has been processed,
 * when some of the desired objects already existed.
 */
export class AlreadyExistsError extends ReconcilerError {
  constructor(public readonly identities: ResourceIdentity[]) {
    super(
      `${identities.length} object(s) already exist: ${identities
        .map((id) => `${id.kind}/${id.namespace ? `${id.namespace}/` : ''}${id.name}`)
        .join(', ')}`,
      'ALREADY_EXISTS',
      { identities }
    );
    this.name = 'AlreadyExistsError';
  }
}

export class InvalidResourceError extends ReconcilerError {
  constructor(
    message: string,
    public readonly resourceKind: string,
    public readonly resourceName: string
  ) {
    super(message, 'INVALID_RESOURCE', { resourceKind, resourceName });
    this.name = 'InvalidResourceError';
  }
}

export class OwnerReferenceError extends ReconcilerError {
  constructor(
    message: string,
    public readonly owner: string,
    public readonly resource: string
  ) {
    super(message, 'OWNER_REFERENCE', { owner, resource });
    this.name = 'OwnerReferenceError';
  }
}

export class InstallationConfigError extends ReconcilerError {
  constructor(
    message: string,
    public readonly problems?: string
  ) {
    super(message, 'INSTALLATION_CONFIG', { problems });
    this.name = 'InstallationConfigError';
  }
}

/**
 * True for the create-only "already exists" outcome of a reconcile call
 */
export function isAlreadyExistsOutcome(error: unknown): error is AlreadyExistsError {
  return error instanceof AlreadyExistsError;
}
