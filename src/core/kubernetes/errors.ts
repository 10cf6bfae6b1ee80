/**
 * Kubernetes Error Handling Utilities
 *
 * Classifies errors returned by the cluster API so the reconciler can branch on
 * not-found and conflict without caring which client produced them.
 */

import { getComponentLogger } from '../logging/index.js';

const logger = getComponentLogger('kubernetes-errors');

/**
 * The error shapes seen from Kubernetes clients:
 * - `ApiException` of @kubernetes/client-node 1.x: `code`, `body` (object or JSON string)
 * - request-based 0.x clients: `statusCode`, `body`
 * - fetch wrappers: `response.statusCode`
 */
export interface KubernetesApiError {
  code?: number;
  statusCode?: number;
  response?: {
    statusCode?: number;
  };
  body?: unknown;
  message?: string;
  name?: string;
}

/**
 * A decoded `Status` body returned by the API server
 */
export interface KubernetesStatusBody {
  code?: number;
  message?: string;
  reason?: string;
  details?: unknown;
}

function asApiError(error: unknown): KubernetesApiError | undefined {
  return typeof error === 'object' && error !== null ? error : undefined;
}

/**
 * Decode the `Status` body of an API error, if there is one
 */
export function getStatusBody(error: unknown): KubernetesStatusBody | undefined {
  let body = asApiError(error)?.body;
  if (typeof body === 'string') {
    try {
      body = JSON.parse(body);
    } catch {
      return undefined;
    }
  }
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }

  const status: KubernetesStatusBody = {};
  if ('code' in body && typeof body.code === 'number') status.code = body.code;
  if ('message' in body && typeof body.message === 'string') status.message = body.message;
  if ('reason' in body && typeof body.reason === 'string') status.reason = body.reason;
  if ('details' in body) status.details = body.details;
  return status;
}

/**
 * Extract the HTTP status code from a Kubernetes API error.
 *
 * @example
 * ```typescript
 * try {
 *   await client.get(identity);
 * } catch (error) {
 *   if (getErrorStatusCode(error) === 404) {
 *     // create it
 *   }
 * }
 * ```
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  const err = asApiError(error);
  if (!err) {
    return undefined;
  }

  if (typeof err.code === 'number') {
    return err.code;
  }

  if (typeof err.statusCode === 'number') {
    return err.statusCode;
  }

  if (typeof err.response?.statusCode === 'number') {
    return err.response.statusCode;
  }

  const bodyCode = getStatusBody(error)?.code;
  if (bodyCode !== undefined) {
    return bodyCode;
  }

  logger.trace('Could not extract status code from error', {
    errorKeys: Object.keys(err),
  });

  return undefined;
}

/**
 * Check if an error is a "Not Found" (404) error.
 */
export function isNotFoundError(error: unknown): boolean {
  return getErrorStatusCode(error) === 404;
}

/**
 * Check if an error is a "Conflict" (409) error.
 *
 * The API server answers 409 both for a stale resourceVersion on update and for
 * a create of an object that already exists; see isAlreadyExistsError.
 */
export function isConflictError(error: unknown): boolean {
  return getErrorStatusCode(error) === 409 && !isAlreadyExistsError(error);
}

/**
 * Check if an error is the 409 returned when creating an object that already exists
 */
export function isAlreadyExistsError(error: unknown): boolean {
  return getErrorStatusCode(error) === 409 && getStatusBody(error)?.reason === 'AlreadyExists';
}

/**
 * Check if an error came from an aborted request or an aborted signal
 */
export function isAbortError(error: unknown): boolean {
  return asApiError(error)?.name === 'AbortError';
}

/**
 * Format a Kubernetes API error into a human-readable message.
 *
 * @example
 * ```typescript
 * formatKubernetesError(error);
 * // "Kubernetes API error (404): NotFound: deployments.apps \"web\" not found"
 * ```
 */
export function formatKubernetesError(error: unknown): string {
  const err = asApiError(error);
  if (!err) {
    return String(error);
  }

  const statusCode = getErrorStatusCode(error);
  const status = getStatusBody(error);
  const parts: string[] = [
    statusCode !== undefined ? `Kubernetes API error (${statusCode})` : 'Kubernetes API error',
  ];

  if (status?.reason) {
    parts.push(status.reason);
  }

  if (status?.message) {
    parts.push(status.message);
  } else if (err.message) {
    parts.push(err.message);
  }

  return parts.join(': ');
}
