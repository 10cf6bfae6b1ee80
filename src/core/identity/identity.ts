/**
 * Resource identity and snapshot primitives.
 *
 * Objects of the same logical resource are repeatedly rebuilt by callers and
 * deserialized from the API, so every comparison here is structural.
 */

import { cloneDeep, isEqual } from 'lodash-es';
import { InvalidResourceError } from '../errors.js';
import type { ManagedResource, NamespacedName, ResourceIdentity } from '../types/kubernetes.js';

/**
 * Metadata fields assigned by the API server. They say nothing about what the
 * reconciler wants the object to look like.
 */
const SERVER_ASSIGNED_METADATA = [
  'resourceVersion',
  'uid',
  'creationTimestamp',
  'generation',
  'managedFields',
] as const;

/**
 * The API group of an apiVersion: `apps/v1` → `apps`, `v1` → `` (core group)
 */
export function apiGroupOf(apiVersion: string): string {
  const slash = apiVersion.indexOf('/');
  return slash === -1 ? '' : apiVersion.slice(0, slash);
}

/**
 * Key used to look up per-kind behavior: `apps/Deployment`, `Service`,
 * `projectcalico.org/NetworkPolicy`
 */
export function kindKey(apiVersion: string, kind: string): string {
  const group = apiGroupOf(apiVersion);
  return group ? `${group}/${kind}` : kind;
}

export function identityOf(resource: ManagedResource): ResourceIdentity {
  const name = resource.metadata?.name;
  if (!resource.kind || !resource.apiVersion || !name) {
    throw new InvalidResourceError(
      `Resource is missing ${!resource.kind ? 'kind' : !resource.apiVersion ? 'apiVersion' : 'metadata.name'}`,
      resource.kind ?? 'Unknown',
      name ?? 'unknown'
    );
  }

  return {
    apiVersion: resource.apiVersion,
    kind: resource.kind,
    namespace: resource.metadata.namespace ?? '',
    name,
  };
}

/**
 * Cache key of an identity. The version inside an API group is left out so that
 * a kind served under two versions maps to one entry.
 */
export function identityKey(identity: ResourceIdentity): string {
  return `${kindKey(identity.apiVersion, identity.kind)}/${identity.namespace}/${identity.name}`;
}

export function namespacedNameOf(identity: ResourceIdentity): NamespacedName {
  return { namespace: identity.namespace, name: identity.name };
}

/**
 * Human readable form for log lines and error messages
 */
export function describeIdentity(identity: ResourceIdentity): string {
  return identity.namespace
    ? `${identity.kind} ${identity.namespace}/${identity.name}`
    : `${identity.kind} ${identity.name}`;
}

export function deepCopy<T>(value: T): T {
  return cloneDeep(value);
}

/**
 * Plain JSON form of a resource without the server-assigned metadata.
 * Dates become strings and undefined fields disappear, the same as on the wire.
 */
export function toComparable(resource: ManagedResource): Record<string, unknown> {
  const plain: Record<string, unknown> = JSON.parse(JSON.stringify(resource));
  const metadata = plain.metadata;
  if (typeof metadata === 'object' && metadata !== null) {
    const stripped: Record<string, unknown> = { ...metadata };
    for (const field of SERVER_ASSIGNED_METADATA) {
      delete stripped[field];
    }
    plain.metadata = stripped;
  }
  return plain;
}

/**
 * Structural equality of two resources, ignoring server-assigned metadata
 */
export function isSameObject(a: ManagedResource, b: ManagedResource): boolean {
  return isEqual(toComparable(a), toComparable(b));
}

/**
 * Structural equality of two arbitrary values (kind-specific payloads)
 */
export function isSameValue(a: unknown, b: unknown): boolean {
  return isEqual(normalize(a), normalize(b));
}

function normalize(value: unknown): unknown {
  return value === undefined ? undefined : JSON.parse(JSON.stringify(value));
}
