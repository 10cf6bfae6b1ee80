import type { V1OwnerReference } from '@kubernetes/client-node';
import { OwnerReferenceError } from '../errors.js';
import { apiGroupOf } from '../identity/identity.js';
import type { ManagedResource, OwnerObject } from '../types/kubernetes.js';
import type { MutationContext } from './context.js';

function referenceTo(owner: OwnerObject, controller: boolean): V1OwnerReference {
  return {
    apiVersion: owner.apiVersion,
    kind: owner.kind,
    name: owner.metadata.name,
    uid: owner.metadata.uid,
    ...(controller && { controller: true, blockOwnerDeletion: true }),
  };
}

function refersTo(ref: V1OwnerReference, owner: OwnerObject): boolean {
  return (
    ref.kind === owner.kind &&
    ref.name === owner.metadata.name &&
    apiGroupOf(ref.apiVersion) === apiGroupOf(owner.apiVersion)
  );
}

function describeOwner(owner: OwnerObject): string {
  return `${owner.kind}/${owner.metadata.name}`;
}

/**
 * Owner references may not point from a cluster-scoped object to a namespaced owner
 */
export function crossesScope(owner: OwnerObject, resource: ManagedResource): boolean {
  return !!owner.metadata.namespace && !resource.metadata.namespace;
}

/**
 * Insert the reference, replacing an existing reference to the same owner
 */
function upsert(refs: V1OwnerReference[], owner: OwnerObject, ref: V1OwnerReference): V1OwnerReference[] {
  const index = refs.findIndex((existing) => refersTo(existing, owner));
  if (index === -1) {
    return [...refs, ref];
  }
  return refs.map((existing, i) => (i === index ? ref : existing));
}

/**
 * Attach the configured owner: as the controller, or as one more
 * non-controlling owner for shared objects.
 */
export function setOwnerReference(resource: ManagedResource, context: MutationContext): void {
  const { owner } = context;
  if (!owner || context.strategy.ownerReferences === 'never' || crossesScope(owner, resource)) {
    return;
  }

  const resourceName = `${resource.kind}/${resource.metadata.name ?? ''}`;
  if (owner.metadata.namespace && owner.metadata.namespace !== resource.metadata.namespace) {
    throw new OwnerReferenceError(
      `Cross-namespace owner references are not allowed: ${describeOwner(owner)} in ${owner.metadata.namespace} cannot own ${resourceName} in ${resource.metadata.namespace}`,
      describeOwner(owner),
      resourceName
    );
  }

  const refs = resource.metadata.ownerReferences ?? [];

  if (context.ownership === 'SharedNonController') {
    resource.metadata.ownerReferences = upsert(refs, owner, referenceTo(owner, false));
    return;
  }

  const otherController = refs.find((ref) => ref.controller && !refersTo(ref, owner));
  if (otherController) {
    throw new OwnerReferenceError(
      `${resourceName} is already controlled by ${otherController.kind}/${otherController.name}`,
      describeOwner(owner),
      resourceName
    );
  }
  resource.metadata.ownerReferences = upsert(refs, owner, referenceTo(owner, true));
}
