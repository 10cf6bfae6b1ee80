/**
 * The merge applied to every kind before its own policy: bring over what the
 * server owns, and keep labels, annotations and owner references that other
 * actors added to the live object.
 */

import type { V1OwnerReference, V1PodTemplateSpec } from '@kubernetes/client-node';
import { isEmpty, uniqWith } from 'lodash-es';
import { deepCopy } from '../identity/identity.js';
import type { OwnershipMode } from '../types/component.js';
import type { ManagedResource } from '../types/kubernetes.js';

type StringMap = Record<string, string>;

/**
 * Union of two string maps, `desired` winning on conflicting keys.
 * Returns undefined when the union is empty.
 */
export function mergeMaps(current?: StringMap, desired?: StringMap): StringMap | undefined {
  const merged = { ...current, ...desired };
  return isEmpty(merged) ? undefined : merged;
}

function sameOwner(a: V1OwnerReference, b: V1OwnerReference): boolean {
  return a.uid === b.uid;
}

/**
 * Desired references followed by the current ones not already present
 */
export function mergeOwnerReferences(
  desired: V1OwnerReference[] = [],
  current: V1OwnerReference[] = []
): V1OwnerReference[] {
  return uniqWith([...desired, ...current], sameOwner);
}

/**
 * Merge the labels and annotations of a live pod template into the desired one
 */
export function mergeTemplateMetadata(
  desired: V1PodTemplateSpec,
  current: V1PodTemplateSpec | undefined
): void {
  const labels = mergeMaps(current?.metadata?.labels, desired.metadata?.labels);
  const annotations = mergeMaps(current?.metadata?.annotations, desired.metadata?.annotations);
  desired.metadata = {
    ...desired.metadata,
    ...(labels && { labels }),
    ...(annotations && { annotations }),
  };
}

/**
 * Returns a copy of `desired` carrying the server-owned metadata of `current`
 * and the union of both objects' labels, annotations and, for shared
 * ownership, owner references.
 */
export function mergeCommonMetadata(
  desired: ManagedResource,
  current: ManagedResource,
  ownership: OwnershipMode
): ManagedResource {
  const merged = deepCopy(desired);
  const meta = merged.metadata;
  const currentMeta = current.metadata;

  if (!meta.resourceVersion && currentMeta.resourceVersion) {
    meta.resourceVersion = currentMeta.resourceVersion;
  }
  if (!meta.uid && currentMeta.uid) {
    meta.uid = currentMeta.uid;
  }
  if (!meta.creationTimestamp && currentMeta.creationTimestamp) {
    meta.creationTimestamp = currentMeta.creationTimestamp;
  }

  if (currentMeta.generation !== undefined) {
    meta.generation = currentMeta.generation;
  } else {
    delete meta.generation;
  }

  const annotations = mergeMaps(currentMeta.annotations, meta.annotations);
  if (annotations) meta.annotations = annotations;

  const labels = mergeMaps(currentMeta.labels, meta.labels);
  if (labels) meta.labels = labels;

  if (ownership === 'SharedNonController') {
    const ownerReferences = mergeOwnerReferences(meta.ownerReferences, currentMeta.ownerReferences);
    if (ownerReferences.length > 0) meta.ownerReferences = ownerReferences;
  }

  return merged;
}
