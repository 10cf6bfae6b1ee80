import type { V1Container, V1PodSpec } from '@kubernetes/client-node';
import { sortBy } from 'lodash-es';
import type { ManagedResource } from '../types/kubernetes.js';
import type { MutationContext } from './context.js';

export const DEFAULT_IMAGE_PULL_POLICY = 'IfNotPresent';

function allContainers(podSpec: V1PodSpec): V1Container[] {
  return [...(podSpec.initContainers ?? []), ...(podSpec.containers ?? [])];
}

export function setImagePullPolicy(resource: ManagedResource, context: MutationContext): void {
  for (const podSpec of context.strategy.podSpecs?.(resource) ?? []) {
    for (const container of allContainers(podSpec)) {
      if (!container.imagePullPolicy) {
        container.imagePullPolicy = DEFAULT_IMAGE_PULL_POLICY;
      }
    }
  }
}

/**
 * Sort volumes and volume mounts by name so that equal specs serialize identically
 */
export function orderVolumes(resource: ManagedResource, context: MutationContext): void {
  for (const podSpec of context.strategy.podSpecs?.(resource) ?? []) {
    if (podSpec.volumes) {
      podSpec.volumes = sortBy(podSpec.volumes, (volume) => volume.name);
    }
    for (const container of allContainers(podSpec)) {
      if (container.volumeMounts) {
        container.volumeMounts = sortBy(container.volumeMounts, (mount) => mount.name);
      }
    }
  }
}
