/**
 * Strategies of the pod-creating kinds
 */

import type { V1Container, V1PodSpec } from '@kubernetes/client-node';
import { isEmpty } from 'lodash-es';
import { isSameValue } from '../identity/identity.js';
import {
  isCronJob,
  isDaemonSet,
  isDeployment,
  isJob,
  isPodTemplate,
  isStatefulSet,
} from '../kubernetes/type-guards.js';
import { mergeTemplateMetadata } from '../merge/metadata.js';
import { noChange, recreate, update } from '../merge/outcome.js';
import type { ManagedResource } from '../types/kubernetes.js';
import type { KindStrategy } from './types.js';

export function present<T>(values: Array<T | undefined>): T[] {
  return values.filter((value): value is T => value !== undefined);
}

function containersOf(podSpecs: V1PodSpec[]): V1Container[] {
  return podSpecs.flatMap((podSpec) => podSpec.containers ?? []);
}

function templatePodSpec(resource: ManagedResource): V1PodSpec[] {
  if (isDeployment(resource) || isDaemonSet(resource) || isStatefulSet(resource) || isJob(resource)) {
    return present([resource.spec?.template?.spec]);
  }
  return [];
}

export const deploymentStrategy: KindStrategy = {
  podSpecs: templatePodSpec,
  probedContainers: (resource) => containersOf(templatePodSpec(resource)),
  standardWorkload: true,
  workload: 'Deployment',
  merge(desired, current) {
    if (!isDeployment(desired) || !isDeployment(current) || !desired.spec) {
      return update(desired);
    }

    // Only take over the live replica count when none is desired, so that
    // explicitly sized Deployments stay under our control.
    if (desired.spec.replicas === undefined && current.spec?.replicas !== undefined) {
      desired.spec.replicas = current.spec.replicas;
    }
    mergeTemplateMetadata(desired.spec.template, current.spec?.template);
    return update(desired);
  },
};

export const daemonSetStrategy: KindStrategy = {
  podSpecs: templatePodSpec,
  probedContainers: (resource) => containersOf(templatePodSpec(resource)),
  standardWorkload: true,
  workload: 'DaemonSet',
  merge(desired, current) {
    if (!isDaemonSet(desired) || !isDaemonSet(current) || !desired.spec) {
      return update(desired);
    }
    mergeTemplateMetadata(desired.spec.template, current.spec?.template);
    return update(desired);
  },
};

export const statefulSetStrategy: KindStrategy = {
  podSpecs: templatePodSpec,
  workload: 'StatefulSet',
};

export const cronJobStrategy: KindStrategy = {
  podSpecs: (resource) =>
    isCronJob(resource) ? present([resource.spec?.jobTemplate.spec?.template.spec]) : [],
  workload: 'CronJob',
};

export const podTemplateStrategy: KindStrategy = {
  podSpecs: (resource) => (isPodTemplate(resource) ? present([resource.template?.spec]) : []),
};

function emptyToUndefined(map: Record<string, string> | undefined): Record<string, string> | undefined {
  return isEmpty(map) ? undefined : map;
}

/**
 * Jobs are compared on container count, container images and template
 * annotations only. Their pod template cannot be updated, so any difference
 * means deleting and recreating the Job.
 */
export const jobStrategy: KindStrategy = {
  podSpecs: templatePodSpec,
  merge(desired, current) {
    if (!isJob(desired) || !isJob(current)) {
      return update(desired);
    }

    const desiredContainers = desired.spec?.template.spec?.containers ?? [];
    const currentContainers = current.spec?.template.spec?.containers ?? [];
    if (desiredContainers.length !== currentContainers.length) {
      return recreate(desired);
    }
    if (desiredContainers.some((container, i) => container.image !== currentContainers[i]?.image)) {
      return recreate(desired);
    }

    const desiredAnnotations = emptyToUndefined(desired.spec?.template.metadata?.annotations);
    const currentAnnotations = emptyToUndefined(current.spec?.template.metadata?.annotations);
    if (isSameValue(desiredAnnotations, currentAnnotations)) {
      return noChange();
    }
    return recreate(desired);
  },
};
