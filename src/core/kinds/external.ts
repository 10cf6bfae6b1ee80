/**
 * Strategies of custom resources written back to by other operators
 */

import type { V1PodSpec } from '@kubernetes/client-node';
import { isSameValue } from '../identity/identity.js';
import { isElasticsearch, isKibana, isMonitoringServer } from '../kubernetes/type-guards.js';
import { noChange, update } from '../merge/outcome.js';
import type { ManagedResource } from '../types/kubernetes.js';
import type { KindStrategy } from './types.js';
import { present } from './workloads.js';

function elasticsearchPodSpecs(resource: ManagedResource): V1PodSpec[] {
  if (isElasticsearch(resource)) {
    return present((resource.spec.nodeSets ?? []).map((nodeSet) => nodeSet.podTemplate?.spec));
  }
  if (isKibana(resource)) {
    return present([resource.spec.podTemplate?.spec]);
  }
  return [];
}

/**
 * The Elastic operator writes annotations, finalizers and status to its
 * resources. Those are kept as they are on the cluster, and nothing is written
 * while the spec is unchanged.
 */
export const elasticsearchStrategy: KindStrategy = {
  podSpecs: elasticsearchPodSpecs,
  probedContainers: (resource) =>
    elasticsearchPodSpecs(resource).flatMap((podSpec) => podSpec.containers ?? []),
  merge(desired, current) {
    if (isSameValue(desired.spec, current.spec)) {
      return noChange();
    }

    desired.metadata.annotations = current.metadata.annotations;
    desired.metadata.finalizers = current.metadata.finalizers;
    desired.status = current.status;
    return update(desired);
  },
};

export const kibanaStrategy: KindStrategy = {
  ...elasticsearchStrategy,
  merge(desired, current) {
    const outcome = elasticsearchStrategy.merge?.(desired, current) ?? update(desired);
    if (outcome.type === 'update' && isKibana(outcome.object) && isKibana(current)) {
      outcome.object.spec.elasticsearchRef = current.spec.elasticsearchRef;
    }
    return outcome;
  },
};

function monitoringSpecs(resource: ManagedResource) {
  return isMonitoringServer(resource) ? [resource.spec] : [];
}

export const prometheusStrategy: KindStrategy = {
  nodeSelectorHolders: monitoringSpecs,
  probedContainers: (resource) => monitoringSpecs(resource).flatMap((spec) => spec.containers ?? []),
};

export const alertmanagerStrategy: KindStrategy = {
  nodeSelectorHolders: monitoringSpecs,
};

/**
 * UI settings are always owned by their settings group, so the owner
 * references on the cluster are never replaced.
 */
export const uiSettingsStrategy: KindStrategy = {
  ownerReferences: 'never',
  merge(desired, current) {
    if (isSameValue(desired.spec, current.spec)) {
      return noChange();
    }
    desired.metadata.ownerReferences = current.metadata.ownerReferences;
    return update(desired);
  },
};

/**
 * Policy resources are written only when their spec changes
 */
export const policyStrategy: KindStrategy = {
  merge(desired, current) {
    return isSameValue(desired.spec, current.spec) ? noChange() : update(desired);
  },
};
