import type { V1LabelSelector, V1PodTemplateSpec } from '@kubernetes/client-node';
import { isDaemonSet, isDeployment } from '../kubernetes/type-guards.js';
import type { ManagedResource } from '../types/kubernetes.js';
import type { MutationContext } from './context.js';

export const APP_LABEL = 'k8s-app';
export const NAME_LABEL = 'app.kubernetes.io/name';

interface WorkloadSpec {
  selector?: V1LabelSelector;
  template?: V1PodTemplateSpec;
}

function workloadSpecOf(resource: ManagedResource): WorkloadSpec | undefined {
  return isDeployment(resource) || isDaemonSet(resource) ? resource.spec : undefined;
}

/**
 * Label Deployments and DaemonSets, and their pods, with their name, and
 * select those pods by default
 */
export function setStandardSelectorAndLabels(resource: ManagedResource, context: MutationContext): void {
  const name = resource.metadata.name;
  const spec = workloadSpecOf(resource);
  if (!context.strategy.standardWorkload || !name || !spec) {
    return;
  }

  resource.metadata.labels = {
    ...resource.metadata.labels,
    [APP_LABEL]: name,
    [NAME_LABEL]: name,
  };

  if (!spec.selector) {
    spec.selector = { matchLabels: { [APP_LABEL]: name } };
  }

  const template = spec.template ?? {};
  const podLabels = { ...template.metadata?.labels };
  if (!podLabels[APP_LABEL]) {
    podLabels[APP_LABEL] = name;
  }
  if (!podLabels[NAME_LABEL]) {
    podLabels[NAME_LABEL] = name;
  }
  template.metadata = { ...template.metadata, labels: podLabels };
  spec.template = template;
}
