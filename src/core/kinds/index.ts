import { roleBindingStrategy, secretStrategy, serviceAccountStrategy, serviceStrategy } from './core.js';
import {
  alertmanagerStrategy,
  elasticsearchStrategy,
  kibanaStrategy,
  policyStrategy,
  prometheusStrategy,
  uiSettingsStrategy,
} from './external.js';
import { KindRegistry } from './registry.js';
import {
  cronJobStrategy,
  daemonSetStrategy,
  deploymentStrategy,
  jobStrategy,
  podTemplateStrategy,
  statefulSetStrategy,
} from './workloads.js';

/**
 * A registry holding the strategies of every kind with special handling
 */
export function createDefaultKindRegistry(): KindRegistry {
  return new KindRegistry()
    .register('apps/v1', 'Deployment', deploymentStrategy)
    .register('apps/v1', 'DaemonSet', daemonSetStrategy)
    .register('apps/v1', 'StatefulSet', statefulSetStrategy)
    .register('batch/v1', 'CronJob', cronJobStrategy)
    .register('batch/v1', 'Job', jobStrategy)
    .register('v1', 'PodTemplate', podTemplateStrategy)
    .register('v1', 'Service', serviceStrategy)
    .register('v1', 'Secret', secretStrategy)
    .register('v1', 'ServiceAccount', serviceAccountStrategy)
    .register('rbac.authorization.k8s.io/v1', 'RoleBinding', roleBindingStrategy)
    .register('rbac.authorization.k8s.io/v1', 'ClusterRoleBinding', roleBindingStrategy)
    .register('elasticsearch.k8s.elastic.co/v1', 'Elasticsearch', elasticsearchStrategy)
    .register('kibana.k8s.elastic.co/v1', 'Kibana', kibanaStrategy)
    .register('monitoring.coreos.com/v1', 'Prometheus', prometheusStrategy)
    .register('monitoring.coreos.com/v1', 'Alertmanager', alertmanagerStrategy)
    .register('projectcalico.org/v3', 'UISettings', uiSettingsStrategy)
    .register('projectcalico.org/v3', 'NetworkPolicy', policyStrategy)
    .register('projectcalico.org/v3', 'Tier', policyStrategy);
}

export { KindRegistry } from './registry.js';
export type { KindStrategy, NodeSelectorHolder, WorkloadKind } from './types.js';
export * from './core.js';
export * from './external.js';
export * from './workloads.js';
