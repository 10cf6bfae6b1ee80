/**
 * Kubernetes Type Guards
 *
 * Narrow a ManagedResource to the typed view of its kind. Kinds are matched on
 * kind and API group so that same-named kinds of other groups never match.
 */

import { apiGroupOf } from '../identity/identity.js';
import type {
  ElasticsearchResource,
  KibanaResource,
  MonitoringServerResource,
} from '../types/external.js';
import type {
  CronJobResource,
  DaemonSetResource,
  DeploymentResource,
  JobResource,
  ManagedResource,
  PodTemplateResource,
  RoleBindingResource,
  SecretResource,
  ServiceAccountResource,
  ServiceResource,
  StatefulSetResource,
} from '../types/kubernetes.js';

function isKind(resource: ManagedResource, group: string, kind: string): boolean {
  return resource.kind === kind && apiGroupOf(resource.apiVersion) === group;
}

function hasObjectSpec(resource: ManagedResource): resource is ManagedResource & { spec: object } {
  return typeof resource.spec === 'object' && resource.spec !== null;
}

/**
 * Check if a value has the shape of a Kubernetes object the reconciler can manage
 *
 * @example
 * ```typescript
 * if (isManagedResource(body)) {
 *   console.log(body.kind, body.metadata.name);
 * }
 * ```
 */
export function isManagedResource(value: unknown): value is ManagedResource {
  return (
    typeof value === 'object' &&
    value !== null &&
    'apiVersion' in value &&
    typeof value.apiVersion === 'string' &&
    'kind' in value &&
    typeof value.kind === 'string' &&
    'metadata' in value &&
    typeof value.metadata === 'object' &&
    value.metadata !== null
  );
}

export function isDeployment(resource: ManagedResource): resource is DeploymentResource {
  return isKind(resource, 'apps', 'Deployment');
}

export function isDaemonSet(resource: ManagedResource): resource is DaemonSetResource {
  return isKind(resource, 'apps', 'DaemonSet');
}

export function isStatefulSet(resource: ManagedResource): resource is StatefulSetResource {
  return isKind(resource, 'apps', 'StatefulSet');
}

export function isJob(resource: ManagedResource): resource is JobResource {
  return isKind(resource, 'batch', 'Job');
}

export function isCronJob(resource: ManagedResource): resource is CronJobResource {
  return isKind(resource, 'batch', 'CronJob');
}

export function isPodTemplate(resource: ManagedResource): resource is PodTemplateResource {
  return isKind(resource, '', 'PodTemplate');
}

export function isService(resource: ManagedResource): resource is ServiceResource {
  return isKind(resource, '', 'Service');
}

export function isSecret(resource: ManagedResource): resource is SecretResource {
  return isKind(resource, '', 'Secret');
}

export function isServiceAccount(resource: ManagedResource): resource is ServiceAccountResource {
  return isKind(resource, '', 'ServiceAccount');
}

export function isRoleBinding(resource: ManagedResource): resource is RoleBindingResource {
  return (
    isKind(resource, 'rbac.authorization.k8s.io', 'RoleBinding') ||
    isKind(resource, 'rbac.authorization.k8s.io', 'ClusterRoleBinding')
  );
}

export function isElasticsearch(resource: ManagedResource): resource is ElasticsearchResource {
  return isKind(resource, 'elasticsearch.k8s.elastic.co', 'Elasticsearch') && hasObjectSpec(resource);
}

export function isKibana(resource: ManagedResource): resource is KibanaResource {
  return isKind(resource, 'kibana.k8s.elastic.co', 'Kibana') && hasObjectSpec(resource);
}

export function isMonitoringServer(resource: ManagedResource): resource is MonitoringServerResource {
  return (
    (isKind(resource, 'monitoring.coreos.com', 'Prometheus') ||
      isKind(resource, 'monitoring.coreos.com', 'Alertmanager')) &&
    hasObjectSpec(resource)
  );
}
