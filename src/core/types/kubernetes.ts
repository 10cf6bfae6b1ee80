/**
 * Kubernetes-specific types shared by the reconciler modules
 */

import type {
  V1ClusterRoleBinding,
  V1CronJob,
  V1DaemonSet,
  V1Deployment,
  V1Job,
  V1ObjectMeta,
  V1PodTemplate,
  V1RoleBinding,
  V1Secret,
  V1Service,
  V1ServiceAccount,
  V1StatefulSet,
} from '@kubernetes/client-node';

/**
 * A cluster object managed by the reconciler. The kind-specific payload
 * (`spec`, `data`, `roleRef`, ...) is carried as opaque fields.
 */
export interface ManagedResource {
  apiVersion: string;
  kind: string;
  metadata: V1ObjectMeta;
  spec?: unknown;
  status?: unknown;
  [field: string]: unknown;
}

/**
 * Addresses one managed resource. Cluster-scoped resources have an empty namespace.
 */
export interface ResourceIdentity {
  apiVersion: string;
  kind: string;
  namespace: string;
  name: string;
}

/**
 * The `{ namespace, name }` pair reported to the status collaborator
 */
export interface NamespacedName {
  namespace: string;
  name: string;
}

/**
 * The object that owns everything a reconciler writes (usually the custom
 * resource being reconciled). `uid` must be the server-assigned UID.
 */
export interface OwnerObject {
  apiVersion: string;
  kind: string;
  metadata: {
    name: string;
    namespace?: string;
    uid: string;
  };
}

// Typed views of managed resources, narrowed through the guards in kubernetes/type-guards.ts

export type DeploymentResource = ManagedResource & V1Deployment;
export type DaemonSetResource = ManagedResource & V1DaemonSet;
export type StatefulSetResource = ManagedResource & V1StatefulSet;
export type JobResource = ManagedResource & V1Job;
export type CronJobResource = ManagedResource & V1CronJob;
export type PodTemplateResource = ManagedResource & V1PodTemplate;
export type ServiceResource = ManagedResource & V1Service;
export type SecretResource = ManagedResource & V1Secret;
export type ServiceAccountResource = ManagedResource & V1ServiceAccount;
export type RoleBindingResource = ManagedResource & (V1RoleBinding | V1ClusterRoleBinding);
