/**
 * Builders for the objects used across the tests
 */

import type { V1Container } from '@kubernetes/client-node';
import type { StatusCollaborator } from '../../src/core/reconcile/status.js';
import type {
  Component,
  ComponentObjects,
  DesiredObject,
  OSType,
} from '../../src/core/types/component.js';
import type { NamespacedName, OwnerObject } from '../../src/core/types/kubernetes.js';
import type {
  DeploymentResource,
  JobResource,
  ManagedResource,
  RoleBindingResource,
  SecretResource,
  ServiceResource,
} from '../../src/core/types/kubernetes.js';
import type { ElasticsearchResource } from '../../src/core/types/external.js';

export function container(name: string, image: string, extra: Partial<V1Container> = {}): V1Container {
  return { name, image, ...extra };
}

export function deployment(
  name: string,
  namespace: string,
  containers: V1Container[] = [container('main', 'registry.local/app:1.0')],
  replicas?: number
): DeploymentResource {
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name, namespace },
    spec: {
      ...(replicas !== undefined ? { replicas } : {}),
      selector: { matchLabels: { 'k8s-app': name } },
      template: {
        metadata: { labels: { 'k8s-app': name } },
        spec: { containers },
      },
    },
  };
}

export function service(name: string, namespace: string, clusterIP?: string): ServiceResource {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: { name, namespace },
    spec: {
      ports: [{ port: 443 }],
      ...(clusterIP !== undefined ? { clusterIP } : {}),
    },
  };
}

export function secret(name: string, namespace: string, type?: string): SecretResource {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: { name, namespace },
    ...(type !== undefined ? { type } : {}),
    data: { key: 'dGVzdC1zZWNyZXQ=' },
  };
}

export function configMap(name: string, namespace: string, data: Record<string, string>): ManagedResource {
  return { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name, namespace }, data };
}

export function namespace(name: string): ManagedResource {
  return { apiVersion: 'v1', kind: 'Namespace', metadata: { name } };
}

export function roleBinding(name: string, namespace: string, role: string): RoleBindingResource {
  return {
    apiVersion: 'rbac.authorization.k8s.io/v1',
    kind: 'RoleBinding',
    metadata: { name, namespace },
    roleRef: { apiGroup: 'rbac.authorization.k8s.io', kind: 'Role', name: role },
    subjects: [{ kind: 'ServiceAccount', name: 'worker', namespace }],
  };
}

export function job(name: string, namespace: string, images: string[]): JobResource {
  return {
    apiVersion: 'batch/v1',
    kind: 'Job',
    metadata: { name, namespace },
    spec: {
      template: {
        spec: {
          restartPolicy: 'Never',
          containers: images.map((image, i) => container(`c${i}`, image)),
        },
      },
    },
  };
}

export function elasticsearch(name: string, namespace: string, count: number): ElasticsearchResource {
  return {
    apiVersion: 'elasticsearch.k8s.elastic.co/v1',
    kind: 'Elasticsearch',
    metadata: { name, namespace },
    spec: {
      version: '8.15.0',
      nodeSets: [{ name: 'default', count }],
    },
  };
}

export function owner(namespace?: string): OwnerObject {
  return {
    apiVersion: 'operator.example.dev/v1',
    kind: 'Installation',
    metadata: { name: 'default', uid: 'owner-uid', ...(namespace ? { namespace } : {}) },
  };
}

/**
 * A component returning fixed objects
 */
export class StaticComponent implements Component {
  readonly name = 'static-component';

  constructor(
    private readonly toCreate: DesiredObject[],
    private readonly toDelete: ManagedResource[] = [],
    private readonly os: OSType = 'any',
    private readonly isReady = true
  ) {}

  ready(): boolean {
    return this.isReady;
  }

  objects(): ComponentObjects {
    return { toCreate: this.toCreate, toDelete: this.toDelete };
  }

  supportedOSType(): OSType {
    return this.os;
  }
}

/**
 * Records every status report
 */
export class RecordingStatus implements StatusCollaborator {
  readonly added: Record<string, NamespacedName[]> = {};
  readonly removed: Record<string, NamespacedName[]> = {};
  monitorCalls = 0;

  addDeployments(workloads: NamespacedName[]): void {
    this.add('Deployment', workloads);
  }
  addDaemonsets(workloads: NamespacedName[]): void {
    this.add('DaemonSet', workloads);
  }
  addStatefulSets(workloads: NamespacedName[]): void {
    this.add('StatefulSet', workloads);
  }
  addCronJobs(workloads: NamespacedName[]): void {
    this.add('CronJob', workloads);
  }
  removeDeployments(...workloads: NamespacedName[]): void {
    this.remove('Deployment', workloads);
  }
  removeDaemonsets(...workloads: NamespacedName[]): void {
    this.remove('DaemonSet', workloads);
  }
  removeStatefulSets(...workloads: NamespacedName[]): void {
    this.remove('StatefulSet', workloads);
  }
  removeCronJobs(...workloads: NamespacedName[]): void {
    this.remove('CronJob', workloads);
  }
  readyToMonitor(): void {
    this.monitorCalls++;
  }

  private add(kind: string, workloads: NamespacedName[]): void {
    this.added[kind] = [...(this.added[kind] ?? []), ...workloads];
  }

  private remove(kind: string, workloads: NamespacedName[]): void {
    this.removed[kind] = [...(this.removed[kind] ?? []), ...workloads];
  }
}
