/**
 * Custom resources of other operators that the reconciler writes and merges.
 * Only the fields the reconciler reads or mutates are typed.
 */

import type { V1Container, V1PodTemplateSpec } from '@kubernetes/client-node';
import type { ManagedResource } from './kubernetes.js';

export interface ElasticsearchNodeSet {
  name: string;
  count?: number;
  podTemplate?: V1PodTemplateSpec;
  [field: string]: unknown;
}

/**
 * elasticsearch.k8s.elastic.co Elasticsearch
 */
export interface ElasticsearchResource extends ManagedResource {
  spec: {
    nodeSets?: ElasticsearchNodeSet[];
    [field: string]: unknown;
  };
}

/**
 * kibana.k8s.elastic.co Kibana
 */
export interface KibanaResource extends ManagedResource {
  spec: {
    podTemplate?: V1PodTemplateSpec;
    elasticsearchRef?: { name: string; namespace?: string };
    [field: string]: unknown;
  };
}

/**
 * monitoring.coreos.com Prometheus and Alertmanager: pod settings live directly in the spec
 */
export interface MonitoringServerResource extends ManagedResource {
  spec: {
    nodeSelector?: Record<string, string>;
    containers?: V1Container[];
    [field: string]: unknown;
  };
}
