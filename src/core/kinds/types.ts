import type { V1Container, V1PodSpec } from '@kubernetes/client-node';
import type { MergeOutcome } from '../merge/outcome.js';
import type { ManagedResource } from '../types/kubernetes.js';

/**
 * Workload kinds whose status the status collaborator tracks
 */
export type WorkloadKind = 'Deployment' | 'DaemonSet' | 'StatefulSet' | 'CronJob';

/**
 * Something carrying a node selector: a pod spec, or the spec of a kind that
 * keeps its pod settings at the top level
 */
export interface NodeSelectorHolder {
  nodeSelector?: Record<string, string>;
}

/**
 * Kind-specific behavior of the mutation pipeline and the merge policy.
 *
 * Accessors return references into the resource they are given; the pipeline
 * only ever hands them its own working copy.
 */
export interface KindStrategy {
  /**
   * Pod specs embedded in the resource
   */
  podSpecs?(resource: ManagedResource): V1PodSpec[];

  /**
   * Where the OS node selector goes. Defaults to the pod specs.
   */
  nodeSelectorHolders?(resource: ManagedResource): NodeSelectorHolder[];

  /**
   * Containers whose liveness and readiness probes receive default timings
   */
  probedContainers?(resource: ManagedResource): V1Container[];

  /**
   * Deployments and DaemonSets get the standard identity labels, a default
   * selector and the TLS cipher suite environment variable
   */
  standardWorkload?: boolean;

  /**
   * Reported to the status collaborator when set
   */
  workload?: WorkloadKind;

  /**
   * `never` for resources garbage-collected through another parent
   */
  ownerReferences?: 'attach' | 'never';

  /**
   * Decide what to do with an existing object. `desired` has already been
   * through the common metadata merge and is a private copy the strategy may
   * modify. Without a merge function the merged object is always written.
   */
  merge?(desired: ManagedResource, current: ManagedResource): MergeOutcome;
}
