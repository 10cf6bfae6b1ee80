/**
 * Status reporting
 *
 * The reconciler tells a status collaborator which workloads a component
 * runs, so that their rollout can be monitored.
 */

import type { WorkloadKind } from '../kinds/types.js';
import type { NamespacedName } from '../types/kubernetes.js';

export interface StatusCollaborator {
  addDeployments(workloads: NamespacedName[]): void;
  addDaemonsets(workloads: NamespacedName[]): void;
  addStatefulSets(workloads: NamespacedName[]): void;
  addCronJobs(workloads: NamespacedName[]): void;

  removeDeployments(...workloads: NamespacedName[]): void;
  removeDaemonsets(...workloads: NamespacedName[]): void;
  removeStatefulSets(...workloads: NamespacedName[]): void;
  removeCronJobs(...workloads: NamespacedName[]): void;

  /**
   * Called once per reconcile, after all objects have been processed
   */
  readyToMonitor(): void;
}

/**
 * Collects the workloads reconciled in one pass and reports them in bulk
 */
export class WorkloadTracker {
  private readonly workloads: Record<WorkloadKind, NamespacedName[]> = {
    Deployment: [],
    DaemonSet: [],
    StatefulSet: [],
    CronJob: [],
  };

  track(kind: WorkloadKind | undefined, workload: NamespacedName): void {
    if (kind) {
      this.workloads[kind].push(workload);
    }
  }

  /**
   * Kinds without tracked workloads are not reported
   */
  reportAdded(status: StatusCollaborator): void {
    const { Deployment, DaemonSet, StatefulSet, CronJob } = this.workloads;
    if (Deployment.length > 0) status.addDeployments(Deployment);
    if (DaemonSet.length > 0) status.addDaemonsets(DaemonSet);
    if (StatefulSet.length > 0) status.addStatefulSets(StatefulSet);
    if (CronJob.length > 0) status.addCronJobs(CronJob);
  }
}

export function reportRemoved(
  status: StatusCollaborator,
  kind: WorkloadKind | undefined,
  workload: NamespacedName
): void {
  switch (kind) {
    case 'Deployment':
      status.removeDeployments(workload);
      break;
    case 'DaemonSet':
      status.removeDaemonsets(workload);
      break;
    case 'StatefulSet':
      status.removeStatefulSets(workload);
      break;
    case 'CronJob':
      status.removeCronJobs(workload);
      break;
    case undefined:
      break;
  }
}
