import { describe, expect, it } from 'vitest';
import { WorkloadTracker, reportRemoved } from '../../src/core/reconcile/status.js';
import { RecordingStatus } from '../utils/fixtures.js';

describe('WorkloadTracker', () => {
  it('should report tracked workloads by kind', () => {
    const tracker = new WorkloadTracker();
    const status = new RecordingStatus();
    tracker.track('DaemonSet', { namespace: 'ns-a', name: 'agent' });
    tracker.track('CronJob', { namespace: 'ns-a', name: 'cleanup' });
    tracker.track(undefined, { namespace: 'ns-a', name: 'settings' });
    tracker.track('DaemonSet', { namespace: 'ns-b', name: 'agent' });

    tracker.reportAdded(status);

    expect(status.added).toEqual({
      DaemonSet: [
        { namespace: 'ns-a', name: 'agent' },
        { namespace: 'ns-b', name: 'agent' },
      ],
      CronJob: [{ namespace: 'ns-a', name: 'cleanup' }],
    });
  });

  it('should not report kinds without workloads', () => {
    const tracker = new WorkloadTracker();
    const status = new RecordingStatus();
    tracker.track(undefined, { namespace: 'ns-a', name: 'settings' });

    tracker.reportAdded(status);

    expect(status.added).toEqual({});
  });

  it('should report removals of workload kinds only', () => {
    const status = new RecordingStatus();

    reportRemoved(status, 'StatefulSet', { namespace: 'ns-a', name: 'db' });
    reportRemoved(status, undefined, { namespace: 'ns-a', name: 'settings' });

    expect(status.removed).toEqual({ StatefulSet: [{ namespace: 'ns-a', name: 'db' }] });
  });
});
