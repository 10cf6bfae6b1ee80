import type { V1Probe } from '@kubernetes/client-node';
import type { ManagedResource } from '../types/kubernetes.js';
import type { MutationContext } from './context.js';

// The Kubernetes defaults (1s timeout, 10s period) restart busy components too
// eagerly. With these values a failing liveness probe restarts a container after
// about 3 minutes, and a failing readiness probe removes it from service after
// about 1.5 minutes.
export const PROBE_DEFAULTS = {
  failureThreshold: 3,
  successThreshold: 1,
  timeoutSeconds: 5,
  livenessPeriodSeconds: 60,
  readinessPeriodSeconds: 30,
} as const;

function applyDefaults(probe: V1Probe, periodSeconds: number): void {
  // Zero is the unset value on the wire
  if (!probe.failureThreshold) {
    probe.failureThreshold = PROBE_DEFAULTS.failureThreshold;
  }
  if (!probe.periodSeconds) {
    probe.periodSeconds = periodSeconds;
  }
  if (!probe.successThreshold) {
    probe.successThreshold = PROBE_DEFAULTS.successThreshold;
  }
  if (!probe.timeoutSeconds) {
    probe.timeoutSeconds = PROBE_DEFAULTS.timeoutSeconds;
  }
}

export function setProbeDefaults(resource: ManagedResource, context: MutationContext): void {
  for (const container of context.strategy.probedContainers?.(resource) ?? []) {
    if (container.livenessProbe) {
      applyDefaults(container.livenessProbe, PROBE_DEFAULTS.livenessPeriodSeconds);
    }
    if (container.readinessProbe) {
      applyDefaults(container.readinessProbe, PROBE_DEFAULTS.readinessPeriodSeconds);
    }
  }
}
