import type { ManagedResource } from '../types/kubernetes.js';
import type { MutationContext } from './context.js';

export const TLS_CIPHERS_ENV_VAR_NAME = 'TLS_CIPHER_SUITES';

/**
 * Hand the installation's TLS cipher suites to the containers of Deployments
 * and DaemonSets, unless a container already sets the variable
 */
export function ensureTLSCiphers(resource: ManagedResource, context: MutationContext): void {
  const { strategy, tlsCipherSuites } = context;
  if (!strategy.standardWorkload || !tlsCipherSuites) {
    return;
  }

  for (const podSpec of strategy.podSpecs?.(resource) ?? []) {
    for (const container of podSpec.containers ?? []) {
      const env = container.env ?? [];
      if (!env.some((envVar) => envVar.name === TLS_CIPHERS_ENV_VAR_NAME)) {
        container.env = [...env, { name: TLS_CIPHERS_ENV_VAR_NAME, value: tlsCipherSuites }];
      }
    }
  }
}
