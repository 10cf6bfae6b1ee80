/**
 * Installation-wide settings the mutation pipeline needs. Only the TLS cipher
 * suites are read today.
 */

import { type } from 'arktype';
import { InstallationConfigError } from '../errors.js';
import type { ClusterClient, RequestOptions } from '../kubernetes/cluster-client.js';
import { isNotFoundError } from '../kubernetes/errors.js';
import type { ResourceIdentity } from '../types/kubernetes.js';

export interface InstallationConfigLookup {
  /**
   * Cipher suite names joined by "," or undefined when none are configured
   */
  tlsCipherSuites(options?: RequestOptions): Promise<string | undefined>;
}

export class StaticInstallationConfig implements InstallationConfigLookup {
  constructor(private readonly suites?: string) {}

  async tlsCipherSuites(): Promise<string | undefined> {
    return this.suites || undefined;
  }
}

const installationSpec = type({
  'tlsCipherSuites?': type({ name: 'string' }).array(),
});

/**
 * Reads `spec.tlsCipherSuites` of a cluster-scoped installation object.
 * A missing object means no cipher suites are configured.
 */
export class ClusterInstallationConfig implements InstallationConfigLookup {
  constructor(
    private readonly client: ClusterClient,
    private readonly reference: Omit<ResourceIdentity, 'namespace'>
  ) {}

  async tlsCipherSuites(options: RequestOptions = {}): Promise<string | undefined> {
    let spec: unknown;
    try {
      const installation = await this.client.get({ ...this.reference, namespace: '' }, options);
      spec = installation.spec ?? {};
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }

    const result = installationSpec(spec);
    if (result instanceof type.errors) {
      throw new InstallationConfigError(
        `Invalid ${this.reference.kind} ${this.reference.name}: ${result.summary}`,
        result.summary
      );
    }

    const names = (result.tlsCipherSuites ?? []).map((suite) => suite.name);
    return names.length > 0 ? names.join(',') : undefined;
  }
}
