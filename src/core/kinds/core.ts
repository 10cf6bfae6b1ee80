/**
 * Strategies of core and RBAC kinds with fields the API server defaults or
 * refuses to change
 */

import { isRoleBinding, isSecret, isService, isServiceAccount } from '../kubernetes/type-guards.js';
import { recreate, update } from '../merge/outcome.js';
import type { KindStrategy } from './types.js';

const HEADLESS = 'None';

/**
 * The cluster IP is assigned by the server and has to be carried over on
 * updates. It cannot be removed in place, so a Service that should become
 * headless is recreated.
 */
export const serviceStrategy: KindStrategy = {
  merge(desired, current) {
    if (!isService(desired) || !isService(current)) {
      return update(desired);
    }

    const currentClusterIP = current.spec?.clusterIP;
    if (desired.spec?.clusterIP !== HEADLESS) {
      desired.spec = { ...desired.spec, clusterIP: currentClusterIP };
      return update(desired);
    }

    if (currentClusterIP && currentClusterIP !== HEADLESS) {
      return recreate(desired);
    }
    return update(desired);
  },
};

/**
 * Secret types are immutable. An unset type is stored as Opaque, so that
 * difference does not count.
 */
export const secretStrategy: KindStrategy = {
  merge(desired, current) {
    if (!isSecret(desired) || !isSecret(current)) {
      return update(desired);
    }

    const desiredType = desired.type || undefined;
    const currentType = current.type || undefined;
    if (desiredType !== currentType && !(desiredType === undefined && currentType === 'Opaque')) {
      return recreate(desired);
    }
    return update(desired);
  },
};

/**
 * Token and image pull secrets are added to service accounts by other
 * controllers. Dropping them would start a write loop with those controllers.
 */
export const serviceAccountStrategy: KindStrategy = {
  merge(desired, current) {
    if (!isServiceAccount(desired) || !isServiceAccount(current)) {
      return update(desired);
    }

    if (current.secrets?.length && !desired.secrets?.length) {
      desired.secrets = current.secrets;
    }
    if (current.imagePullSecrets?.length && !desired.imagePullSecrets?.length) {
      desired.imagePullSecrets = current.imagePullSecrets;
    }
    return update(desired);
  },
};

/**
 * roleRef cannot be modified after creation
 */
export const roleBindingStrategy: KindStrategy = {
  merge(desired, current) {
    if (!isRoleBinding(desired) || !isRoleBinding(current)) {
      return update(desired);
    }

    if (desired.roleRef.name !== current.roleRef.name) {
      return recreate(desired);
    }
    return update(desired);
  },
};
