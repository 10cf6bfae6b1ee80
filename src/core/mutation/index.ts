export type { MutationContext, MutationStep } from './context.js';
export { APP_LABEL, NAME_LABEL, setStandardSelectorAndLabels } from './labels.js';
export { crossesScope, setOwnerReference } from './owner-reference.js';
export { MUTATION_STEPS, mutateDesired } from './pipeline.js';
export { DEFAULT_IMAGE_PULL_POLICY, orderVolumes, setImagePullPolicy } from './pod-spec.js';
export { PROBE_DEFAULTS, setProbeDefaults } from './probes.js';
export { ensureOSScheduling, OS_NODE_SELECTOR_LABEL } from './scheduling.js';
export { ensureTLSCiphers, TLS_CIPHERS_ENV_VAR_NAME } from './tls-ciphers.js';
