export { mergeCommonMetadata, mergeMaps, mergeOwnerReferences, mergeTemplateMetadata } from './metadata.js';
export { noChange, recreate, update } from './outcome.js';
export type { MergeOutcome } from './outcome.js';
export { evaluateMerge } from './policy.js';
export type { MergeOptions } from './policy.js';
