export { DeduplicationCache } from './dedup-cache.js';
export type { CacheEntry } from './dedup-cache.js';
