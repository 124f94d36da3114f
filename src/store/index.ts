export { BoundedStore } from './BoundedStore';
export type { CacheEntry, PutResult } from './CacheEntry';
export { createBoundedStore } from './BoundedStoreFactory';

export { AccessOrderStore } from './AccessOrderStore';
export { FrequencyStore } from './FrequencyStore';
export { FrequencyBucket, createFrequencyEntry } from './FrequencyBucket';
export type { FrequencyEntry } from './FrequencyBucket';
