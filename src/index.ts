// Core cache functionality
export { createCache, createCacheFromOptions, isCache } from './Cache';
export type { Cache } from './Cache';

// Configuration and options
export {
  createOptions,
  validateOptions,
  validateMaximumSize,
  validateRemovalPolicy,
  isRemovalPolicy,
  DEFAULT_CACHE_OPTIONS,
  REMOVAL_POLICIES
} from './Options';
export type { CacheOptions, RemovalPolicy } from './Options';

// Errors
export { InvalidConfigurationError, ConcurrentModificationError } from './errors';

// Resource release
export { isDisposable } from './Disposable';
export type { Disposable } from './Disposable';

// Statistics
export { CacheStatsManager } from './CacheStats';
export type { CacheStats } from './CacheStats';

// Stores backing each removal policy
export {
  BoundedStore,
  createBoundedStore,
  AccessOrderStore,
  FrequencyStore,
  FrequencyBucket,
  createFrequencyEntry
} from './store';
export type { CacheEntry, PutResult, FrequencyEntry } from './store';
