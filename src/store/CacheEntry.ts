/**
 * A key/value pair held by a cache
 */
export interface CacheEntry<K, V> {
  key: K;
  value: V;
}

/**
 * Outcome of storing a value in a bounded store
 */
export interface PutResult<K, V> {
  /** Value previously associated with the key, null for a new key */
  previous: V | null;
  /** Entry removed to make room for a new key, null if nothing was removed */
  evicted: CacheEntry<K, V> | null;
}
