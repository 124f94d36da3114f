import { RemovalPolicy } from '../Options';
import LibLogger from '../logger';
import { BoundedStore } from './BoundedStore';
import { CacheEntry, PutResult } from './CacheEntry';

const logger = LibLogger.get('AccessOrderStore');

/**
 * Ordered store backing the `lru` and `oldest-insertion` policies.
 *
 * Entries live in a Map, whose iteration order is insertion order; the first
 * entry is always the next one to evict. With `accessOrder` set, every read
 * and every write moves the key to the end, which turns insertion order into
 * least-recently-used order. Without it, rewriting an existing key keeps its
 * place and reads never reorder anything.
 */
export class AccessOrderStore<K, V> extends BoundedStore<K, V> {
  private readonly map = new Map<K, CacheEntry<K, V>>();

  constructor(maximumSize: number, private readonly accessOrder: boolean) {
    super(maximumSize);
  }

  put(key: K, value: V): PutResult<K, V> {
    const existing = this.map.get(key);
    if (existing) {
      const previous = existing.value;
      existing.value = value;
      if (this.accessOrder) {
        this.moveToNewest(existing);
      }
      return { previous, evicted: null };
    }

    const evicted = this.isFull() ? this.evictEldest() : null;
    this.map.set(key, { key, value });
    this.recordModification();
    return { previous: null, evicted };
  }

  get(key: K): V | null {
    const entry = this.map.get(key);
    if (!entry) {
      return null;
    }
    if (this.accessOrder) {
      this.moveToNewest(entry);
    }
    return entry.value;
  }

  containsKey(key: K): boolean {
    return this.map.has(key);
  }

  getSize(): number {
    return this.map.size;
  }

  dispose(): void {
    if (this.map.size > 0) {
      this.map.clear();
      this.recordModification();
    }
  }

  getRemovalPolicy(): RemovalPolicy {
    return this.accessOrder ? 'lru' : 'oldest-insertion';
  }

  protected entries(): Iterator<CacheEntry<K, V>> {
    return this.map.values();
  }

  private moveToNewest(entry: CacheEntry<K, V>): void {
    this.map.delete(entry.key);
    this.map.set(entry.key, entry);
    this.recordModification();
  }

  private evictEldest(): CacheEntry<K, V> {
    const eldest = this.map.values().next();
    if (eldest.done) {
      throw new Error('Cannot evict from an empty store');
    }
    this.map.delete(eldest.value.key);
    logger.trace('evictEldest', { key: eldest.value.key, removalPolicy: this.getRemovalPolicy() });
    return eldest.value;
  }
}
