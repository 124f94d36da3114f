import { RemovalPolicy } from '../Options';
import LibLogger from '../logger';
import { BoundedStore } from './BoundedStore';
import { CacheEntry, PutResult } from './CacheEntry';
import { createFrequencyEntry, FrequencyBucket, FrequencyEntry } from './FrequencyBucket';

const logger = LibLogger.get('FrequencyStore');

/**
 * Store backing the `lfu` policy.
 *
 * Entries are grouped into frequency buckets chained by increasing access count.
 * The head bucket always holds the least frequently used entries, so picking
 * the entry to evict and recording an access are both constant time.
 *
 * Reads record an access. Rewriting an existing key replaces its value and
 * leaves its frequency alone. A new key starts at frequency 1.
 *
 * Entries are added at the front of their bucket and eviction takes the first
 * entry of the head bucket, so among the least frequently used entries the one
 * touched last is evicted first.
 */
export class FrequencyStore<K, V> extends BoundedStore<K, V> {
  private readonly index = new Map<K, FrequencyEntry<K, V>>();
  private head: FrequencyBucket<K, V> | null = null;

  constructor(maximumSize: number) {
    super(maximumSize);
  }

  put(key: K, value: V): PutResult<K, V> {
    const existing = this.index.get(key);
    if (existing) {
      const previous = existing.value;
      existing.value = value;
      return { previous, evicted: null };
    }

    const evicted = this.isFull() ? this.evictEldest() : null;

    const entry = createFrequencyEntry(key, value);
    let bucket = this.head;
    if (bucket === null || bucket.frequency > 1) {
      const fresh = new FrequencyBucket<K, V>(1);
      if (bucket !== null) {
        fresh.insertBefore(bucket);
      }
      this.head = fresh;
      bucket = fresh;
    }
    bucket.add(entry);
    this.index.set(key, entry);
    this.recordModification();

    return { previous: null, evicted };
  }

  get(key: K): V | null {
    const entry = this.index.get(key);
    if (!entry) {
      return null;
    }
    this.recordAccess(entry);
    this.recordModification();
    return entry.value;
  }

  containsKey(key: K): boolean {
    return this.index.has(key);
  }

  getSize(): number {
    return this.index.size;
  }

  /**
   * Access count recorded for a key, or null if absent. Does not record an access.
   */
  getFrequency(key: K): number | null {
    const entry = this.index.get(key);
    return entry?.bucket ? entry.bucket.frequency : null;
  }

  dispose(): void {
    if (this.index.size > 0) {
      this.index.clear();
      this.head = null;
      this.recordModification();
    }
  }

  getRemovalPolicy(): RemovalPolicy {
    return 'lfu';
  }

  /**
   * Verify the bucket chain: frequencies strictly increasing from the head,
   * no empty bucket, consistent links, and every indexed entry reachable.
   */
  checkInvariants(): void {
    let reachable = 0;
    let previous: FrequencyBucket<K, V> | null = null;
    for (let bucket = this.head; bucket !== null; bucket = bucket.next) {
      if (bucket.previous !== previous) {
        throw new Error(`Broken back link on bucket with frequency ${bucket.frequency}`);
      }
      if (bucket.isEmpty()) {
        throw new Error(`Empty bucket with frequency ${bucket.frequency} left in chain`);
      }
      if (previous !== null && bucket.frequency <= previous.frequency) {
        throw new Error(`Bucket frequency ${bucket.frequency} does not follow ${previous.frequency}`);
      }
      for (const entry of bucket.entries()) {
        if (entry.bucket !== bucket || this.index.get(entry.key) !== entry) {
          throw new Error('Entry is not owned by the bucket that links it');
        }
        reachable++;
      }
      previous = bucket;
    }
    if (reachable !== this.index.size) {
      throw new Error(`Bucket chain holds ${reachable} entries but ${this.index.size} are indexed`);
    }
  }

  protected *entries(): Generator<CacheEntry<K, V>> {
    for (let bucket = this.head; bucket !== null; bucket = bucket.next) {
      yield* bucket.entries();
    }
  }

  /**
   * Move an entry to the bucket for its next frequency
   */
  private recordAccess(entry: FrequencyEntry<K, V>): void {
    const bucket = this.ownerOf(entry);
    const frequency = bucket.frequency + 1;
    const next = bucket.next;

    if (next !== null && next.frequency === frequency) {
      this.detach(entry, bucket);
      next.add(entry);
    } else if (bucket.hasSingleEntry()) {
      bucket.frequency = frequency;
    } else {
      const promoted = new FrequencyBucket<K, V>(frequency);
      promoted.insertAfter(bucket);
      this.detach(entry, bucket);
      promoted.add(entry);
    }
  }

  private evictEldest(): CacheEntry<K, V> {
    const bucket = this.head;
    const eldest = bucket?.firstEntry;
    if (!bucket || !eldest) {
      throw new Error('Cannot evict from an empty frequency store');
    }
    logger.trace('evictEldest', { key: eldest.key, frequency: bucket.frequency });
    this.detach(eldest, bucket);
    this.index.delete(eldest.key);
    return { key: eldest.key, value: eldest.value };
  }

  /**
   * Unlink an entry from its bucket, dropping the bucket from the chain if it became empty
   */
  private detach(entry: FrequencyEntry<K, V>, bucket: FrequencyBucket<K, V>): void {
    bucket.remove(entry);
    if (bucket.isEmpty()) {
      if (this.head === bucket) {
        this.head = bucket.next;
      }
      bucket.unlink();
    }
  }

  private ownerOf(entry: FrequencyEntry<K, V>): FrequencyBucket<K, V> {
    if (entry.bucket === null) {
      throw new Error('Entry is not linked to any bucket');
    }
    return entry.bucket;
  }
}
