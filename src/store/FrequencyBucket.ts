import { CacheEntry } from './CacheEntry';

/**
 * An entry of the frequency store, doubly linked with the other entries sharing its access count.
 * The links carry no order of their own: all entries of a bucket are equally frequent.
 */
export interface FrequencyEntry<K, V> extends CacheEntry<K, V> {
  bucket: FrequencyBucket<K, V> | null;
  previous: FrequencyEntry<K, V> | null;
  next: FrequencyEntry<K, V> | null;
}

export const createFrequencyEntry = <K, V>(key: K, value: V): FrequencyEntry<K, V> => ({
  key,
  value,
  bucket: null,
  previous: null,
  next: null
});

/**
 * Holds every entry recorded with the same access count.
 *
 * Buckets are chained from the least to the most frequently used, so moving an
 * entry to its next frequency only ever looks at the neighbouring bucket, however
 * many entries share its current count.
 */
export class FrequencyBucket<K, V> {
  frequency: number;

  previous: FrequencyBucket<K, V> | null = null;
  next: FrequencyBucket<K, V> | null = null;

  firstEntry: FrequencyEntry<K, V> | null = null;

  constructor(frequency: number) {
    this.frequency = frequency;
  }

  isEmpty(): boolean {
    return this.firstEntry === null;
  }

  hasSingleEntry(): boolean {
    return this.firstEntry !== null && this.firstEntry.next === null;
  }

  /**
   * Link this bucket into a chain, right before `successor`
   */
  insertBefore(successor: FrequencyBucket<K, V>): void {
    this.previous = successor.previous;
    this.next = successor;

    if (successor.previous !== null) {
      successor.previous.next = this;
    }
    successor.previous = this;
  }

  /**
   * Link this bucket into a chain, right after `predecessor`
   */
  insertAfter(predecessor: FrequencyBucket<K, V>): void {
    this.previous = predecessor;
    this.next = predecessor.next;

    if (predecessor.next !== null) {
      predecessor.next.previous = this;
    }
    predecessor.next = this;
  }

  /**
   * Take this bucket out of its chain. Only an empty bucket may leave the chain.
   */
  unlink(): void {
    if (!this.isEmpty()) {
      throw new Error(`Cannot unlink non-empty bucket with frequency ${this.frequency}`);
    }

    if (this.previous !== null) {
      this.previous.next = this.next;
    }
    if (this.next !== null) {
      this.next.previous = this.previous;
    }
    this.previous = null;
    this.next = null;
  }

  /**
   * Add an unlinked entry at the front of this bucket
   */
  add(entry: FrequencyEntry<K, V>): void {
    if (entry.bucket !== null) {
      throw new Error('Cannot add an entry that already belongs to a bucket');
    }
    entry.bucket = this;
    entry.previous = null;
    entry.next = this.firstEntry;

    if (this.firstEntry !== null) {
      this.firstEntry.previous = entry;
    }
    this.firstEntry = entry;
  }

  /**
   * Unlink an entry from this bucket. The bucket may be left empty;
   * taking it out of the chain is up to the owner of the chain.
   */
  remove(entry: FrequencyEntry<K, V>): void {
    if (entry.bucket !== this) {
      throw new Error('Cannot remove an entry from a bucket that does not own it');
    }

    if (this.firstEntry === entry) {
      this.firstEntry = entry.next;
    }
    if (entry.previous !== null) {
      entry.previous.next = entry.next;
    }
    if (entry.next !== null) {
      entry.next.previous = entry.previous;
    }

    entry.previous = null;
    entry.next = null;
    entry.bucket = null;
  }

  *entries(): Generator<FrequencyEntry<K, V>> {
    for (let entry = this.firstEntry; entry !== null; entry = entry.next) {
      yield entry;
    }
  }
}
