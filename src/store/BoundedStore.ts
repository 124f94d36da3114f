import { Disposable } from '../Disposable';
import { ConcurrentModificationError } from '../errors';
import { RemovalPolicy, validateMaximumSize } from '../Options';
import { CacheEntry, PutResult } from './CacheEntry';

/**
 * Iterator over a live store view that fails as soon as the store it walks
 * has been structurally modified since the iterator was created.
 */
class ModificationGuardedIterator<E, T> implements IterableIterator<T> {
  private readonly expectedModificationCount: number;
  private finished = false;

  constructor(
    private readonly source: Iterator<E>,
    private readonly project: (element: E) => T,
    private readonly currentModificationCount: () => number
  ) {
    this.expectedModificationCount = currentModificationCount();
  }

  next(): IteratorResult<T> {
    if (this.finished) {
      return { done: true, value: undefined };
    }
    if (this.currentModificationCount() !== this.expectedModificationCount) {
      throw new ConcurrentModificationError();
    }
    const step = this.source.next();
    if (step.done) {
      this.finished = true;
      return { done: true, value: undefined };
    }
    return { done: false, value: this.project(step.value) };
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this;
  }
}

/**
 * Abstract base class for the stores backing a cache.
 * A store holds at most `maximumSize` entries and picks the entry to remove,
 * according to its removal policy, when a new key arrives while it is full.
 *
 * Every change to membership or order counts as a structural modification;
 * iterators handed out by a store stop working after one.
 */
export abstract class BoundedStore<K, V> implements Disposable {
  protected readonly maximumSize: number;
  private modificationCount = 0;

  protected constructor(maximumSize: number) {
    this.maximumSize = validateMaximumSize(maximumSize);
  }

  /**
   * Associate a value with a key, evicting one entry first if the key is new and the store is full
   */
  abstract put(key: K, value: V): PutResult<K, V>;

  /**
   * Return the value for a key and record an access to it, or null if absent
   */
  abstract get(key: K): V | null;

  /**
   * Check for a key without recording an access
   */
  abstract containsKey(key: K): boolean;

  abstract getSize(): number;

  /**
   * Remove every entry; the store stays usable
   */
  abstract dispose(): void;

  abstract getRemovalPolicy(): RemovalPolicy;

  /**
   * Walk the entries from the eldest (next to be evicted) to the newest
   */
  protected abstract entries(): Iterator<CacheEntry<K, V>>;

  getMaximumSize(): number {
    return this.maximumSize;
  }

  iterator(): IterableIterator<V> {
    return this.guard(entry => entry.value);
  }

  iteratorKeys(): IterableIterator<K> {
    return this.guard(entry => entry.key);
  }

  protected isFull(): boolean {
    return this.getSize() >= this.maximumSize;
  }

  protected recordModification(): void {
    this.modificationCount++;
  }

  private guard<T>(project: (entry: CacheEntry<K, V>) => T): IterableIterator<T> {
    return new ModificationGuardedIterator(this.entries(), project, () => this.modificationCount);
  }
}
