import { describe, expect, it } from 'vitest';
import { AccessOrderStore } from '../../src/store/AccessOrderStore';
import { ConcurrentModificationError } from '../../src/errors';

describe('AccessOrderStore', () => {
  const keysOf = (store: AccessOrderStore<string, number>): string[] => Array.from(store.iteratorKeys());

  describe('in access order (lru)', () => {
    const createStore = (maximumSize = 3) => new AccessOrderStore<string, number>(maximumSize, true);

    it('should report the lru policy', () => {
      expect(createStore().getRemovalPolicy()).toBe('lru');
    });

    it('should move a key to the newest end on get', () => {
      const store = createStore();
      store.put('a', 1);
      store.put('b', 2);
      store.put('c', 3);

      expect(store.get('a')).toBe(1);
      expect(keysOf(store)).toEqual(['b', 'c', 'a']);
    });

    it('should move a key to the newest end when its value is replaced', () => {
      const store = createStore();
      store.put('a', 1);
      store.put('b', 2);

      expect(store.put('a', 10)).toEqual({ previous: 1, evicted: null });
      expect(keysOf(store)).toEqual(['b', 'a']);
      expect(Array.from(store.iterator())).toEqual([2, 10]);
    });

    it('should evict the least recently used key', () => {
      const store = createStore(2);
      store.put('A', 1);
      store.put('B', 2);
      store.get('A');

      expect(store.put('C', 3)).toEqual({ previous: null, evicted: { key: 'B', value: 2 } });
      expect(keysOf(store)).toEqual(['A', 'C']);
    });

    it('should not reorder on a miss or on containsKey', () => {
      const store = createStore();
      store.put('a', 1);
      store.put('b', 2);

      expect(store.get('missing')).toBeNull();
      expect(store.containsKey('a')).toBe(true);
      expect(store.containsKey('missing')).toBe(false);
      expect(keysOf(store)).toEqual(['a', 'b']);
    });

    it('should fail an outstanding iteration after a get reorders keys', () => {
      const store = createStore();
      store.put('a', 1);
      store.put('b', 2);
      const keys = store.iteratorKeys();

      expect(keys.next()).toEqual({ done: false, value: 'a' });
      store.get('a');

      expect(() => keys.next()).toThrow(ConcurrentModificationError);
      expect(() => keys.next()).toThrow('Cache was structurally modified during iteration');
    });
  });

  describe('in insertion order (oldest-insertion)', () => {
    const createStore = (maximumSize = 3) => new AccessOrderStore<string, number>(maximumSize, false);

    it('should report the oldest-insertion policy', () => {
      expect(createStore().getRemovalPolicy()).toBe('oldest-insertion');
    });

    it('should not reorder on get', () => {
      const store = createStore();
      store.put('a', 1);
      store.put('b', 2);

      expect(store.get('a')).toBe(1);
      expect(keysOf(store)).toEqual(['a', 'b']);
    });

    it('should keep the position of a key whose value is replaced', () => {
      const store = createStore();
      store.put('a', 1);
      store.put('b', 2);

      expect(store.put('a', 10)).toEqual({ previous: 1, evicted: null });
      expect(keysOf(store)).toEqual(['a', 'b']);
      expect(Array.from(store.iterator())).toEqual([10, 2]);
    });

    it('should evict the oldest inserted key despite reads', () => {
      const store = createStore(2);
      store.put('A', 1);
      store.put('B', 2);
      store.get('A');

      expect(store.put('C', 3).evicted).toEqual({ key: 'A', value: 1 });
      expect(keysOf(store)).toEqual(['B', 'C']);
    });

    it('should let an iteration continue through reads and value replacements', () => {
      const store = createStore();
      store.put('a', 1);
      store.put('b', 2);
      const values = store.iterator();

      expect(values.next()).toEqual({ done: false, value: 1 });
      store.get('a');
      store.put('b', 20);

      expect(values.next()).toEqual({ done: false, value: 20 });
      expect(values.next().done).toBe(true);
    });

    it('should fail an outstanding iteration after a new key is added', () => {
      const store = createStore();
      store.put('a', 1);
      const values = store.iterator();
      store.put('b', 2);

      expect(() => values.next()).toThrow(ConcurrentModificationError);
    });
  });

  describe('dispose', () => {
    it('should clear every entry and stay usable', () => {
      const store = new AccessOrderStore<string, number>(2, true);
      store.put('a', 1);
      store.put('b', 2);

      store.dispose();

      expect(store.getSize()).toBe(0);
      expect(store.containsKey('a')).toBe(false);
      store.put('c', 3);
      expect(keysOf(store)).toEqual(['c']);
    });

    it('should fail an outstanding iteration', () => {
      const store = new AccessOrderStore<string, number>(2, false);
      store.put('a', 1);
      const keys = store.iteratorKeys();

      store.dispose();

      expect(() => keys.next()).toThrow(ConcurrentModificationError);
    });

    it('should leave iterations over an empty store untouched', () => {
      const store = new AccessOrderStore<string, number>(2, false);
      const keys = store.iteratorKeys();

      store.dispose();

      expect(keys.next()).toEqual({ done: true, value: undefined });
    });
  });

  it('should never exceed its maximum size', () => {
    const store = new AccessOrderStore<number, number>(4, true);
    for (let i = 0; i < 50; i++) {
      store.put(i % 7, i);
      expect(store.getSize()).toBeLessThanOrEqual(4);
    }
    expect(store.getSize()).toBe(4);
  });
});
