import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { demonstrateRemovalPolicies, monitorCache, runWorkload } from '../../examples/removal-policy-example';
import { createCache } from '../../src';

describe('Removal Policy Example', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => { });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('runWorkload', () => {
    it('should keep the most recently read key under lru', () => {
      expect(Array.from(runWorkload('lru').iteratorKeys())).toEqual(['sophie', 'robin']);
    });

    it('should keep the most frequently read key under lfu', () => {
      expect(Array.from(runWorkload('lfu').iteratorKeys())).toEqual(['robin', 'tom']);
    });

    it('should keep the latest inserted key under oldest-insertion', () => {
      expect(Array.from(runWorkload('oldest-insertion').iteratorKeys())).toEqual(['tom', 'robin']);
    });
  });

  describe('demonstrateRemovalPolicies', () => {
    it('should report the survivors of every policy', () => {
      const survivors = demonstrateRemovalPolicies();

      expect(survivors).toEqual({
        'lru': ['sophie', 'robin'],
        'lfu': ['robin', 'tom'],
        'oldest-insertion': ['tom', 'robin']
      });
      expect(consoleLogSpy).toHaveBeenCalledWith('=== Removal Policies Demo ===\n');
      expect(consoleLogSpy).toHaveBeenCalledWith('lfu: robin, tom');
      expect(consoleLogSpy).toHaveBeenCalledWith('  lru hit rate: 100.0% (3/3), evictions: 1');
      expect(consoleLogSpy).toHaveBeenCalledWith('\n=== Demo Complete ===');
    });
  });

  describe('monitorCache', () => {
    it('should display size and statistics with the default label', () => {
      const cache = createCache<string, number>(4, 'lfu');
      cache.put('a', 1);
      cache.get('a');
      cache.get('b');

      monitorCache(cache);

      expect(consoleLogSpy).toHaveBeenCalledWith('  Cache size: 1/4');
      expect(consoleLogSpy).toHaveBeenCalledWith('  Cache hit rate: 50.0% (1/2), evictions: 0');
    });

    it('should show a zero hit rate before any request', () => {
      monitorCache(createCache<string, number>(1), 'empty');

      expect(consoleLogSpy).toHaveBeenCalledWith('  empty hit rate: 0.0% (0/0), evictions: 0');
    });
  });
});
