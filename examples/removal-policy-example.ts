/**
 * Example comparing the three removal policies on the same workload
 *
 * Each cache holds two entries. "sophie" and "tom" are stored, "tom" is read
 * twice and "sophie" once, then "robin" arrives and one of them has to go.
 */

import { Cache, createCache, RemovalPolicy, REMOVAL_POLICIES } from '../src';

export function runWorkload(policy: RemovalPolicy): Cache<string, string> {
  const cache = createCache<string, string>(2, policy);
  cache.put('sophie', 'red');
  cache.put('tom', 'blue');

  cache.get('tom');
  cache.get('tom');
  cache.get('sophie');

  cache.put('robin', 'green');
  return cache;
}

/**
 * Print what each policy kept, eldest first
 */
export function demonstrateRemovalPolicies(): Record<RemovalPolicy, string[]> {
  console.log('=== Removal Policies Demo ===\n');

  const survivors: Record<RemovalPolicy, string[]> = {
    'lru': [],
    'lfu': [],
    'oldest-insertion': []
  };
  for (const policy of REMOVAL_POLICIES) {
    const cache = runWorkload(policy);
    survivors[policy] = Array.from(cache.iteratorKeys());
    console.log(`${policy}: ${survivors[policy].join(', ')}`);
    monitorCache(cache, policy);
  }

  console.log('\n=== Demo Complete ===');
  return survivors;
}

/**
 * Display the statistics of a cache
 */
export function monitorCache(cache: Cache<unknown, unknown>, label: string = 'Cache'): void {
  const stats = cache.getStats();
  const hitRate = stats.numRequests > 0 ? ((stats.numHits / stats.numRequests) * 100).toFixed(1) : '0.0';
  console.log(`  ${label} size: ${cache.getSize()}/${cache.getMaximumSize()}`);
  console.log(`  ${label} hit rate: ${hitRate}% (${stats.numHits}/${stats.numRequests}), evictions: ${stats.numEvictions}`);
}

// Run the demonstration if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  demonstrateRemovalPolicies();
}
