import LibLogger from './logger';

const logger = LibLogger.get('CacheStats');

/**
 * Cache statistics tracking interface
 */
export interface CacheStats {
  /** Total number of lookups (get operations) */
  numRequests: number;
  /** Lookups that found no entry */
  numMisses: number;
  /** Lookups that found an entry */
  numHits: number;
  /** Entries removed by the removal policy to make room for new keys */
  numEvictions: number;
}

const emptyStats = (): CacheStats => ({
  numRequests: 0,
  numMisses: 0,
  numHits: 0,
  numEvictions: 0
});

/**
 * Cache statistics manager that tracks various cache metrics
 */
export class CacheStatsManager {
  private stats: CacheStats = emptyStats();
  private lastLoggedRequests = 0;
  private readonly LOG_THRESHOLD = 100; // Log every 100 requests

  incrementRequests(): void {
    this.stats.numRequests++;
    this.maybeLogStats();
  }

  incrementHits(): void {
    this.stats.numHits++;
  }

  incrementMisses(): void {
    this.stats.numMisses++;
  }

  incrementEvictions(): void {
    this.stats.numEvictions++;
  }

  private maybeLogStats(): void {
    const requestsSinceLastLog = this.stats.numRequests - this.lastLoggedRequests;

    if (requestsSinceLastLog >= this.LOG_THRESHOLD) {
      const hitRate = this.stats.numRequests > 0
        ? ((this.stats.numHits / this.stats.numRequests) * 100).toFixed(2)
        : '0.00';

      logger.debug('Cache statistics update', {
        component: 'cache',
        subcomponent: 'CacheStatsManager',
        totalRequests: this.stats.numRequests,
        hits: this.stats.numHits,
        misses: this.stats.numMisses,
        evictions: this.stats.numEvictions,
        hitRate: `${hitRate}%`,
        requestsSinceLastLog
      });

      this.lastLoggedRequests = this.stats.numRequests;
    }
  }

  /**
   * Get a copy of the current statistics
   */
  getStats(): CacheStats {
    return { ...this.stats };
  }

  reset(): void {
    this.stats = emptyStats();
    this.lastLoggedRequests = 0;
  }
}
