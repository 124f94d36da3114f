import { beforeEach, describe, expect, it } from 'vitest';
import { CacheStats, CacheStatsManager } from '../src/CacheStats';

describe('CacheStatsManager', () => {
  let statsManager: CacheStatsManager;

  beforeEach(() => {
    statsManager = new CacheStatsManager();
  });

  it('should initialize with zero values', () => {
    const expected: CacheStats = { numRequests: 0, numMisses: 0, numHits: 0, numEvictions: 0 };
    expect(statsManager.getStats()).toEqual(expected);
  });

  it('should increment each counter independently', () => {
    statsManager.incrementRequests();
    statsManager.incrementRequests();
    statsManager.incrementHits();
    statsManager.incrementMisses();
    statsManager.incrementEvictions();
    statsManager.incrementEvictions();
    statsManager.incrementEvictions();

    expect(statsManager.getStats()).toEqual({
      numRequests: 2,
      numMisses: 1,
      numHits: 1,
      numEvictions: 3
    });
  });

  it('should return a copy of the statistics', () => {
    const stats = statsManager.getStats();
    stats.numHits = 99;

    expect(statsManager.getStats().numHits).toBe(0);
  });

  it('should keep counting past the logging threshold', () => {
    for (let i = 0; i < 250; i++) {
      statsManager.incrementRequests();
      statsManager.incrementHits();
    }

    expect(statsManager.getStats().numRequests).toBe(250);
    expect(statsManager.getStats().numHits).toBe(250);
  });

  it('should reset all statistics to zero', () => {
    statsManager.incrementRequests();
    statsManager.incrementMisses();
    statsManager.incrementEvictions();

    statsManager.reset();

    expect(statsManager.getStats()).toEqual({ numRequests: 0, numMisses: 0, numHits: 0, numEvictions: 0 });
  });
});
