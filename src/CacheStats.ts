import LibLogger from './logger';

const logger = LibLogger.get('CacheStats');

/**
 * Metadata cache statistics
 */
export interface MetadataCacheStats {
  /** Total number of lookups across both partitions */
  numRequests: number;
  /** Lookups answered from memory */
  numHits: number;
  /** Lookups that had to load a resource */
  numMisses: number;
  /** Resources loaded and decoded successfully */
  numLoads: number;
  /** Loads whose record was discarded because another lookup stored one first */
  numRacesLost: number;
  /** Non-geographical lookups answered with null because the code is geographical */
  numAbsent: number;
}

/**
 * Tracks metadata cache counters and logs them periodically
 */
export class CacheStatsManager {
  private readonly stats: MetadataCacheStats = {
    numRequests: 0,
    numHits: 0,
    numMisses: 0,
    numLoads: 0,
    numRacesLost: 0,
    numAbsent: 0
  };
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

  incrementLoads(): void {
    this.stats.numLoads++;
  }

  incrementRacesLost(): void {
    this.stats.numRacesLost++;
  }

  incrementAbsent(): void {
    this.stats.numAbsent++;
  }

  private maybeLogStats(): void {
    const requestsSinceLastLog = this.stats.numRequests - this.lastLoggedRequests;

    if (requestsSinceLastLog >= this.LOG_THRESHOLD) {
      const hitRate = this.stats.numRequests > 0
        ? ((this.stats.numHits / this.stats.numRequests) * 100).toFixed(2)
        : '0.00';

      logger.debug('Metadata cache statistics update', {
        totalRequests: this.stats.numRequests,
        hits: this.stats.numHits,
        misses: this.stats.numMisses,
        loads: this.stats.numLoads,
        racesLost: this.stats.numRacesLost,
        hitRate: `${hitRate}%`,
        requestsSinceLastLog
      });

      this.lastLoggedRequests = this.stats.numRequests;
    }
  }

  /**
   * Get a copy of the current statistics
   */
  getStats(): MetadataCacheStats {
    return { ...this.stats };
  }
}
