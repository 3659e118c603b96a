import { beforeEach, describe, expect, it, vi } from 'vitest';
import { CacheStatsManager } from '../src/CacheStats';

const mockLogger = vi.hoisted(() => ({
  default: vi.fn(),
  error: vi.fn(),
  warning: vi.fn(),
  debug: vi.fn(),
  trace: vi.fn()
}));

vi.mock('../src/logger', () => ({
  default: {
    get: vi.fn().mockReturnValue(mockLogger)
  }
}));

describe('CacheStatsManager', () => {
  let statsManager: CacheStatsManager;

  beforeEach(() => {
    vi.clearAllMocks();
    statsManager = new CacheStatsManager();
  });

  it('should initialize with zero values', () => {
    expect(statsManager.getStats()).toEqual({
      numRequests: 0,
      numHits: 0,
      numMisses: 0,
      numLoads: 0,
      numRacesLost: 0,
      numAbsent: 0
    });
  });

  it('should return a copy of stats, not the original object', () => {
    const stats1 = statsManager.getStats();
    const stats2 = statsManager.getStats();

    expect(stats1).not.toBe(stats2);
    expect(stats1).toEqual(stats2);
  });

  it('should increment each counter independently', () => {
    statsManager.incrementRequests();
    statsManager.incrementRequests();
    statsManager.incrementHits();
    statsManager.incrementMisses();
    statsManager.incrementLoads();
    statsManager.incrementRacesLost();
    statsManager.incrementAbsent();

    expect(statsManager.getStats()).toEqual({
      numRequests: 2,
      numHits: 1,
      numMisses: 1,
      numLoads: 1,
      numRacesLost: 1,
      numAbsent: 1
    });
  });

  it('should log statistics every 100 requests', () => {
    for (let i = 0; i < 99; i++) {
      statsManager.incrementRequests();
      statsManager.incrementHits();
    }
    expect(mockLogger.debug).not.toHaveBeenCalled();

    statsManager.incrementRequests();

    expect(mockLogger.debug).toHaveBeenCalledTimes(1);
    expect(mockLogger.debug).toHaveBeenCalledWith('Metadata cache statistics update', expect.objectContaining({
      totalRequests: 100,
      hits: 99,
      hitRate: '99.00%',
      requestsSinceLastLog: 100
    }));
  });
});
