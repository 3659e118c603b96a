import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryMetadataCacheMap } from '../../src/memory/MemoryMetadataCacheMap';
import { MetadataCacheMap } from '../../src/MetadataCacheMap';

describe('MemoryMetadataCacheMap', () => {
  interface TestRecord {
    id: string;
    countryCode: number;
  }

  const gb: TestRecord = { id: 'GB', countryCode: 44 };
  const fr: TestRecord = { id: 'FR', countryCode: 33 };

  let cacheMap: MemoryMetadataCacheMap<string, TestRecord>;

  beforeEach(() => {
    cacheMap = new MemoryMetadataCacheMap<string, TestRecord>();
  });

  describe('Constructor', () => {
    it('should create an empty cache map', () => {
      expect(cacheMap.keys()).toHaveLength(0);
      expect(cacheMap.values()).toHaveLength(0);
      expect(cacheMap.size()).toBe(0);
    });

    it('should extend MetadataCacheMap', () => {
      expect(cacheMap).toBeInstanceOf(MetadataCacheMap);
    });

    it('should have correct implementationType', () => {
      expect(cacheMap.implementationType).toBe('memory/write-once');
    });
  });

  describe('putIfAbsent()', () => {
    it('should store a record for a new key and return it', () => {
      expect(cacheMap.putIfAbsent('GB', gb)).toBe(gb);
      expect(cacheMap.get('GB')).toBe(gb);
    });

    it('should keep the first record and return it for later puts', () => {
      const replacement: TestRecord = { id: 'GB', countryCode: 0 };
      cacheMap.putIfAbsent('GB', gb);

      expect(cacheMap.putIfAbsent('GB', replacement)).toBe(gb);
      expect(cacheMap.get('GB')).toBe(gb);
      expect(cacheMap.size()).toBe(1);
    });
  });

  describe('get() and includesKey()', () => {
    it('should return null for keys never stored', () => {
      expect(cacheMap.get('FR')).toBeNull();
      expect(cacheMap.includesKey('FR')).toBe(false);
    });

    it('should report stored keys', () => {
      cacheMap.putIfAbsent('FR', fr);
      expect(cacheMap.includesKey('FR')).toBe(true);
    });
  });

  describe('keys() and values()', () => {
    it('should list entries in insertion order', () => {
      cacheMap.putIfAbsent('GB', gb);
      cacheMap.putIfAbsent('FR', fr);

      expect(cacheMap.keys()).toEqual(['GB', 'FR']);
      expect(cacheMap.values()).toEqual([gb, fr]);
    });
  });

  describe('entry info', () => {
    it('should return null for unknown keys', () => {
      expect(cacheMap.getEntryInfo('GB')).toBeNull();
    });

    it('should record key, insertion time and estimated size', () => {
      const before = Date.now();
      cacheMap.putIfAbsent('GB', gb);

      const info = cacheMap.getEntryInfo('GB');

      expect(info?.key).toBe('GB');
      expect(info?.addedAt).toBeGreaterThanOrEqual(before);
      // '{"id":"GB","countryCode":44}' is 28 characters
      expect(info?.estimatedSize).toBe(28 * 2 + 16);
    });

    it('should sum estimated sizes across entries', () => {
      cacheMap.putIfAbsent('GB', gb);
      cacheMap.putIfAbsent('FR', fr);

      expect(cacheMap.getEstimatedSizeBytes()).toBe(2 * (28 * 2 + 16));
    });
  });

  describe('numeric keys', () => {
    it('should index non-geographical records by calling code', () => {
      const nonGeo = new MemoryMetadataCacheMap<number, TestRecord>();
      const tollFree: TestRecord = { id: '001', countryCode: 800 };

      nonGeo.putIfAbsent(800, tollFree);

      expect(nonGeo.get(800)).toBe(tollFree);
      expect(nonGeo.get(808)).toBeNull();
      expect(nonGeo.keys()).toEqual([800]);
    });
  });
});
