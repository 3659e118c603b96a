import { describe, expect, it } from 'vitest';
import { estimateValueSize, formatBytes, parseSizeString } from '@/utils/CacheSize';

describe('CacheSize', () => {
  describe('parseSizeString', () => {
    it('should parse plain byte counts', () => {
      expect(parseSizeString('300')).toBe(300);
      expect(parseSizeString(' 4096 ')).toBe(4096);
    });

    it('should parse binary units', () => {
      expect(parseSizeString('16KiB')).toBe(16384);
      expect(parseSizeString('1 MiB')).toBe(1048576);
    });

    it('should parse decimal units case-insensitively', () => {
      expect(parseSizeString('16kb')).toBe(16000);
      expect(parseSizeString('1.5MB')).toBe(1500000);
    });

    it('should reject empty strings', () => {
      expect(() => parseSizeString('')).toThrow('Size string must be a non-empty string');
    });

    it('should reject malformed sizes', () => {
      expect(() => parseSizeString('lots')).toThrow("Invalid size format: lots. Expected format: '100', '16KiB', '1MB', etc.");
    });

    it('should reject unknown units', () => {
      expect(() => parseSizeString('5XB')).toThrow('Unsupported size unit: XB. Supported units: b, kb, mb, gb, kib, mib, gib');
    });
  });

  describe('formatBytes', () => {
    it('should format zero and negative values as bytes', () => {
      expect(formatBytes(0)).toBe('0 B');
      expect(formatBytes(-5)).toBe('-5 B');
    });

    it('should use decimal units by default', () => {
      expect(formatBytes(1500)).toBe('1.5 KB');
      expect(formatBytes(2000000)).toBe('2 MB');
    });

    it('should use binary units on request', () => {
      expect(formatBytes(16384, true)).toBe('16 KiB');
    });
  });

  describe('estimateValueSize', () => {
    it('should give fixed sizes for primitives', () => {
      expect(estimateValueSize(null)).toBe(8);
      expect(estimateValueSize(undefined)).toBe(8);
      expect(estimateValueSize(true)).toBe(4);
      expect(estimateValueSize(44)).toBe(8);
    });

    it('should count two bytes per string character', () => {
      expect(estimateValueSize('GB')).toBe(4);
    });

    it('should add array overhead to element sizes', () => {
      expect(estimateValueSize([1, 2])).toBe(24 + 8 + 8);
    });

    it('should size objects by their serialized form', () => {
      // '{"a":1}' is 7 characters
      expect(estimateValueSize({ a: 1 })).toBe(7 * 2 + 16);
    });

    it('should handle circular references', () => {
      const record: { id: string; self?: unknown } = { id: 'GB' };
      record.self = record;

      expect(estimateValueSize(record)).toBeGreaterThan(0);
    });
  });
});
