import safeStringify from 'fast-safe-stringify';

/**
 * Utility functions for parsing sizes and estimating the footprint of cached records
 */

/**
 * Size unit multipliers (decimal and binary)
 */
const SIZE_UNITS: { [key: string]: number } = {
  'b': 1,
  'byte': 1,
  'bytes': 1,
  'kb': 1000,
  'mb': 1000 * 1000,
  'gb': 1000 * 1000 * 1000,

  'kib': 1024,
  'mib': 1024 * 1024,
  'gib': 1024 * 1024 * 1024,
};

/**
 * Parse a size string and return the size in bytes
 *
 * @param sizeStr - Size string (e.g., '300', '16KiB', '1MB')
 * @throws Error if the size string is invalid
 */
export function parseSizeString(sizeStr: string): number {
  if (!sizeStr || typeof sizeStr !== 'string') {
    throw new Error('Size string must be a non-empty string');
  }

  const trimmed = sizeStr.trim();

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.floor(parseFloat(trimmed));
  }

  const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*([a-zA-Z]+)$/);
  if (!match) {
    throw new Error(`Invalid size format: ${sizeStr}. Expected format: '100', '16KiB', '1MB', etc.`);
  }

  const [, valueStr, unitStr] = match;
  const value = parseFloat(valueStr);
  const unit = unitStr.toLowerCase();

  const multiplier = SIZE_UNITS[unit];
  if (typeof multiplier === 'undefined') {
    const supportedUnits = Object.keys(SIZE_UNITS).filter(u => u.length <= 3).join(', ');
    throw new Error(`Unsupported size unit: ${unitStr}. Supported units: ${supportedUnits}`);
  }

  return Math.floor(value * multiplier);
}

/**
 * Format bytes as a human-readable string
 *
 * @param binary - Use binary units (1024) instead of decimal (1000)
 */
export function formatBytes(bytes: number, binary: boolean = false): string {
  if (bytes === 0) return '0 B';
  if (bytes < 0) return `${bytes} B`;

  const k = binary ? 1024 : 1000;
  const sizes = binary
    ? ['B', 'KiB', 'MiB', 'GiB', 'TiB']
    : ['B', 'KB', 'MB', 'GB', 'TB'];

  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  const size = bytes / Math.pow(k, i);

  const formatted = size % 1 === 0 ? size.toString() : size.toFixed(1);

  return `${formatted} ${sizes[i]}`;
}

/**
 * Estimate the in-memory size of a value in bytes.
 * This is an approximation used for reporting only.
 */
export function estimateValueSize(value: unknown): number {
  if (value === null || typeof value === 'undefined') {
    return 8;
  }

  switch (typeof value) {
    case 'boolean':
      return 4;
    case 'number':
      return 8;
    case 'string':
      // UTF-16 code units
      return value.length * 2;
    case 'object':
      if (Array.isArray(value)) {
        return value.reduce<number>((total, item) => total + estimateValueSize(item), 24);
      }
      try {
        // safeStringify replaces circular references instead of throwing
        return safeStringify(value).length * 2 + 16;
      } catch {
        return 64;
      }
    default:
      return 32;
  }
}
