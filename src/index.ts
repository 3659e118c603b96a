// Core cache functionality
export { createMetadataCache, isMetadataCache } from './MetadataCache';
export type { MetadataCache, MetadataCacheInfo, MetadataSource } from './MetadataCache';
export { MetadataCacheMap } from './MetadataCacheMap';
export type { MetadataEntryInfo, MetadataKey } from './MetadataCacheMap';
export { MemoryMetadataCacheMap } from './memory/MemoryMetadataCacheMap';

// Errors
export {
  MetadataResourceError,
  MissingResourceError,
  CorruptResourceError,
  EmptyResourceError,
  isMetadataResourceError
} from './errors';

// Collaborators
export { FileMetadataLoader, createMemoryMetadataLoader } from './MetadataLoader';
export type { MetadataLoader } from './MetadataLoader';
export { createJsonMetadataDecoder, phoneMetadataDecoder } from './MetadataDecoder';
export type { MetadataDecoder } from './MetadataDecoder';
export {
  REGION_CODE_FOR_NON_GEO_ENTITY,
  createCallingCodeClassifier,
  isNonGeographical
} from './CallingCodeClassifier';
export type { CallingCodeClassifier } from './CallingCodeClassifier';
export { phoneMetadataSchema, phoneNumberDescSchema, numberFormatSchema } from './PhoneMetadata';
export type { PhoneMetadata, PhoneNumberDesc, NumberFormat } from './PhoneMetadata';

// Configuration and options
export { createOptions, validateOptions, DEFAULT_FILE_PREFIX } from './Options';
export type { Options, MetadataCacheOptions, MetadataCacheBaseOptions } from './Options';

// Operations
export { loadMetadataFromFile, resourceNameFor } from './ops/loadMetadataFromFile';
export type { LoadContext } from './ops/loadMetadataFromFile';

// Statistics
export { CacheStatsManager } from './CacheStats';
export type { MetadataCacheStats } from './CacheStats';

// Utilities
export { parseSizeString, formatBytes, estimateValueSize } from './utils/CacheSize';
export { readFully, closeInput, MULTI_FILE_BUFFER_SIZE } from './utils/ResourceInput';
