import { CallingCodeClassifier } from './CallingCodeClassifier';
import { MetadataDecoder, phoneMetadataDecoder } from './MetadataDecoder';
import { MetadataLoader } from './MetadataLoader';
import { PhoneMetadata } from './PhoneMetadata';
import { parseSizeString } from './utils/CacheSize';
import LibLogger from './logger';

const logger = LibLogger.get('Options');

/**
 * Default prefix of metadata resource names; a region's resource is `<prefix>_<key>`.
 */
export const DEFAULT_FILE_PREFIX = 'PhoneNumberMetadataProto';

/**
 * Complete metadata cache options
 */
export interface Options<R> {
  /** Prefix of metadata resource names */
  filePrefix: string;

  /** Source of resource bytes */
  metadataLoader: MetadataLoader;

  /** Turns resource bytes into records */
  metadataDecoder: MetadataDecoder<R>;

  /** Decides which calling codes are non-geographical */
  callingCodeClassifier: CallingCodeClassifier;

  /** Initial read buffer size (e.g. '16KiB', '4096') */
  bufferSize: string;
}

export interface MetadataCacheBaseOptions {
  metadataLoader: MetadataLoader;
  callingCodeClassifier: CallingCodeClassifier;
  filePrefix?: string;
  bufferSize?: string;
}

/**
 * Options accepted when creating a cache. Loader and classifier are required; the decoder
 * defaults to the JSON phone metadata decoder.
 */
export type MetadataCacheOptions<R> = MetadataCacheBaseOptions & { metadataDecoder: MetadataDecoder<R> };

const DEFAULT_OPTIONS = {
  filePrefix: DEFAULT_FILE_PREFIX,
  bufferSize: '16KiB'
};

/**
 * Create cache options with defaults
 */
export function createOptions(options: MetadataCacheBaseOptions & { metadataDecoder?: undefined }): Options<PhoneMetadata>;
export function createOptions<R>(options: MetadataCacheOptions<R>): Options<R>;
export function createOptions(
  options: MetadataCacheBaseOptions & { metadataDecoder?: MetadataDecoder<unknown> }
): Options<unknown> {
  const result: Options<unknown> = {
    ...DEFAULT_OPTIONS,
    ...options,
    filePrefix: options.filePrefix ?? DEFAULT_OPTIONS.filePrefix,
    bufferSize: options.bufferSize ?? DEFAULT_OPTIONS.bufferSize,
    metadataDecoder: options.metadataDecoder ?? phoneMetadataDecoder
  };

  validateOptions(result);

  return result;
}

const VALID_PROPERTIES = [
  'filePrefix',
  'metadataLoader',
  'metadataDecoder',
  'callingCodeClassifier',
  'bufferSize'
];

const PROPERTY_SUGGESTIONS: Record<string, string> = {
  'prefix': 'filePrefix',
  'fileprefix': 'filePrefix',
  'file_prefix': 'filePrefix',
  'loader': 'metadataLoader',
  'metadataloader': 'metadataLoader',
  'metadata_loader': 'metadataLoader',
  'decoder': 'metadataDecoder',
  'metadatadecoder': 'metadataDecoder',
  'metadata_decoder': 'metadataDecoder',
  'classifier': 'callingCodeClassifier',
  'callingcodeclassifier': 'callingCodeClassifier',
  'calling_code_classifier': 'callingCodeClassifier',
  'buffersize': 'bufferSize',
  'buffer_size': 'bufferSize'
};

/**
 * Validate cache options
 * @throws Error if options are invalid
 */
export const validateOptions = (options: Options<unknown>): void => {
  const unknownProperties = Object.keys(options).filter(key => !VALID_PROPERTIES.includes(key));

  if (unknownProperties.length > 0) {
    const suggestions = unknownProperties.map(prop => {
      const suggestion = PROPERTY_SUGGESTIONS[prop] ?? PROPERTY_SUGGESTIONS[prop.toLowerCase()];
      return suggestion ? `"${prop}" → "${suggestion}"` : `"${prop}"`;
    });
    logger.error('Unknown metadata cache options', { unknownProperties });
    throw new Error(
      `Unknown configuration properties: ${suggestions.join(', ')}. ` +
      `Valid properties are: ${VALID_PROPERTIES.join(', ')}.`
    );
  }

  if (typeof options.filePrefix !== 'string' || options.filePrefix.length === 0) {
    throw new Error('filePrefix must be a non-empty string');
  }

  if (!options.metadataLoader || typeof options.metadataLoader.loadMetadata !== 'function') {
    throw new Error('metadataLoader must provide a loadMetadata function');
  }

  if (!options.metadataDecoder || typeof options.metadataDecoder.decode !== 'function') {
    throw new Error('metadataDecoder must provide a decode function');
  }

  if (!options.callingCodeClassifier ||
    typeof options.callingCodeClassifier.getRegionCodesForCountryCode !== 'function') {
    throw new Error('callingCodeClassifier must provide a getRegionCodesForCountryCode function');
  }

  let bufferBytes: number;
  try {
    bufferBytes = parseSizeString(options.bufferSize);
  } catch (error) {
    throw new Error(`Invalid bufferSize: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
  if (bufferBytes <= 0) {
    throw new Error('Invalid bufferSize: must be positive');
  }
};
