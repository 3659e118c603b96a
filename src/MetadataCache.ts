import { isNonGeographical } from "./CallingCodeClassifier";
import { CacheStatsManager, MetadataCacheStats } from "./CacheStats";
import { MetadataCacheMap } from "./MetadataCacheMap";
import { MemoryMetadataCacheMap } from "./memory/MemoryMetadataCacheMap";
import { PhoneMetadata } from "./PhoneMetadata";
import { createOptions, MetadataCacheBaseOptions, MetadataCacheOptions, Options } from "./Options";
import { LoadContext, loadMetadataFromFile } from "./ops/loadMetadataFromFile";
import { parseSizeString } from "./utils/CacheSize";
import { MetadataDecoder } from "./MetadataDecoder";
import LibLogger from "./logger";

const logger = LibLogger.get('MetadataCache');

/**
 * Read access to phone metadata by region code or non-geographical calling code.
 */
export interface MetadataSource<R> {
  /**
   * Get the metadata for a region, loading it on first access.
   * Rejects if the region's resource is missing, empty or corrupt.
   */
  getMetadataForRegion(regionCode: string): Promise<R>;

  /**
   * Get the metadata for a non-geographical calling code such as 800.
   * Resolves to null, without loading anything, when the code belongs to one or more
   * geographical regions or is unknown to the classifier.
   */
  getMetadataForNonGeographicalRegion(countryCallingCode: number): Promise<R | null>;
}

/**
 * Cache configuration information
 */
export interface MetadataCacheInfo {
  implementationType: string;
  filePrefix: string;
  bufferSize: number;
  regionCount: number;
  nonGeographicalCount: number;
  estimatedSizeBytes: number;
}

/**
 * A lazily populated, write-once cache of metadata records with one partition for
 * region codes and another for non-geographical calling codes.
 *
 * @template R - The metadata record type
 */
export interface MetadataCache<R> extends MetadataSource<R> {
  /** Records keyed by region code */
  regions: MetadataCacheMap<string, R>;

  /** Records keyed by non-geographical calling code */
  nonGeographicalRegions: MetadataCacheMap<number, R>;

  options: Options<R>;

  statsManager: CacheStatsManager;

  getCacheInfo(): MetadataCacheInfo;

  getStats(): MetadataCacheStats;
}

/**
 * Create a metadata cache. Without a `metadataDecoder` the cache decodes JSON
 * {@link PhoneMetadata} collections.
 */
export function createMetadataCache(
  options: MetadataCacheBaseOptions & { metadataDecoder?: undefined }
): MetadataCache<PhoneMetadata>;
export function createMetadataCache<R>(options: MetadataCacheOptions<R>): MetadataCache<R>;
export function createMetadataCache(
  options: MetadataCacheBaseOptions & { metadataDecoder?: MetadataDecoder<unknown> }
): MetadataCache<unknown> {
  const completeOptions: Options<unknown> = options.metadataDecoder
    ? createOptions({ ...options, metadataDecoder: options.metadataDecoder })
    : createOptions({ ...options, metadataDecoder: undefined });
  logger.debug('createMetadataCache', {
    filePrefix: completeOptions.filePrefix,
    bufferSize: completeOptions.bufferSize
  });

  const regions = new MemoryMetadataCacheMap<string, unknown>();
  const nonGeographicalRegions = new MemoryMetadataCacheMap<number, unknown>();
  const statsManager = new CacheStatsManager();

  const context: LoadContext<unknown> = {
    filePrefix: completeOptions.filePrefix,
    metadataLoader: completeOptions.metadataLoader,
    metadataDecoder: completeOptions.metadataDecoder,
    bufferSize: parseSizeString(completeOptions.bufferSize),
    statsManager
  };

  const getMetadataForRegion = async (regionCode: string): Promise<unknown> => {
    statsManager.incrementRequests();
    const metadata = regions.get(regionCode);
    if (metadata !== null) {
      statsManager.incrementHits();
      return metadata;
    }
    statsManager.incrementMisses();
    return loadMetadataFromFile(regionCode, regions, context);
  };

  const getMetadataForNonGeographicalRegion = async (countryCallingCode: number): Promise<unknown> => {
    statsManager.incrementRequests();
    const metadata = nonGeographicalRegions.get(countryCallingCode);
    if (metadata !== null) {
      statsManager.incrementHits();
      return metadata;
    }
    if (!isNonGeographical(completeOptions.callingCodeClassifier, countryCallingCode)) {
      // The calling code is for a geographical region, or not known at all.
      logger.debug('Calling code is not non-geographical', { countryCallingCode });
      statsManager.incrementAbsent();
      return null;
    }
    statsManager.incrementMisses();
    return loadMetadataFromFile(countryCallingCode, nonGeographicalRegions, context);
  };

  return {
    regions,
    nonGeographicalRegions,
    options: completeOptions,
    statsManager,
    getMetadataForRegion,
    getMetadataForNonGeographicalRegion,
    getCacheInfo: (): MetadataCacheInfo => ({
      implementationType: regions.implementationType,
      filePrefix: context.filePrefix,
      bufferSize: context.bufferSize,
      regionCount: regions.size(),
      nonGeographicalCount: nonGeographicalRegions.size(),
      estimatedSizeBytes: regions.getEstimatedSizeBytes() + nonGeographicalRegions.getEstimatedSizeBytes()
    }),
    getStats: () => statsManager.getStats()
  };
}

export const isMetadataCache = (value: unknown): value is MetadataCache<unknown> =>
  value !== null &&
  typeof value === 'object' &&
  'regions' in value &&
  'nonGeographicalRegions' in value &&
  'getMetadataForRegion' in value &&
  'getMetadataForNonGeographicalRegion' in value;
