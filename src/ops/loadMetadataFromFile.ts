import type { Readable } from "node:stream";
import { CacheStatsManager } from "../CacheStats";
import { CorruptResourceError, EmptyResourceError, MissingResourceError } from "../errors";
import { MetadataCacheMap, MetadataKey } from "../MetadataCacheMap";
import { MetadataDecoder } from "../MetadataDecoder";
import { MetadataLoader } from "../MetadataLoader";
import { closeInput, readFully } from "../utils/ResourceInput";
import LibLogger from "../logger";

const logger = LibLogger.get('loadMetadataFromFile');

export interface LoadContext<R> {
  filePrefix: string;
  metadataLoader: MetadataLoader;
  metadataDecoder: MetadataDecoder<R>;
  bufferSize: number;
  statsManager: CacheStatsManager;
}

/**
 * Name of the resource holding the metadata for a key.
 */
export const resourceNameFor = (filePrefix: string, key: MetadataKey): string =>
  `${filePrefix}_${key}`;

const decodeAndCloseInput = async <R>(
  resourceName: string,
  context: LoadContext<R>,
  source: Readable
): Promise<R[]> => {
  try {
    const bytes = await readFully(source, context.bufferSize);
    return context.metadataDecoder.decode(bytes);
  } catch (error) {
    logger.error('cannot load/parse metadata', { resourceName, error });
    throw new CorruptResourceError(resourceName, error);
  } finally {
    closeInput(source, resourceName);
  }
};

/**
 * Load the record for `key` and store it in `cacheMap` unless another lookup got there
 * first. Resolves to whichever record is stored for the key afterwards.
 *
 * Nothing is held while the resource is read and decoded; concurrent misses on the same
 * key each load independently and converge at {@link MetadataCacheMap.putIfAbsent}.
 */
export const loadMetadataFromFile = async <K extends MetadataKey, R>(
  key: K,
  cacheMap: MetadataCacheMap<K, R>,
  context: LoadContext<R>
): Promise<R> => {
  const resourceName = resourceNameFor(context.filePrefix, key);
  logger.default('loadMetadataFromFile', { key, resourceName });

  let source: Readable | null;
  try {
    source = await context.metadataLoader.loadMetadata(resourceName);
  } catch (error) {
    logger.error('cannot open metadata', { key, resourceName, error });
    throw new CorruptResourceError(resourceName, error);
  }
  if (source === null) {
    logger.error('missing metadata', { key, resourceName });
    throw new MissingResourceError(resourceName);
  }

  const metadataList = await decodeAndCloseInput(resourceName, context, source);
  if (metadataList.length === 0) {
    logger.error('empty metadata', { key, resourceName });
    throw new EmptyResourceError(resourceName);
  }
  if (metadataList.length > 1) {
    logger.warning(`invalid metadata (too many entries): ${resourceName}`, {
      key,
      resourceName,
      entries: metadataList.length
    });
  }
  context.statsManager.incrementLoads();

  const metadata = metadataList[0];
  const stored = cacheMap.putIfAbsent(key, metadata);
  if (stored !== metadata) {
    logger.debug('Discarding metadata loaded by a lookup that lost the race', { key, resourceName });
    context.statsManager.incrementRacesLost();
  }
  return stored;
};
