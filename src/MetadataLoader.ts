import { open } from 'node:fs/promises';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { MULTI_FILE_BUFFER_SIZE } from './utils/ResourceInput';
import LibLogger from './logger';

const logger = LibLogger.get('MetadataLoader');

/**
 * Supplies the bytes of a named metadata resource.
 *
 * Returning `null` signals that no resource exists under the name. Any other failure to
 * open the resource is thrown (or rejected) and reaches callers of the cache as a
 * `CorruptResourceError` carrying it as `cause`. A returned stream is owned by the caller
 * from then on, which is responsible for closing it.
 */
export interface MetadataLoader {
  loadMetadata(resourceName: string): Readable | null | Promise<Readable | null>;
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

/**
 * Loads resources from files named after the resource under a base directory.
 */
export class FileMetadataLoader implements MetadataLoader {
  private readonly baseDir: string;

  public constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  public async loadMetadata(resourceName: string): Promise<Readable | null> {
    const filePath = path.join(this.baseDir, resourceName);
    logger.default('loadMetadata', { resourceName, filePath });
    try {
      const handle = await open(filePath, 'r');
      return handle.createReadStream({ highWaterMark: MULTI_FILE_BUFFER_SIZE });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        logger.debug('Metadata file not found', { resourceName, filePath });
        return null;
      }
      throw error;
    }
  }
}

/**
 * Create a loader that serves resources from memory, for bundled data and tests.
 */
export const createMemoryMetadataLoader = (
  resources: Record<string, Uint8Array | string>
): MetadataLoader => {
  const entries = new Map(Object.entries(resources));
  return {
    loadMetadata: (resourceName: string): Readable | null => {
      const data = entries.get(resourceName);
      if (typeof data === 'undefined') {
        return null;
      }
      const bytes = typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
      return Readable.from([bytes]);
    }
  };
};
