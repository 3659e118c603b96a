import type { Readable } from 'node:stream';
import LibLogger from '../logger';

const logger = LibLogger.get('ResourceInput');

/**
 * Size of the buffer used to read in one metadata resource.
 */
export const MULTI_FILE_BUFFER_SIZE = 16 * 1024;

const toBytes = (chunk: unknown): Uint8Array => {
  if (chunk instanceof Uint8Array) {
    return chunk;
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8');
  }
  throw new TypeError(`Unexpected chunk type from metadata stream: ${typeof chunk}`);
};

/**
 * Accumulates stream chunks into a single buffer, doubling its capacity as needed.
 */
class GrowableBuffer {
  private buffer: Buffer;
  private length = 0;

  public constructor(initialSize: number) {
    this.buffer = Buffer.allocUnsafe(initialSize);
  }

  public append(bytes: Uint8Array): void {
    const required = this.length + bytes.length;
    if (required > this.buffer.length) {
      let capacity = Math.max(this.buffer.length, 1);
      while (capacity < required) {
        capacity *= 2;
      }
      const grown = Buffer.allocUnsafe(capacity);
      this.buffer.copy(grown, 0, 0, this.length);
      this.buffer = grown;
    }
    this.buffer.set(bytes, this.length);
    this.length = required;
  }

  public toBuffer(): Buffer {
    return this.buffer.subarray(0, this.length);
  }
}

/**
 * Read the whole of a resource stream into memory.
 * Rejects with the stream's own error if reading fails, and with `ERR_STREAM_PREMATURE_CLOSE`
 * if the stream is destroyed before it ends.
 */
export const readFully = async (
  source: Readable,
  bufferSize: number = MULTI_FILE_BUFFER_SIZE
): Promise<Buffer> => {
  const buffer = new GrowableBuffer(bufferSize);
  for await (const chunk of source) {
    buffer.append(toBytes(chunk));
  }
  return buffer.toBuffer();
};

/**
 * Release a resource stream. Errors raised while closing are logged and never thrown,
 * so they cannot replace the outcome of the load that owned the stream.
 */
export const closeInput = (source: Readable, resourceName: string): void => {
  // Stays attached: a failing destroy reports its error asynchronously.
  source.on('error', (error: Error) => {
    logger.warning('error closing input stream (ignored)', { resourceName, error });
  });
  if (source.destroyed) {
    return;
  }
  try {
    source.destroy();
  } catch (error) {
    logger.warning('error closing input stream (ignored)', { resourceName, error });
  }
};
