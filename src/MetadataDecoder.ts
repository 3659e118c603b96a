import { z } from 'zod';
import { PhoneMetadata, phoneMetadataSchema } from './PhoneMetadata';

/**
 * Turns the bytes of one resource into its ordered collection of records.
 * Implementations throw when the bytes are not a valid collection.
 */
export interface MetadataDecoder<R> {
  decode(bytes: Uint8Array): R[];
}

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};

/**
 * Create a decoder for UTF-8 JSON collections of the form `{ "metadata": [ ... ] }`.
 * Every record is validated against `recordSchema` and frozen before it is returned.
 */
export const createJsonMetadataDecoder = <T>(
  recordSchema: z.ZodType<T, z.ZodTypeDef, unknown>
): MetadataDecoder<T> => {
  const collectionSchema = z.object({
    metadata: z.array(recordSchema)
  });
  const textDecoder = new TextDecoder('utf-8', { fatal: true });

  return {
    decode: (bytes: Uint8Array): T[] => {
      const json: unknown = JSON.parse(textDecoder.decode(bytes));
      const collection = collectionSchema.parse(json);
      return collection.metadata.map(record => deepFreeze(record));
    }
  };
};

export const phoneMetadataDecoder: MetadataDecoder<PhoneMetadata> =
  createJsonMetadataDecoder(phoneMetadataSchema);
