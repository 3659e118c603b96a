/**
 * Key types a metadata partition can be indexed by: region codes or calling codes.
 */
export type MetadataKey = string | number;

/**
 * Bookkeeping kept alongside each stored record.
 */
export interface MetadataEntryInfo<K extends MetadataKey> {
  key: K;
  addedAt: number;
  estimatedSize: number;
}

/**
 * Abstract base for the write-once maps backing each metadata partition.
 *
 * Entries are never replaced or removed once stored. The only mutation is
 * {@link MetadataCacheMap.putIfAbsent}, which must complete without yielding to the
 * event loop so that two lookups racing on the same key agree on one value.
 *
 * @template K - The key type of the partition
 * @template V - The metadata record type
 */
export abstract class MetadataCacheMap<K extends MetadataKey, V> {
  /**
   * The implementation type identifier in the format "<category>/<implementation>"
   */
  public abstract readonly implementationType: string;

  /**
   * Retrieve the record stored for a key
   */
  public abstract get(key: K): V | null;

  /**
   * Store a record unless one is already present, returning whichever record is stored
   * for the key afterwards
   */
  public abstract putIfAbsent(key: K, value: V): V;

  public abstract includesKey(key: K): boolean;

  public abstract keys(): K[];

  public abstract values(): V[];

  public abstract size(): number;

  /**
   * Get bookkeeping for a stored key
   * @returns Info if the key is stored, null otherwise
   */
  public abstract getEntryInfo(key: K): MetadataEntryInfo<K> | null;

  /**
   * Sum of the estimated sizes of all stored records
   */
  public abstract getEstimatedSizeBytes(): number;
}
