import { MetadataCacheMap, MetadataEntryInfo, MetadataKey } from "../MetadataCacheMap";
import { estimateValueSize } from "../utils/CacheSize";
import LibLogger from "../logger";

const logger = LibLogger.get("MemoryMetadataCacheMap");

interface DictionaryEntry<K extends MetadataKey, V> {
  info: MetadataEntryInfo<K>;
  value: V;
}

/**
 * In-memory implementation of MetadataCacheMap backed by a Map.
 * Records live for as long as the owning cache does.
 */
export class MemoryMetadataCacheMap<K extends MetadataKey, V> extends MetadataCacheMap<K, V> {

  public readonly implementationType = "memory/write-once";

  private map: Map<K, DictionaryEntry<K, V>> = new Map();

  public get(key: K): V | null {
    logger.trace('get', { key });
    const entry = this.map.get(key);
    return entry ? entry.value : null;
  }

  public putIfAbsent(key: K, value: V): V {
    const existing = this.map.get(key);
    if (existing) {
      logger.debug('putIfAbsent kept existing value', { key });
      return existing.value;
    }

    this.map.set(key, {
      value,
      info: {
        key,
        addedAt: Date.now(),
        estimatedSize: estimateValueSize(value)
      }
    });
    logger.trace('putIfAbsent stored value', { key });
    return value;
  }

  public includesKey(key: K): boolean {
    return this.map.has(key);
  }

  public keys(): K[] {
    return Array.from(this.map.keys());
  }

  public values(): V[] {
    return Array.from(this.map.values(), entry => entry.value);
  }

  public size(): number {
    return this.map.size;
  }

  public getEntryInfo(key: K): MetadataEntryInfo<K> | null {
    const entry = this.map.get(key);
    return entry ? { ...entry.info } : null;
  }

  public getEstimatedSizeBytes(): number {
    let total = 0;
    for (const entry of this.map.values()) {
      total += entry.info.estimatedSize;
    }
    return total;
  }
}
