export interface CacheEntry {
  key: string;
  value: string;
  insertedAt: number;
}

export interface CacheStats {
  entryCount: number;
  /** UTF-8 size of the serialized mapping */
  approxSizeBytes: number;
  filePath: string;
  fileExists: boolean;
}

export interface TranslationCacheConfig {
  filePath: string;
}

/**
 * Key-value store of translations keyed by normalized source text.
 */
export interface ITranslationCache {
  get(key: string): string | undefined;
  put(key: string, value: string): Promise<void>;
  loadFromDisk(): Promise<void>;
  flushToDisk(): Promise<void>;
  stats(): CacheStats;
  clear(): Promise<number>;
}
