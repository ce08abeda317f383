import { promises as fs, existsSync } from "fs";
import { dirname, basename, join, resolve } from "path";
import { Inject, Injectable, OnModuleDestroy, OnModuleInit, Optional } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { CacheCorruptionError } from "@/common/errors";
import { asError } from "@/common/utils/error.utils";
import type { CacheEntry, CacheStats, ITranslationCache, TranslationCacheConfig } from "@/common/types/cache";
import { ENV } from "@/config/environment.constants";

export const TRANSLATION_CACHE_CONFIG = "TRANSLATION_CACHE_CONFIG";

/**
 * Translation cache backed by a single JSON document mapping normalized
 * source text to its translation.
 *
 * Reads are served from memory. Every mutation is followed by a full
 * rewrite of the file through a temp file and a rename, and rewrites are
 * queued so that only one is in flight at a time. If persisting fails the
 * in-memory mapping remains authoritative for the rest of the process.
 */
@Injectable()
export class TranslationCacheService extends BaseService implements ITranslationCache, OnModuleInit, OnModuleDestroy {
  private readonly entriesByKey = new Map<string, CacheEntry>();
  private readonly config: TranslationCacheConfig;
  private writeQueue: Promise<void> = Promise.resolve();
  private pendingWrites = 0;

  constructor(@Optional() @Inject(TRANSLATION_CACHE_CONFIG) config?: Partial<TranslationCacheConfig>) {
    super();
    this.config = {
      filePath: resolve(process.cwd(), config?.filePath ?? ENV.CACHE.FILE_PATH),
    };
  }

  async onModuleInit(): Promise<void> {
    await this.loadFromDisk();
  }

  async onModuleDestroy(): Promise<void> {
    if (this.pendingWrites > 0) {
      this.logShutdown(`Waiting for ${this.pendingWrites} pending cache write(s)`);
    }
    await this.writeQueue;
  }

  static normalizeKey(key: string): string {
    return key.trim();
  }

  get filePath(): string {
    return this.config.filePath;
  }

  get(key: string): string | undefined {
    return this.entriesByKey.get(TranslationCacheService.normalizeKey(key))?.value;
  }

  async put(key: string, value: string): Promise<void> {
    const normalized = TranslationCacheService.normalizeKey(key);
    this.entriesByKey.set(normalized, { key: normalized, value, insertedAt: Date.now() });
    await this.flushToDisk();
  }

  entries(): CacheEntry[] {
    return Array.from(this.entriesByKey.values(), entry => ({ ...entry }));
  }

  async loadFromDisk(): Promise<void> {
    this.entriesByKey.clear();

    let raw: string;
    let loadedAt: number;
    try {
      raw = await fs.readFile(this.config.filePath, "utf8");
      loadedAt = (await fs.stat(this.config.filePath)).mtimeMs;
    } catch (error) {
      if (isMissingFileError(error)) {
        this.logger.log(`No translation cache at ${this.config.filePath}, starting empty`);
      } else {
        this.logError(asError(error), "loadFromDisk");
      }
      return;
    }

    try {
      const mapping = this.parseDocument(raw);
      for (const [key, value] of Object.entries(mapping)) {
        const normalized = TranslationCacheService.normalizeKey(key);
        this.entriesByKey.set(normalized, { key: normalized, value, insertedAt: loadedAt });
      }
      this.logger.log(`Loaded ${this.entriesByKey.size} cached translations`);
    } catch (error) {
      const corruption =
        error instanceof CacheCorruptionError
          ? error
          : new CacheCorruptionError(asError(error).message, this.config.filePath, { cause: error });
      this.logWarning(`${corruption.message}; starting with an empty cache`, "loadFromDisk", {
        filePath: this.config.filePath,
      });
      this.entriesByKey.clear();
    }
  }

  flushToDisk(): Promise<void> {
    this.pendingWrites++;
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.writeSnapshot();
      } catch (error) {
        this.logError(asError(error), "flushToDisk", { filePath: this.config.filePath });
      } finally {
        this.pendingWrites--;
      }
    });
    return this.writeQueue;
  }

  stats(): CacheStats {
    return {
      entryCount: this.entriesByKey.size,
      approxSizeBytes: Buffer.byteLength(this.serialize(), "utf8"),
      filePath: this.config.filePath,
      fileExists: existsSync(this.config.filePath),
    };
  }

  async clear(): Promise<number> {
    const removed = this.entriesByKey.size;
    if (removed === 0) {
      return 0;
    }

    this.entriesByKey.clear();
    await this.flushToDisk();
    this.logger.log(`Cleared ${removed} cached translations`);
    return removed;
  }

  private serialize(): string {
    const sorted: Record<string, string> = {};
    for (const key of Array.from(this.entriesByKey.keys()).sort()) {
      const entry = this.entriesByKey.get(key);
      if (entry) sorted[key] = entry.value;
    }
    return `${JSON.stringify(sorted, null, 2)}\n`;
  }

  private async writeSnapshot(): Promise<void> {
    const target = this.config.filePath;
    const directory = dirname(target);
    const tempFile = join(directory, `.${basename(target)}.${process.pid}.tmp`);

    await fs.mkdir(directory, { recursive: true });
    await fs.writeFile(tempFile, this.serialize(), "utf8");
    try {
      await fs.rename(tempFile, target);
    } catch (error) {
      await fs.rm(tempFile, { force: true });
      throw error;
    }
    this.logDebug(`Cache persisted (${this.entriesByKey.size} entries)`, "flushToDisk");
  }

  private parseDocument(raw: string): Record<string, string> {
    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new CacheCorruptionError(`Cache file is not valid JSON: ${asError(error).message}`, this.config.filePath, {
        cause: error,
      });
    }

    if (typeof document !== "object" || document === null || Array.isArray(document)) {
      throw new CacheCorruptionError("Cache file must contain a JSON object", this.config.filePath);
    }

    const mapping: Record<string, string> = {};
    for (const [key, value] of Object.entries(document)) {
      if (typeof value !== "string") {
        throw new CacheCorruptionError(`Cache entry "${key}" is not a string`, this.config.filePath);
      }
      mapping[key] = value;
    }
    return mapping;
  }
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
