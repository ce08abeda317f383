import { Inject, Injectable, Optional } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { InputError } from "@/common/errors";
import { ErrorCode } from "@/common/types/error-handling";
import {
  TRANSLATION_SOURCE,
  type CharacterAnalysis,
  type LookupOptions,
  type LookupResult,
  type TranslationOutcome,
} from "@/common/types/translation";
import { mapWithConcurrency } from "@/common/utils/async.utils";
import { asError } from "@/common/utils/error.utils";
import { ENV } from "@/config/environment.constants";
import { RomanizationService } from "@/romanization/romanization.service";
import { TranslationChainService } from "@/translation/translation-chain.service";

export const LOOKUP_CONFIG = "LOOKUP_CONFIG";

export interface LookupConfig {
  batchConcurrency: number;
  maxBatchSize: number;
}

/**
 * Combines romanization and translation into one lookup result
 */
@Injectable()
export class LookupService extends BaseService {
  private readonly config: LookupConfig;

  constructor(
    private readonly romanization: RomanizationService,
    private readonly translationChain: TranslationChainService,
    @Optional() @Inject(LOOKUP_CONFIG) config?: Partial<LookupConfig>
  ) {
    super();
    this.config = {
      batchConcurrency: ENV.TRANSLATION.BATCH_CONCURRENCY,
      maxBatchSize: ENV.TRANSLATION.MAX_BATCH_SIZE,
      ...config,
    };
  }

  get maxBatchSize(): number {
    return this.config.maxBatchSize;
  }

  /**
   * Romanization and translation run independently; a failure in one is
   * recorded in `error` and leaves the other populated.
   */
  async lookup(text: string, options: LookupOptions = {}): Promise<LookupResult> {
    const sourceText = text.trim();
    if (!sourceText) {
      throw new InputError("Text to look up must not be empty");
    }

    const includeTones = typeof options.includeTones === "boolean" ? options.includeTones : true;

    const [romanized, translated] = await Promise.allSettled([
      Promise.resolve().then(() => this.romanization.romanize(sourceText, includeTones)),
      this.translationChain.translateWithFallback(sourceText, { bypassCache: options.bypassCache === true }),
    ]);

    const errors: string[] = [];

    let romanization = "";
    if (romanized.status === "fulfilled") {
      romanization = romanized.value;
    } else {
      const error = asError(romanized.reason);
      this.logError(error, "lookup.romanize");
      errors.push(`Romanization failed: ${error.message}`);
    }

    let translation: TranslationOutcome;
    if (translated.status === "fulfilled") {
      translation = translated.value;
    } else {
      const error = asError(translated.reason);
      this.logError(error, "lookup.translate");
      translation = { translation: "", source: TRANSLATION_SOURCE.NONE, error: `Translation failed: ${error.message}` };
    }
    if (translation.error) {
      errors.push(translation.error);
    }

    let analysis: CharacterAnalysis | null = null;
    if (options.detailedAnalysis) {
      analysis = this.romanization.analyzeCharacter(sourceText);
    }

    return Object.freeze({
      sourceText,
      romanization,
      translation: translation.translation,
      translationSource: translation.source,
      ...(errors.length > 0 ? { error: errors.join("; ") } : {}),
      ...(analysis ? { analysis: Object.freeze(analysis) } : {}),
    });
  }

  /**
   * One result per input in input order. Items that fail on their own yield a
   * "none" result instead of aborting the batch.
   */
  async lookupBatch(texts: readonly string[], options: LookupOptions = {}): Promise<LookupResult[]> {
    if (texts.length > this.config.maxBatchSize) {
      throw new InputError(
        `Batch of ${texts.length} items exceeds the limit of ${this.config.maxBatchSize}`,
        ErrorCode.BATCH_TOO_LARGE
      );
    }

    const startTime = Date.now();
    const results = await mapWithConcurrency(
      texts,
      async text => {
        try {
          return await this.lookup(text, options);
        } catch (error) {
          return this.failedResult(text, asError(error));
        }
      },
      this.config.batchConcurrency
    );

    this.logPerformance(`Batch lookup of ${texts.length} items`, Date.now() - startTime, 10000);
    return results;
  }

  /**
   * Split multi-line input into trimmed, non-blank entries
   */
  parseBatchInput(raw: string): string[] {
    return raw
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line.length > 0);
  }

  private failedResult(text: string, error: Error): LookupResult {
    if (!(error instanceof InputError)) {
      this.logError(error, "lookupBatch");
    }
    return Object.freeze({
      sourceText: text,
      romanization: "",
      translation: "",
      translationSource: TRANSLATION_SOURCE.NONE,
      error: error.message,
    });
  }
}
