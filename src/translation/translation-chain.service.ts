import { Inject, Injectable, OnModuleInit, Optional } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { InputError, ProviderError } from "@/common/errors";
import { TRANSLATION_SOURCE, type TranslateOptions, type TranslationOutcome } from "@/common/types/translation";
import { asError } from "@/common/utils/error.utils";
import { sleepFor } from "@/common/utils/common.utils";
import { ENV } from "@/config/environment.constants";
import { TranslationCacheService } from "@/cache/translation-cache.service";
import { RetryService } from "@/error-handling/retry.service";
import { TranslationProviderRegistry } from "./providers/translation-provider.registry";

export const TRANSLATION_CHAIN_CONFIG = "TRANSLATION_CHAIN_CONFIG";

export interface TranslationChainConfig {
  sourceLang: string;
  targetLang: string;
  /** Minimum spacing between outbound provider requests; 0 disables throttling */
  minRequestIntervalMs: number;
  /** Upper bound for the backoff delay between retries of one provider */
  maxRetryDelayMs: number;
}

/**
 * Cache-first translation through an ordered chain of providers. Never throws
 * for provider failures; exhaustion yields an empty translation tagged "none".
 */
@Injectable()
export class TranslationChainService extends BaseService implements OnModuleInit {
  private readonly config: TranslationChainConfig;
  private nextRequestAt = 0;

  constructor(
    private readonly cache: TranslationCacheService,
    private readonly retryService: RetryService,
    private readonly registry: TranslationProviderRegistry,
    @Optional() @Inject(TRANSLATION_CHAIN_CONFIG) config?: Partial<TranslationChainConfig>
  ) {
    super();
    this.config = {
      sourceLang: ENV.TRANSLATION.SOURCE_LANG,
      targetLang: ENV.TRANSLATION.TARGET_LANG,
      minRequestIntervalMs: ENV.TRANSLATION.MIN_REQUEST_INTERVAL_MS,
      maxRetryDelayMs: ENV.TRANSLATION.MAX_RETRY_DELAY_MS,
      ...config,
    };
  }

  onModuleInit(): void {
    const names = this.getProviderNames();
    if (names.length === 0) {
      this.logWarning("No translation providers are enabled; lookups will return romanization only");
      return;
    }
    this.logInitialization(`Translation chain ${this.config.sourceLang} → ${this.config.targetLang}: ${names.join(" → ")}`);
  }

  getProviderNames(): string[] {
    return this.registry.getProviderNames();
  }

  async translateWithFallback(text: string, options: TranslateOptions = {}): Promise<TranslationOutcome> {
    const key = TranslationCacheService.normalizeKey(text);
    if (!key) {
      throw new InputError("Text to translate must not be empty");
    }

    if (!options.bypassCache) {
      const cached = this.cache.get(key);
      if (cached !== undefined) {
        this.logDebug(`Cache hit for "${key}"`, "translateWithFallback");
        return { translation: cached, source: TRANSLATION_SOURCE.CACHE };
      }
    }

    const failures: string[] = [];

    for (const provider of this.registry.getActiveProviders()) {
      const startTime = Date.now();
      try {
        const translation = await this.retryService.executeWithRetry(
          async () => {
            await this.throttle();
            return provider.translate(key, this.config.sourceLang, this.config.targetLang);
          },
          {
            serviceId: provider.name,
            operationName: "translate",
            retryConfig: {
              maxRetries: provider.retryPolicy.maxRetries,
              initialDelayMs: provider.retryPolicy.retryDelayMs,
              backoffMultiplier: provider.retryPolicy.backoffMultiplier,
              maxDelayMs: this.config.maxRetryDelayMs,
            },
            shouldRetry: error => !(error instanceof ProviderError) || error.retryable,
          }
        );

        await this.cache.put(key, translation);
        this.logPerformance(`Translation via ${provider.name}`, Date.now() - startTime);
        return { translation, source: provider.name };
      } catch (error) {
        const err = asError(error);
        failures.push(err.message);
        this.logWarning(`Provider ${provider.name} failed: ${err.message}`, "translateWithFallback");
      }
    }

    const reason =
      failures.length > 0
        ? `All translation providers failed (${failures.join("; ")})`
        : "No translation providers are enabled";
    this.logWarning(`${reason} for "${key}"`, "translateWithFallback");

    return { translation: "", source: TRANSLATION_SOURCE.NONE, error: reason };
  }

  /**
   * Reserve the next outbound request slot, waiting until it opens
   */
  private async throttle(): Promise<void> {
    const interval = this.config.minRequestIntervalMs;
    if (interval <= 0) {
      return;
    }

    const now = Date.now();
    const slot = Math.max(now, this.nextRequestAt);
    this.nextRequestAt = slot + interval;

    if (slot > now) {
      await sleepFor(slot - now);
    }
  }
}
