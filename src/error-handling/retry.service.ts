import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { asError } from "@/common/utils/error.utils";
import { sleepFor } from "@/common/utils/common.utils";
import { DEFAULT_RETRY_CONFIG, type RetryConfig, type RetryStatistics } from "@/common/types/error-handling";

export interface RetryContext {
  serviceId: string;
  operationName: string;
  retryConfig?: Partial<RetryConfig>;
  /** Return false to stop retrying after a failure that cannot improve */
  shouldRetry?: (error: Error, attempt: number) => boolean;
}

/**
 * Retry service with exponential backoff for external calls
 */
@Injectable()
export class RetryService extends BaseService {
  private readonly retryStats = new Map<string, RetryStatistics>();

  /**
   * Execute operation, retrying failed attempts with exponential backoff.
   * Rejects with the last error once attempts are exhausted.
   */
  async executeWithRetry<T>(operation: () => Promise<T>, context: RetryContext): Promise<T> {
    const { serviceId, operationName, shouldRetry } = context;
    const config = this.resolveConfig(context.retryConfig);
    const totalAttempts = config.maxRetries + 1;
    const startTime = Date.now();

    let delayMs = config.initialDelayMs;

    for (let attempt = 1; ; attempt++) {
      try {
        this.logDebug(`Executing ${operationName} (attempt ${attempt}/${totalAttempts})`, serviceId);
        const result = await operation();
        this.recordRetrySuccess(serviceId, attempt, Date.now() - startTime);
        return result;
      } catch (error) {
        const lastError = asError(error);
        const canRetry = attempt < totalAttempts && (shouldRetry ? shouldRetry(lastError, attempt) : true);

        if (!canRetry) {
          this.recordRetryFailure(serviceId, attempt, Date.now() - startTime);
          throw lastError;
        }

        this.logWarning(
          `Attempt ${attempt}/${totalAttempts} of ${operationName} failed: ${lastError.message}. Retrying in ${delayMs}ms...`,
          serviceId
        );

        if (delayMs > 0) {
          await sleepFor(delayMs);
        }
        delayMs = Math.min(delayMs * config.backoffMultiplier, config.maxDelayMs);
      }
    }
  }

  /**
   * Outcome counts per service id since startup
   */
  getRetryStatistics(): Record<string, RetryStatistics> {
    const statistics: Record<string, RetryStatistics> = {};
    for (const [serviceId, stats] of this.retryStats) {
      statistics[serviceId] = { ...stats };
    }
    return statistics;
  }

  private resolveConfig(override?: Partial<RetryConfig>): RetryConfig {
    const config = { ...DEFAULT_RETRY_CONFIG, ...override };
    return {
      maxRetries: Math.max(0, Math.floor(config.maxRetries)),
      initialDelayMs: Math.max(0, config.initialDelayMs),
      maxDelayMs: Math.max(0, config.maxDelayMs),
      backoffMultiplier: Math.max(1, config.backoffMultiplier),
    };
  }

  private getOrCreateStats(serviceId: string): RetryStatistics {
    let stats = this.retryStats.get(serviceId);
    if (!stats) {
      stats = {
        totalAttempts: 0,
        successfulRetries: 0,
        failedRetries: 0,
        averageRetryTime: 0,
      };
      this.retryStats.set(serviceId, stats);
    }
    return stats;
  }

  private recordRetrySuccess(serviceId: string, attemptCount: number, totalTime: number): void {
    const stats = this.getOrCreateStats(serviceId);

    stats.totalAttempts += attemptCount;
    stats.successfulRetries++;
    stats.lastRetryTime = Date.now();

    const totalRetryTime = stats.averageRetryTime * (stats.successfulRetries - 1) + totalTime;
    stats.averageRetryTime = totalRetryTime / stats.successfulRetries;
  }

  private recordRetryFailure(serviceId: string, attemptCount: number, totalTime: number): void {
    const stats = this.getOrCreateStats(serviceId);

    stats.totalAttempts += attemptCount;
    stats.failedRetries++;
    stats.lastRetryTime = Date.now();

    this.logPerformance(`${serviceId} exhausted after ${attemptCount} attempt(s)`, totalTime);
  }
}
