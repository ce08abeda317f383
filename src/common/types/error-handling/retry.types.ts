/**
 * Retry policy applied to a single external operation.
 */
export interface RetryConfig {
  /** Retries after the first attempt; total attempts are `maxRetries + 1` */
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  initialDelayMs: 500,
  maxDelayMs: 4000,
  backoffMultiplier: 2,
};

export interface RetryStatistics {
  totalAttempts: number;
  successfulRetries: number;
  failedRetries: number;
  averageRetryTime: number;
  /** Epoch milliseconds of the last completed operation */
  lastRetryTime?: number;
}
