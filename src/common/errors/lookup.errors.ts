import { ErrorCode, ErrorSeverity, type IErrorDetails } from "../types/error-handling";

/**
 * Base class for errors raised by the lookup pipeline. Carries the same
 * fields as {@link IErrorDetails} so the exception filter can render it directly.
 */
export abstract class LookupAppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly severity: ErrorSeverity;
  readonly timestamp = Date.now();

  constructor(
    message: string,
    readonly module: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toDetails(context?: Record<string, unknown>): IErrorDetails {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      module: this.module,
      timestamp: this.timestamp,
      context,
    };
  }
}

export type ProviderFailureKind = "network" | "timeout" | "http" | "rate_limit" | "parse" | "empty";

const PROVIDER_ERROR_CODES: Record<ProviderFailureKind, ErrorCode> = {
  network: ErrorCode.PROVIDER_NETWORK_ERROR,
  timeout: ErrorCode.PROVIDER_TIMEOUT,
  http: ErrorCode.PROVIDER_HTTP_ERROR,
  rate_limit: ErrorCode.PROVIDER_RATE_LIMITED,
  parse: ErrorCode.PROVIDER_PARSE_ERROR,
  empty: ErrorCode.PROVIDER_EMPTY_RESPONSE,
};

/**
 * A single translation provider attempt failed. Always recoverable by the chain.
 */
export class ProviderError extends LookupAppError {
  readonly code: ErrorCode;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly status?: number;

  constructor(
    message: string,
    readonly provider: string,
    readonly kind: ProviderFailureKind,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, "translation", { cause: options.cause });
    this.code = PROVIDER_ERROR_CODES[kind];
    this.status = options.status;
  }

  /**
   * Transient failures are worth another attempt against the same provider;
   * a client error or an unusable body will not change on retry.
   */
  get retryable(): boolean {
    if (this.kind === "http") {
      return this.status === undefined || this.status >= 500;
    }
    return this.kind === "network" || this.kind === "timeout" || this.kind === "rate_limit";
  }
}

/**
 * The persisted cache file could not be parsed; the cache starts empty.
 */
export class CacheCorruptionError extends LookupAppError {
  readonly code = ErrorCode.CACHE_CORRUPTED;
  readonly severity = ErrorSeverity.LOW;

  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, "cache", options);
  }
}

/**
 * Caller supplied text that cannot be looked up. Never retried.
 */
export class InputError extends LookupAppError {
  readonly severity = ErrorSeverity.LOW;

  constructor(
    message: string,
    readonly code: ErrorCode = ErrorCode.INVALID_INPUT
  ) {
    super(message, "lookup");
  }
}

/**
 * Static configuration (provider definitions, environment) is unusable.
 */
export class ConfigurationError extends LookupAppError {
  readonly code = ErrorCode.CONFIGURATION_ERROR;
  readonly severity = ErrorSeverity.CRITICAL;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "config", options);
  }
}
