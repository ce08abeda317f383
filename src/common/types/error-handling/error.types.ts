/**
 * Defines the severity levels for errors, allowing for prioritized handling.
 */
export enum ErrorSeverity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  CRITICAL = "critical",
}

/**
 * Common error codes used across the application
 */
export enum ErrorCode {
  // Generic errors
  VALIDATION_ERROR = "VALIDATION_ERROR",
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",

  // HTTP errors
  NOT_FOUND = "NOT_FOUND",
  HTTP_ERROR = "HTTP_ERROR",

  // Input errors
  INVALID_INPUT = "INVALID_INPUT",
  BATCH_TOO_LARGE = "BATCH_TOO_LARGE",

  // Provider errors
  PROVIDER_NETWORK_ERROR = "PROVIDER_NETWORK_ERROR",
  PROVIDER_TIMEOUT = "PROVIDER_TIMEOUT",
  PROVIDER_HTTP_ERROR = "PROVIDER_HTTP_ERROR",
  PROVIDER_RATE_LIMITED = "PROVIDER_RATE_LIMITED",
  PROVIDER_PARSE_ERROR = "PROVIDER_PARSE_ERROR",
  PROVIDER_EMPTY_RESPONSE = "PROVIDER_EMPTY_RESPONSE",

  // Cache errors
  CACHE_CORRUPTED = "CACHE_CORRUPTED",
}

/**
 * Base interface for all error details.
 */
export interface IErrorDetails {
  /**
   * Machine-readable error code
   */
  code: ErrorCode;

  /**
   * Human-readable error message
   */
  message: string;

  severity: ErrorSeverity;

  /**
   * Optional module name where the error originated
   */
  module?: string;

  timestamp?: number;

  context?: Record<string, unknown>;
}

/**
 * Standardized error response for APIs.
 */
export interface StandardErrorResponse {
  success: false;
  error: IErrorDetails;
  timestamp: number;
  requestId: string;
}
