/**
 * Environment Constants - Centralized Environment Variable Management
 */

import { EnvironmentUtils } from "@/common/utils/environment.utils";
import { isLogLevel, type LogLevel } from "@/common/types/logging";

// Environment Helpers
export const ENV_HELPERS = {
  isTest: (): boolean => ENV.APPLICATION.NODE_ENV === "test",
  isDevelopment: (): boolean => ENV.APPLICATION.NODE_ENV === "development",
  isProduction: (): boolean => ENV.APPLICATION.NODE_ENV === "production",
};

export const ENV = {
  // Application Settings
  APPLICATION: {
    NODE_ENV: EnvironmentUtils.parseString("NODE_ENV", "production"),
    HOST: EnvironmentUtils.parseString("APP_HOST", "127.0.0.1"),
    PORT: EnvironmentUtils.parseInt("APP_PORT", 7860, {
      min: 1,
      max: 65535,
      fieldName: "APP_PORT",
    }),
    BASE_PATH: EnvironmentUtils.parseString("APP_BASE_PATH", ""),
  },

  // Logging Configuration
  LOGGING: {
    LOG_LEVEL: EnvironmentUtils.parseChoice<LogLevel>("LOG_LEVEL", "log", isLogLevel),
  },

  // Translation Cache
  CACHE: {
    FILE_PATH: EnvironmentUtils.parseString("TRANSLATION_CACHE_FILE", "data/translation_cache.json"),
  },

  // Translation provider chain and lookup orchestration
  TRANSLATION: {
    PROVIDERS_FILE: EnvironmentUtils.parseString("TRANSLATION_PROVIDERS_FILE", "config/providers.json"),
    SOURCE_LANG: EnvironmentUtils.parseString("TRANSLATION_SOURCE_LANG", "zh"),
    TARGET_LANG: EnvironmentUtils.parseString("TRANSLATION_TARGET_LANG", "vi"),
    MIN_REQUEST_INTERVAL_MS: EnvironmentUtils.parseInt("TRANSLATION_MIN_REQUEST_INTERVAL_MS", 500, {
      min: 0,
      max: 10000,
    }),
    MAX_RETRY_DELAY_MS: EnvironmentUtils.parseInt("TRANSLATION_MAX_RETRY_DELAY_MS", 4000, { min: 0, max: 30000 }),
    BATCH_CONCURRENCY: EnvironmentUtils.parseInt("TRANSLATION_BATCH_CONCURRENCY", 2, { min: 1, max: 16 }),
    MAX_BATCH_SIZE: EnvironmentUtils.parseInt("TRANSLATION_MAX_BATCH_SIZE", 100, { min: 1, max: 1000 }),
  },

  TIMEOUTS: {
    GRACEFUL_SHUTDOWN_MS: EnvironmentUtils.parseInt("GRACEFUL_SHUTDOWN_TIMEOUT_MS", 10000, { min: 1000, max: 60000 }),
  },
};
