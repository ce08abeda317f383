/**
 * Environment Utilities
 * Typed parsing of environment variables with range checks and defaults
 */

interface NumericOptions {
  min?: number;
  max?: number;
  fieldName?: string;
}

export class EnvironmentUtils {
  /**
   * Parse integer from environment variable with validation
   */
  static parseInt(key: string, defaultValue: number, options: NumericOptions = {}): number {
    const value = process.env[key];
    if (!value) return defaultValue;

    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed)) {
      console.warn(`Invalid integer value "${value}" for ${options.fieldName || key}, using default ${defaultValue}`);
      return defaultValue;
    }

    return EnvironmentUtils.withinRange(key, parsed, defaultValue, options);
  }

  static parseString(key: string, defaultValue: string): string {
    const value = process.env[key];
    return value ? value : defaultValue;
  }

  /**
   * Parse a value that must be one of a fixed set of choices
   */
  static parseChoice<T extends string>(
    key: string,
    defaultValue: T,
    isChoice: (value: string) => value is T
  ): T {
    const value = process.env[key];
    if (!value) return defaultValue;

    const normalized = value.trim().toLowerCase();
    if (isChoice(normalized)) {
      return normalized;
    }

    console.warn(`Unsupported value "${value}" for ${key}, using default ${defaultValue}`);
    return defaultValue;
  }

  private static withinRange(key: string, parsed: number, defaultValue: number, options: NumericOptions): number {
    const fieldName = options.fieldName || key;

    if (options.min !== undefined && parsed < options.min) {
      console.warn(`Value ${parsed} for ${fieldName} is below minimum ${options.min}, using default ${defaultValue}`);
      return defaultValue;
    }

    if (options.max !== undefined && parsed > options.max) {
      console.warn(`Value ${parsed} for ${fieldName} is above maximum ${options.max}, using default ${defaultValue}`);
      return defaultValue;
    }

    return parsed;
  }
}
