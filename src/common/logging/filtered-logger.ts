import { Logger } from "@nestjs/common";
import { shouldLog, type LogLevel } from "../types/logging";
import { ENV } from "@/config/environment.constants";

/**
 * A NestJS Logger that drops messages below the configured LOG_LEVEL.
 * Used for bootstrap logging before the application logger is in place.
 */
export class FilteredLogger extends Logger {
  constructor(
    context: string,
    private readonly currentLogLevel: LogLevel = ENV.LOGGING.LOG_LEVEL
  ) {
    super(context);
  }

  isEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.currentLogLevel);
  }

  override log(message: unknown, ...optionalParams: unknown[]): void {
    if (this.isEnabled("log")) {
      super.log(message, ...optionalParams);
    }
  }

  override error(message: unknown, ...optionalParams: unknown[]): void {
    if (this.isEnabled("error")) {
      super.error(message, ...optionalParams);
    }
  }

  override warn(message: unknown, ...optionalParams: unknown[]): void {
    if (this.isEnabled("warn")) {
      super.warn(message, ...optionalParams);
    }
  }

  override debug(message: unknown, ...optionalParams: unknown[]): void {
    if (this.isEnabled("debug")) {
      super.debug(message, ...optionalParams);
    }
  }

  override verbose(message: unknown, ...optionalParams: unknown[]): void {
    if (this.isEnabled("verbose")) {
      super.verbose(message, ...optionalParams);
    }
  }

  override fatal(message: unknown, ...optionalParams: unknown[]): void {
    if (this.isEnabled("fatal")) {
      super.fatal(message, ...optionalParams);
    }
  }
}
