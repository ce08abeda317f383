import { v4 as uuidv4 } from "uuid";
import { BaseService } from "./base.service";
import { asError } from "../utils/error.utils";

/**
 * Base controller with request ids and timed operations
 */
export abstract class BaseController extends BaseService {
  protected readonly startupTime: number = Date.now();

  generateRequestId(): string {
    return uuidv4();
  }

  /**
   * Run a controller operation, logging its duration. Errors are logged and
   * rethrown for the exception filter.
   */
  protected async executeOperation<T>(
    operation: () => Promise<T>,
    operationName: string,
    options: { requestId?: string; performanceThreshold?: number } = {}
  ): Promise<T> {
    const { requestId = this.generateRequestId(), performanceThreshold = 1000 } = options;
    const startTime = Date.now();

    try {
      this.logDebug(`Starting ${operationName}`, requestId);
      const result = await operation();
      this.logPerformance(operationName, Date.now() - startTime, performanceThreshold);
      return result;
    } catch (error) {
      this.logDebug(`${operationName} failed after ${Date.now() - startTime}ms: ${asError(error).message}`, requestId);
      throw error;
    }
  }
}
