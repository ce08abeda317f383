import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus, Injectable, Logger } from "@nestjs/common";
import type { Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import { ConfigurationError, InputError, LookupAppError, ProviderError } from "@/common/errors";
import { ErrorCode, ErrorSeverity, type IErrorDetails, type StandardErrorResponse } from "@/common/types/error-handling";

/**
 * Global exception filter rendering every failure as a {@link StandardErrorResponse}
 */
@Catch()
@Injectable()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status = this.getStatus(exception);
    const details = this.getErrorDetails(exception, status);

    const errorResponse: StandardErrorResponse = {
      success: false,
      error: {
        ...details,
        timestamp: details.timestamp ?? Date.now(),
        context: {
          ...details.context,
          httpStatus: status,
          path: request.path,
          method: request.method,
        },
      },
      timestamp: Date.now(),
      requestId: this.extractRequestId(request),
    };

    this.logError(exception, errorResponse, request, status);

    response.status(status).json(errorResponse);
  }

  getStatus(exception: unknown): number {
    if (exception instanceof HttpException) {
      return exception.getStatus();
    }
    if (exception instanceof InputError) {
      return HttpStatus.BAD_REQUEST;
    }
    if (exception instanceof ProviderError) {
      return HttpStatus.BAD_GATEWAY;
    }
    return HttpStatus.INTERNAL_SERVER_ERROR;
  }

  private getErrorDetails(exception: unknown, status: number): IErrorDetails {
    if (exception instanceof LookupAppError) {
      const details = exception.toDetails();
      // Configuration problems are logged in full; clients get a generic message
      if (exception instanceof ConfigurationError) {
        return { ...details, message: "Service is misconfigured" };
      }
      return details;
    }

    if (exception instanceof HttpException) {
      return {
        code: this.codeForStatus(status),
        message: this.extractHttpMessage(exception),
        severity: this.getSeverityForStatus(status),
        module: "HttpException",
      };
    }

    return {
      code: ErrorCode.INTERNAL_ERROR,
      message: "Internal server error",
      severity: ErrorSeverity.CRITICAL,
      module: "HttpFilter",
    };
  }

  private extractHttpMessage(exception: HttpException): string {
    const exceptionResponse = exception.getResponse();

    if (typeof exceptionResponse === "string") {
      return exceptionResponse;
    }

    if (typeof exceptionResponse === "object" && exceptionResponse !== null && "message" in exceptionResponse) {
      const { message } = exceptionResponse;
      // ValidationPipe reports one message per failed constraint
      if (Array.isArray(message)) {
        return message.map(String).join("; ");
      }
      if (typeof message === "string") {
        return message;
      }
    }

    return exception.message;
  }

  private codeForStatus(status: number): ErrorCode {
    if (status === HttpStatus.BAD_REQUEST || status === HttpStatus.UNPROCESSABLE_ENTITY) {
      return ErrorCode.VALIDATION_ERROR;
    }
    if (status === HttpStatus.NOT_FOUND) {
      return ErrorCode.NOT_FOUND;
    }
    if (status >= 500) {
      return ErrorCode.INTERNAL_ERROR;
    }
    return ErrorCode.HTTP_ERROR;
  }

  private getSeverityForStatus(status: number): ErrorSeverity {
    if (status >= 500) {
      return ErrorSeverity.CRITICAL;
    }
    if (status >= 400) {
      return ErrorSeverity.MEDIUM;
    }
    return ErrorSeverity.LOW;
  }

  private extractRequestId(request: Request): string {
    return request.get("X-Request-ID") || request.get("X-Correlation-ID") || uuidv4();
  }

  private logError(exception: unknown, errorResponse: StandardErrorResponse, request: Request, status: number): void {
    const message = `${request.method} ${request.path} - ${status} - ${errorResponse.error.message}`;
    const logContext = {
      requestId: errorResponse.requestId,
      code: errorResponse.error.code,
      severity: errorResponse.error.severity,
    };

    if (status >= 500) {
      const detail = exception instanceof Error ? `${exception.message}\n${exception.stack ?? ""}` : String(exception);
      this.logger.error(message, detail, logContext);
    } else {
      this.logger.warn(message, logContext);
    }
  }
}
