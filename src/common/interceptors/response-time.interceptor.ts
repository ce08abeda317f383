import { Injectable, NestInterceptor, ExecutionContext, CallHandler, HttpException } from "@nestjs/common";
import type { Request, Response } from "express";
import { Observable } from "rxjs";
import { tap } from "rxjs/operators";
import { BaseService } from "../base/base.service";

const SLOW_RESPONSE_MS = 1000;

/**
 * Per-request access log with an `X-Response-Time` header
 */
@Injectable()
export class ResponseTimeInterceptor extends BaseService implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const startTime = Date.now();
    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();
    const { method, originalUrl } = request;

    return next.handle().pipe(
      tap({
        next: () => {
          const responseTime = Date.now() - startTime;
          if (!response.headersSent) {
            response.setHeader("X-Response-Time", `${responseTime}ms`);
          }

          const line = `${method} ${originalUrl} - ${response.statusCode} - ${responseTime}ms`;
          if (responseTime > SLOW_RESPONSE_MS) {
            this.logger.warn(`${line} - SLOW RESPONSE`);
          } else {
            this.logger.log(line);
          }
        },
        error: (error: unknown) => {
          const responseTime = Date.now() - startTime;
          const statusCode = error instanceof HttpException ? error.getStatus() : 500;
          this.logger.warn(`${method} ${originalUrl} - ${statusCode} - ${responseTime}ms - failed`);
        },
      })
    );
  }
}
