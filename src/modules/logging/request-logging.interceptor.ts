import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  NestInterceptor
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';

import { AppLogger } from './app-logger.service';
import { LogCategory } from './log-levels';
import type { AuthenticatedRequest } from '../auth/authenticated-request';

const SLOW_REQUEST_MS = 2000;

@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  constructor(private readonly logger: AppLogger) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request & Partial<AuthenticatedRequest>>();
    const response = httpContext.getResponse<Response>();
    const startedAt = Date.now();
    const url = request.originalUrl ?? request.url;

    // The request context was opened by requestContextMiddleware and
    // enriched with the caller by AccessGuard.
    this.logger.info(LogCategory.HTTP, `→ ${request.method} ${url}`, {
      userAgent: request.headers['user-agent'],
      ip: request.ip ?? request.socket.remoteAddress,
    });

    if (request.body && typeof request.body === 'object' && Object.keys(request.body).length > 0) {
      this.logger.trace(LogCategory.HTTP, 'Request body', { body: request.body });
    }

    return next.handle().pipe(
      tap((responseBody: unknown) => {
        const durationMs = Date.now() - startedAt;
        this.logger.info(LogCategory.HTTP, `← ${response.statusCode} ${request.method} ${url}`, {
          status: response.statusCode,
          durationMs,
        });

        if (responseBody !== undefined) {
          this.logger.trace(LogCategory.HTTP, 'Response body', { body: responseBody });
        }

        if (durationMs > SLOW_REQUEST_MS) {
          this.logger.warn(LogCategory.HTTP, `Slow request: ${durationMs}ms`, {
            status: response.statusCode,
            durationMs,
          });
        }
      }),
      catchError((error: unknown) => {
        const durationMs = Date.now() - startedAt;
        const status = error instanceof HttpException ? error.getStatus() : 500;
        const line = `← ${status} ${request.method} ${url}`;
        if (status >= 500) {
          this.logger.error(LogCategory.HTTP, line, error, { status, durationMs });
        } else {
          this.logger.warn(LogCategory.HTTP, line, {
            status,
            durationMs,
            reason: error instanceof Error ? error.message : String(error),
          });
        }
        throw error;
      })
    );
  }
}
