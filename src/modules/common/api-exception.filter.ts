import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { Response } from 'express';

import { ApiError, ErrorBody, kindForStatus } from './api-errors';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';

/**
 * Global exception filter.
 *
 * Renders every failure as the `{ kind, message, status, details? }` envelope:
 * - ApiError subclasses carry their own kind and details
 * - Nest's HttpExceptions (ValidationPipe, unknown routes, ParseIntPipe) are
 *   mapped by status; ValidationPipe message arrays land in `details.errors`
 * - anything else is an internal error, logged with its stack
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: AppLogger) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const body = this.toBody(exception);

    if (body.status >= 500) {
      this.logger.error(LogCategory.HTTP, body.message, exception, { kind: body.kind });
    }

    if (response.headersSent) {
      return;
    }

    if (body.status === HttpStatus.UNAUTHORIZED) {
      response.setHeader('WWW-Authenticate', 'Token realm="api"');
    }

    response.status(body.status).json(body);
  }

  private toBody(exception: unknown): ErrorBody {
    if (exception instanceof ApiError) {
      return exception.toBody();
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const raw = exception.getResponse();
      const body: ErrorBody = { kind: kindForStatus(status), message: exception.message, status };

      if (typeof raw === 'object' && raw !== null && 'message' in raw) {
        const message: unknown = raw.message;
        if (Array.isArray(message)) {
          body.message = 'Invalid payload.';
          body.details = { errors: message.map(m => ({ messages: [String(m)] })) };
        } else if (typeof message === 'string') {
          body.message = message;
        }
      }
      return body;
    }

    return {
      kind: 'internal_error',
      message: 'Internal server error.',
      status: HttpStatus.INTERNAL_SERVER_ERROR,
    };
  }
}
