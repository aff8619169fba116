import {
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { ExceptionFilter } from '@nestjs/common';
import * as Sentry from '@sentry/nestjs';
import type { Response } from 'express';
import { DurationStoreError } from '../tracker/duration-store';

/**
 * Global exception filter that reports to Sentry and answers HTTP requests.
 *
 * Registered with `app.useGlobalFilters(new ...)`, outside DI, so it cannot
 * extend SentryGlobalFilter (which needs HttpAdapterHost).
 *
 * - HTTP: 4xx pass through unreported; 5xx and unknown errors are captured.
 *   A failing duration store answers 503 so callers know to retry.
 * - Non-HTTP: captured and re-thrown.
 */
@Catch()
export class SentryExceptionFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost): void {
    if (host.getType() !== 'http') {
      Sentry.captureException(exception);
      throw exception;
    }

    const response = host.switchToHttp().getResponse<Response>();
    if (response.headersSent) {
      return;
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();
      if (status >= 500) {
        Sentry.captureException(exception);
      }
      response
        .status(status)
        .json(
          typeof body === 'string' ? { statusCode: status, message: body } : body,
        );
      return;
    }

    Sentry.captureException(exception);
    if (exception instanceof DurationStoreError) {
      response.status(HttpStatus.SERVICE_UNAVAILABLE).json({
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        message: 'Duration store unavailable',
      });
      return;
    }
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
    });
  }
}
