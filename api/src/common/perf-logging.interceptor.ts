import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable, tap } from 'rxjs';
import type { Request, Response } from 'express';
import { isPerfEnabled, perfLog } from './perf-logger';

/**
 * Global HTTP request/response timing interceptor.
 * Logs method, URL, status and duration when DEBUG=true.
 */
@Injectable()
export class PerfLoggingInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (!isPerfEnabled() || context.getType() !== 'http') return next.handle();

    const httpCtx = context.switchToHttp();
    const req = httpCtx.getRequest<Request>();
    const start = performance.now();

    return next.handle().pipe(
      tap(() => {
        const res = httpCtx.getResponse<Response>();
        perfLog('HTTP', `${req.method} ${req.url}`, performance.now() - start, {
          status: res.statusCode,
        });
      }),
    );
  }
}
