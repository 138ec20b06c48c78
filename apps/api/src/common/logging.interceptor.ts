import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable, throwError } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';

import { RfqError } from './errors';

function statusOf(error: unknown): number {
  if (error instanceof RfqError) return error.status;
  if (error instanceof HttpException) return error.getStatus();
  return 500;
}

/**
 * Logs every HTTP request with its outcome and duration.
 *
 * Bodies are summarised by size only: login requests carry passwords and the
 * wizard carries customer contact details.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();
    const { method, url, headers } = request;
    const startTime = Date.now();

    this.logger.log(`[${method}] ${url}`, {
      hasAuth: Boolean(headers.authorization),
      contentType: headers['content-type'] || 'none',
      bodySize: JSON.stringify(request.body ?? {}).length,
    });

    return next.handle().pipe(
      tap(() => {
        const duration = Date.now() - startTime;
        this.logger.log(`[${method}] ${url} ${response.statusCode} (${duration}ms)`);
      }),
      catchError((error: unknown) => {
        const duration = Date.now() - startTime;
        const status = statusOf(error);
        const message = error instanceof Error ? error.message : String(error);
        if (status >= 500) {
          this.logger.error(`[${method}] ${url} ${status} (${duration}ms): ${message}`);
        } else {
          this.logger.warn(`[${method}] ${url} ${status} (${duration}ms): ${message}`);
        }
        return throwError(() => error);
      }),
    );
  }
}
