import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable, tap } from 'rxjs';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const startedAt = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          const response = http.getResponse<Response>();
          this.logger.log(
            `${request.method} ${request.originalUrl} ${response.statusCode} - ${Date.now() - startedAt}ms`,
          );
        },
        error: (error: unknown) => {
          this.logger.warn(
            `${request.method} ${request.originalUrl} failed after ${Date.now() - startedAt}ms: ${
              error instanceof Error ? error.message : String(error)
            }`,
          );
        },
      }),
    );
  }
}
