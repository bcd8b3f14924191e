import {
  CallHandler,
  ExecutionContext,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable, tap } from 'rxjs';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const startedAt = Date.now();

    return next.handle().pipe(
      tap({
        next: () =>
          this.logger.log(`${request.method} ${request.url} completed in ${Date.now() - startedAt}ms`),
        error: (error: unknown) =>
          this.logger.warn(
            `${request.method} ${request.url} failed in ${Date.now() - startedAt}ms: ${
              error instanceof Error ? error.message : String(error)
            }`,
          ),
      }),
    );
  }
}
