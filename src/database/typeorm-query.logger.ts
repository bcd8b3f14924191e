// src/database/typeorm-query.logger.ts
import { Logger as TypeOrmLogger } from 'typeorm';
import {
  describeError,
  StructuredLoggerService,
} from '../common/logging/structured-logger.service';
import { AuditContextService } from '../modules/audit/audit-context.service';

/**
 * Routes TypeORM query events into the structured log, tagged with the
 * operation that issued them. Queries outside an audited operation are dropped.
 */
export class TypeOrmQueryLogger implements TypeOrmLogger {
  constructor(
    private readonly logger: StructuredLoggerService,
    private readonly context: AuditContextService,
  ) {}

  logQuery(query: string, parameters?: unknown[]) {
    this.emit('debug', { query, params: parameters });
  }

  logQueryError(error: string | Error, query: string, parameters?: unknown[]) {
    const ctx = this.context.getContext();
    if (!ctx) return;
    this.logger.log({
      level: 'error',
      service: ctx.service,
      operation: ctx.operation,
      transactionId: ctx.transactionId,
      userId: ctx.userId,
      metadata: { query, params: parameters },
      error: describeError(error),
    });
  }

  logQuerySlow(time: number, query: string, parameters?: unknown[]) {
    this.emit('warn', { query, params: parameters }, time);
  }

  logSchemaBuild(message: string) {
    this.emit('debug', { schema: message });
  }

  logMigration(message: string) {
    this.emit('info', { migration: message });
  }

  log(level: 'log' | 'info' | 'warn', message: unknown) {
    this.emit(level === 'warn' ? 'warn' : 'info', { message });
  }

  private emit(
    level: 'debug' | 'info' | 'warn',
    metadata: Record<string, unknown>,
    duration?: number,
  ) {
    const ctx = this.context.getContext();
    if (!ctx) return;
    this.logger.log({
      level,
      service: ctx.service,
      operation: ctx.operation,
      transactionId: ctx.transactionId,
      userId: ctx.userId,
      duration,
      metadata,
    });
  }
}
