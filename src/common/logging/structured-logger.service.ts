import { Injectable, Logger } from '@nestjs/common';

export type StructuredLogLevel = 'debug' | 'info' | 'warn' | 'error';
export type StructuredLogService = 'member' | 'savings' | 'loan' | 'repayment' | 'overdue';

export interface StructuredLogPayload {
  timestamp?: string;
  level?: StructuredLogLevel;
  service: StructuredLogService;
  operation: string;
  transactionId: string;
  userId?: string;
  duration?: number;
  metadata?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };
}

@Injectable()
export class StructuredLoggerService {
  private readonly logger = new Logger(StructuredLoggerService.name);

  private safeStringify(obj: unknown) {
    const seen = new WeakSet<object>();
    return JSON.stringify(obj, (_key, value: unknown) => {
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      if (typeof value === 'bigint') return value.toString();
      return value;
    });
  }

  private buildEntry(payload: StructuredLogPayload) {
    return {
      timestamp: payload.timestamp ?? new Date().toISOString(),
      level: payload.level ?? 'info',
      service: payload.service,
      operation: payload.operation,
      transactionId: payload.transactionId,
      userId: payload.userId ?? 'system',
      duration: payload.duration,
      metadata: payload.metadata ?? {},
      error: payload.error,
    };
  }

  log(payload: StructuredLogPayload) {
    const entry = this.buildEntry(payload);
    const serialized = this.safeStringify(entry);
    switch (entry.level) {
      case 'debug':
        this.logger.debug(serialized);
        break;
      case 'warn':
        this.logger.warn(serialized);
        break;
      case 'error':
        this.logger.error(serialized);
        break;
      default:
        this.logger.log(serialized);
    }
  }
}

/** Flattens an unknown thrown value into the `error` field of a log payload. */
export function describeError(error: unknown): NonNullable<StructuredLogPayload['error']> {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack, code: error.name };
  }
  return { message: String(error) };
}
