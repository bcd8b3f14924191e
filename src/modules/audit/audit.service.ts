import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import type { StructuredLogService } from '../../common/logging/structured-logger.service';
import type { LedgerOperation } from '../../common/utils/constants/transaction-kinds.constants';
import { AuditContextService } from './audit-context.service';
import { AuditLog } from './entities/audit-log.entity';
import { AuditMetadata, AuditRunOptions } from './interfaces/audit-run-options.interface';

const OPERATION_SERVICES: Record<LedgerOperation, StructuredLogService> = {
  MEMBER_REGISTRATION: 'member',
  SAVINGS_PAYMENT: 'savings',
  LOAN_ISSUE: 'loan',
  REPAYMENT: 'repayment',
  OVERDUE_INTEREST: 'overdue',
};

export function buildTransactionId(subjectId: string): string {
  return `txn_${subjectId}_${Date.now()}`;
}

@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly context: AuditContextService,
  ) {}

  /**
   * Runs a unit of work in one database transaction with:
   * - START / SUCCESS audit rows written inside the transaction
   * - a FAILED row written after rollback
   * - the audit context available to structured logging
   * - optional idempotency guard
   */
  async run<T>(
    transactionId: string,
    operation: LedgerOperation,
    userId: string,
    metadata: AuditMetadata,
    executor: (manager: EntityManager) => Promise<T>,
    options?: AuditRunOptions,
  ): Promise<T> {
    const auditContext = {
      transactionId,
      operation,
      service: OPERATION_SERVICES[operation],
      userId,
    };

    return await this.context.run(auditContext, async () => {
      try {
        return await this.dataSource.transaction(async (manager) => {
          if (options?.idempotency) {
            const exists = await options.idempotency.check(manager);
            if (exists) {
              options.idempotency.onDuplicate();
            }
          }

          await this.record(manager, transactionId, `${operation}_START`, userId, metadata);
          const result = await executor(manager);
          await this.record(manager, transactionId, `${operation}_SUCCESS`, userId, metadata);
          return result;
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(
          `Transaction failed: ${operation} - ${transactionId}`,
          error instanceof Error ? error.stack : undefined,
        );

        try {
          await this.record(this.dataSource.manager, transactionId, `${operation}_FAILED`, userId, {
            ...metadata,
            error: message,
          });
        } catch (auditError) {
          this.logger.error(
            `Could not record failure of ${transactionId}`,
            auditError instanceof Error ? auditError.stack : undefined,
          );
        }
        throw error;
      }
    });
  }

  /**
   * Returns the audit trail of a loan or member in write order.
   */
  async getAuditTrail(subjectId: string) {
    return this.dataSource.getRepository(AuditLog).find({
      where: { subjectId },
      order: { id: 'ASC' },
    });
  }

  private async record(
    manager: EntityManager,
    transactionId: string,
    operation: string,
    userId: string,
    metadata: AuditMetadata,
  ) {
    const { subjectId, ...details } = metadata;
    await manager.save(
      AuditLog,
      manager.create(AuditLog, {
        transactionId,
        operation,
        userId,
        subjectId,
        metadata: details,
      }),
    );
  }
}
