// src/modules/savings/savings.service.ts
import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { ValidationError } from '../../common/errors/ledger.errors';
import { StructuredLoggerService } from '../../common/logging/structured-logger.service';
import { Money } from '../../common/money/money';
import {
  LedgerOperations,
  SavingsTransactionKind,
  SavingsTransactionKinds,
} from '../../common/utils/constants/transaction-kinds.constants';
import { toIsoDate } from '../../common/utils/dates.util';
import { LEDGER_POLICY, LedgerPolicy } from '../../config/ledger-policy';
import { writeLock } from '../../database/locking';
import { AuditContextService } from '../audit/audit-context.service';
import { AuditService, buildTransactionId } from '../audit/audit.service';
import { Member } from '../members/entities/member.entity';
import { SavingsTransaction } from './entities/savings-transaction.entity';
import { SavingsPaymentResult } from './interfaces/savings-result.interface';

const DEFAULT_NOTES: Record<SavingsTransactionKind, string> = {
  initial_deposit: 'Initial deposit',
  subscription: 'Monthly subscription',
};

@Injectable()
export class SavingsService {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    @Inject(LEDGER_POLICY) private readonly policy: LedgerPolicy,
    private readonly auditService: AuditService,
    private readonly structuredLogger: StructuredLoggerService,
    private readonly context: AuditContextService,
  ) {}

  get monthlySubscription(): Money {
    return this.policy.monthlySubscription;
  }

  async recordSavingsPayment(
    memberId: string,
    amount: Money,
    asOfDate: Date,
    kind: SavingsTransactionKind = SavingsTransactionKinds.SUBSCRIPTION,
    note?: string,
    userId = 'system',
  ): Promise<SavingsPaymentResult> {
    if (!amount.isPositive()) {
      throw new ValidationError('Savings amount must be greater than zero');
    }

    return this.auditService.run(
      buildTransactionId(memberId),
      LedgerOperations.SAVINGS_PAYMENT,
      userId,
      { subjectId: memberId, amount, kind, asOfDate: toIsoDate(asOfDate) },
      async (manager) => {
        const member = await manager.findOne(Member, {
          where: { id: memberId },
          ...writeLock<Member>(manager),
        });
        if (!member) throw new NotFoundException(`Member ${memberId} not found`);

        const result = await this.credit(manager, member, amount, kind, asOfDate, note);

        this.log('info', {
          event: 'savings_recorded',
          memberId,
          kind,
          amount,
          savingsBalance: result.savingsBalance,
        });
        return result;
      },
    );
  }

  /**
   * Appends a savings entry and moves the member's balance by the same amount.
   * Runs inside the caller's transaction.
   */
  async credit(
    manager: EntityManager,
    member: Member,
    amount: Money,
    kind: SavingsTransactionKind,
    asOfDate: Date,
    note?: string,
  ): Promise<SavingsPaymentResult> {
    const balance = member.savingsBalance.plus(amount);
    if (balance.exceedsCapacity()) {
      throw new ValidationError(`Savings balance would exceed the maximum of ${Money.MAX}`);
    }
    member.savingsBalance = balance;
    await manager.save(Member, member);

    const transaction = await manager.save(
      SavingsTransaction,
      manager.create(SavingsTransaction, {
        memberId: member.id,
        amount,
        kind,
        note: note ?? DEFAULT_NOTES[kind],
        effectiveDate: toIsoDate(asOfDate),
      }),
    );

    return { memberId: member.id, savingsBalance: member.savingsBalance, transaction };
  }

  async getSavingsHistory(memberId: string): Promise<SavingsTransaction[]> {
    const exists = await this.dataSource.getRepository(Member).exists({ where: { id: memberId } });
    if (!exists) throw new NotFoundException(`Member ${memberId} not found`);

    return this.dataSource.getRepository(SavingsTransaction).find({
      where: { memberId },
      order: { id: 'ASC' },
    });
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', metadata: Record<string, unknown>) {
    const ctx = this.context.getContext();
    if (!ctx) return;
    this.structuredLogger.log({
      level,
      service: ctx.service,
      operation: ctx.operation,
      transactionId: ctx.transactionId,
      userId: ctx.userId,
      metadata,
    });
  }
}
