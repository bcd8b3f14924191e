// src/modules/repayments/repayments.service.ts
import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { Between, DataSource, FindOptionsWhere, LessThanOrEqual, MoreThanOrEqual } from 'typeorm';
import { StructuredLoggerService } from '../../common/logging/structured-logger.service';
import { Money } from '../../common/money/money';
import {
  LedgerOperations,
  LoanTransactionKinds,
} from '../../common/utils/constants/transaction-kinds.constants';
import { toIsoDate } from '../../common/utils/dates.util';
import { AuditContextService } from '../audit/audit-context.service';
import { AuditService, buildTransactionId } from '../audit/audit.service';
import { LoanTransaction } from '../loans/entities/loan-transaction.entity';
import { LoanCalculationService } from '../loans/services/loan-calculation.service';
import { LoanLedgerRepository } from '../loans/services/loan-ledger.repository';
import { LoanService } from '../loans/loans.service';
import { RepaymentHistoryQueryDto } from './dto/repayment-history-query.dto';
import { RepaymentResult } from './interfaces/repayment.interface';

@Injectable()
export class RepaymentsService {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly auditService: AuditService,
    private readonly structuredLogger: StructuredLoggerService,
    private readonly context: AuditContextService,
    private readonly calcService: LoanCalculationService,
    private readonly ledger: LoanLedgerRepository,
    private readonly loans: LoanService,
  ) {}

  /**
   * Applies a repayment as of `asOfDate`:
   * 1. compounds any overdue interest up to that date
   * 2. rejects payments above the resulting balance
   * 3. records the repayment
   * 4. closes the loan when settled, otherwise moves the due date
   *
   * Either all of it is committed or none of it.
   */
  async repayLoan(
    loanId: string,
    amount: Money,
    asOfDate: Date,
    userId = 'system',
  ): Promise<RepaymentResult> {
    const transactionId = buildTransactionId(loanId);

    return this.auditService.run(
      transactionId,
      LedgerOperations.REPAYMENT,
      userId,
      { subjectId: loanId, amount, asOfDate: toIsoDate(asOfDate) },
      async (manager) => {
        const loan = await this.ledger.loadForUpdate(manager, loanId);
        const balanceBefore = loan.currentBalance;

        const step = this.calcService.applyRepayment(
          this.ledger.toState(loan),
          amount,
          asOfDate,
        );
        const saved = await this.ledger.commit(manager, loan, step);
        const warnings = this.calcService.overdueWarnings(step.charges);

        for (const warning of warnings) {
          this.log('warn', {
            event: 'overdue_interest_applied',
            loanId,
            periods: warning.periods,
            totalCharged: warning.totalCharged,
          });
        }

        this.log('info', {
          event: saved.isActive ? 'repayment_persisted' : 'loan_settled',
          loanId,
          paymentAmount: amount,
          balanceBefore,
          balanceAfter: saved.currentBalance,
          nextDueDate: saved.nextDueDate,
        });

        return { loan: saved, overdueCharges: step.charges, warnings };
      },
    );
  }

  async getRepaymentHistory(loanId: string, query?: RepaymentHistoryQueryDto) {
    await this.loans.getLoan(loanId);

    const where: FindOptionsWhere<LoanTransaction> = {
      loanId,
      kind: LoanTransactionKinds.REPAYMENT,
    };
    if (query?.from && query.to) where.effectiveDate = Between(query.from, query.to);
    else if (query?.from) where.effectiveDate = MoreThanOrEqual(query.from);
    else if (query?.to) where.effectiveDate = LessThanOrEqual(query.to);

    return this.dataSource.getRepository(LoanTransaction).find({
      where,
      order: { id: 'ASC' },
    });
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', metadata: Record<string, unknown>) {
    const ctx = this.context.getContext();
    if (!ctx) return;
    this.structuredLogger.log({
      level,
      service: 'repayment',
      operation: ctx.operation,
      transactionId: ctx.transactionId,
      userId: ctx.userId,
      metadata,
    });
  }
}
