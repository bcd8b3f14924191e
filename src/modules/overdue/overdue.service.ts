// src/modules/overdue/overdue.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, LessThan } from 'typeorm';
import {
  describeError,
  StructuredLoggerService,
} from '../../common/logging/structured-logger.service';
import { Money } from '../../common/money/money';
import { LedgerOperations } from '../../common/utils/constants/transaction-kinds.constants';
import { toIsoDate } from '../../common/utils/dates.util';
import { AuditContextService } from '../audit/audit-context.service';
import { AuditService, buildTransactionId } from '../audit/audit.service';
import { Loan } from '../loans/entities/loan.entity';
import { LoanService } from '../loans/loans.service';
import { LoanCalculationService } from '../loans/services/loan-calculation.service';
import { LoanLedgerRepository } from '../loans/services/loan-ledger.repository';
import {
  OverdueApplication,
  OverdueBatchReport,
  OverdueFailure,
} from './interfaces/overdue-result.interface';

@Injectable()
export class OverdueService {
  private readonly logger = new Logger(OverdueService.name);

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
   * Charges every overdue period of one loan up to `asOfDate`. A loan that
   * is not overdue comes back with no charges and nothing is written.
   */
  async applyOverdueInterest(
    loanId: string,
    asOfDate: Date,
    userId = 'system',
  ): Promise<OverdueApplication> {
    const current = await this.loans.getLoan(loanId);
    if (!this.calcService.isOverdue(this.ledger.toState(current), asOfDate)) {
      return this.toApplication(current, []);
    }

    return this.auditService.run(
      buildTransactionId(loanId),
      LedgerOperations.OVERDUE_INTEREST,
      userId,
      { subjectId: loanId, asOfDate: toIsoDate(asOfDate) },
      async (manager) => {
        // another writer may have charged or repaid in between
        const loan = await this.ledger.loadForUpdate(manager, loanId);
        const step = this.calcService.accrueOverdueInterest(this.ledger.toState(loan), asOfDate);
        if (step.charges.length === 0) {
          return this.toApplication(loan, []);
        }

        const saved = await this.ledger.commit(manager, loan, step);
        const result = this.toApplication(saved, step.charges);

        this.log('warn', {
          event: 'overdue_interest_applied',
          loanId,
          periods: step.charges.length,
          totalCharged: result.totalCharged,
          balanceAfter: saved.currentBalance,
          nextDueDate: saved.nextDueDate,
        });

        return result;
      },
    );
  }

  /**
   * Sweeps all active loans whose due date has passed. Each loan is charged
   * in its own transaction; a failure is reported and the sweep moves on.
   */
  async processAllOverdue(asOfDate: Date, userId = 'system'): Promise<OverdueBatchReport> {
    const asOfIso = toIsoDate(asOfDate);
    const candidates = await this.dataSource.getRepository(Loan).find({
      where: { isActive: true, nextDueDate: LessThan(asOfIso) },
      order: { nextDueDate: 'ASC', id: 'ASC' },
    });

    const results: OverdueApplication[] = [];
    const failures: OverdueFailure[] = [];

    for (const loan of candidates) {
      try {
        const result = await this.applyOverdueInterest(loan.id, asOfDate, userId);
        if (result.charges.length > 0) results.push(result);
      } catch (error) {
        const { message } = describeError(error);
        this.logger.error(`Overdue processing failed for loan ${loan.id}: ${message}`);
        failures.push({ loanId: loan.id, error: message });
      }
    }

    const report: OverdueBatchReport = {
      asOfDate: asOfIso,
      loansScanned: candidates.length,
      loansCharged: results.length,
      totalInterestCharged: Money.sum(results.map((result) => result.totalCharged)),
      results,
      failures,
    };

    this.logger.log(
      `Overdue sweep ${asOfIso}: scanned ${report.loansScanned}, charged ${report.loansCharged}, ` +
        `interest ${report.totalInterestCharged}, failures ${failures.length}`,
    );
    return report;
  }

  private toApplication(loan: Loan, charges: OverdueApplication['charges']): OverdueApplication {
    return {
      loanId: loan.id,
      memberId: loan.memberId,
      charges,
      totalCharged: Money.sum(charges.map((charge) => charge.chargeAmount)),
      nextDueDate: loan.nextDueDate,
      currentBalance: loan.currentBalance,
      warnings: this.calcService.overdueWarnings(charges),
    };
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', metadata: Record<string, unknown>) {
    const ctx = this.context.getContext();
    if (!ctx) return;
    this.structuredLogger.log({
      level,
      service: 'overdue',
      operation: ctx.operation,
      transactionId: ctx.transactionId,
      userId: ctx.userId,
      metadata,
    });
  }
}
