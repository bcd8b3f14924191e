// src/modules/loans/loans.service.ts
import { randomUUID } from 'node:crypto';
import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, FindOptionsWhere } from 'typeorm';
import { ConflictError } from '../../common/errors/ledger.errors';
import { StructuredLoggerService } from '../../common/logging/structured-logger.service';
import { Money } from '../../common/money/money';
import { LedgerOperations } from '../../common/utils/constants/transaction-kinds.constants';
import { toIsoDate } from '../../common/utils/dates.util';
import { writeLock } from '../../database/locking';
import { isUniqueViolation } from '../../database/unique-violation';
import { AuditContextService } from '../audit/audit-context.service';
import { AuditService, buildTransactionId } from '../audit/audit.service';
import { Member } from '../members/entities/member.entity';
import { Loan } from './entities/loan.entity';
import { LoanLedgerView } from './interfaces/loan-views.interface';
import { LoanCalculationService } from './services/loan-calculation.service';
import { LoanLedgerRepository } from './services/loan-ledger.repository';

const ACTIVE_LOAN_EXISTS = 'Active loan exists';

@Injectable()
export class LoanService {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly auditService: AuditService,
    private readonly structuredLogger: StructuredLoggerService,
    private readonly context: AuditContextService,
    private readonly calcService: LoanCalculationService,
    private readonly ledger: LoanLedgerRepository,
  ) {}

  /**
   * Issues a loan with the policy's flat interest added up front. Fails with
   * ConflictError while the member still has an active loan.
   */
  async issueLoan(memberId: string, principal: Money, asOfDate: Date, userId = 'system'): Promise<Loan> {
    // validates the principal before anything is written
    const opening = this.calcService.openLoan(principal, asOfDate);

    const loanId = randomUUID();
    const transactionId = buildTransactionId(loanId);

    try {
      return await this.auditService.run(
        transactionId,
        LedgerOperations.LOAN_ISSUE,
        userId,
        { subjectId: loanId, memberId, principal, asOfDate: toIsoDate(asOfDate) },
        async (manager) => {
          const member = await manager.findOne(Member, {
            where: { id: memberId },
            ...writeLock<Member>(manager),
          });
          if (!member) throw new NotFoundException(`Member ${memberId} not found`);

          // checked under the member lock so concurrent issues for one member queue here
          if (await manager.exists(Loan, { where: { memberId, isActive: true } })) {
            throw new ConflictError(ACTIVE_LOAN_EXISTS);
          }

          const loan = await this.ledger.commit(
            manager,
            manager.create(Loan, { id: loanId, memberId }),
            opening,
          );

          this.log('info', {
            event: 'loan_issued',
            loanId,
            memberId,
            principal: loan.principal,
            interestAmount: loan.interestAmount,
            totalAmount: loan.totalAmount,
            nextDueDate: loan.nextDueDate,
          });

          return loan;
        },
      );
    } catch (error) {
      // the partial unique index still backs the check
      if (isUniqueViolation(error)) throw new ConflictError(ACTIVE_LOAN_EXISTS);
      throw error;
    }
  }

  async getLoan(id: string): Promise<Loan> {
    const loan = await this.dataSource.getRepository(Loan).findOne({ where: { id } });
    if (!loan) throw new NotFoundException(`Loan ${id} not found`);
    return loan;
  }

  async listLoans(memberId?: string): Promise<Loan[]> {
    const where: FindOptionsWhere<Loan> = memberId ? { memberId } : {};
    return this.dataSource.getRepository(Loan).find({
      where,
      order: { issueDate: 'ASC', createdAt: 'ASC' },
    });
  }

  async getActiveLoanForMember(memberId: string): Promise<Loan | null> {
    return this.dataSource.getRepository(Loan).findOne({ where: { memberId, isActive: true } });
  }

  /** Full ledger of a loan, oldest first, reconciled against the cached balance. */
  async getLoanLedger(id: string): Promise<LoanLedgerView> {
    const loan = await this.getLoan(id);
    const transactions = await this.ledger.history(this.dataSource.manager, id);
    const replayedBalance = this.calcService.replayBalance(transactions);
    return {
      loan,
      transactions,
      replayedBalance,
      inBalance: replayedBalance.equals(loan.currentBalance),
    };
  }

  async getAuditTrail(loanId: string) {
    await this.getLoan(loanId);
    return this.auditService.getAuditTrail(loanId);
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', metadata: Record<string, unknown>) {
    const ctx = this.context.getContext();
    if (!ctx) return;
    this.structuredLogger.log({
      level,
      service: 'loan',
      operation: ctx.operation,
      transactionId: ctx.transactionId,
      userId: ctx.userId,
      metadata,
    });
  }
}
