// src/modules/members/members.service.ts
import { randomUUID } from 'node:crypto';
import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { differenceInCalendarDays } from 'date-fns';
import { DataSource } from 'typeorm';
import { ConflictError, ValidationError } from '../../common/errors/ledger.errors';
import { StructuredLoggerService } from '../../common/logging/structured-logger.service';
import { Money } from '../../common/money/money';
import {
  LedgerOperations,
  SavingsTransactionKinds,
} from '../../common/utils/constants/transaction-kinds.constants';
import { parseIsoDate, toIsoDate } from '../../common/utils/dates.util';
import { LEDGER_POLICY, LedgerPolicy } from '../../config/ledger-policy';
import { isUniqueViolation } from '../../database/unique-violation';
import { AuditContextService } from '../audit/audit-context.service';
import { AuditService, buildTransactionId } from '../audit/audit.service';
import { LoanService } from '../loans/loans.service';
import { LoanCalculationService } from '../loans/services/loan-calculation.service';
import { SavingsService } from '../savings/savings.service';
import { Member } from './entities/member.entity';
import { MemberSummary } from './interfaces/member-summary.interface';

@Injectable()
export class MembersService {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    @Inject(LEDGER_POLICY) private readonly policy: LedgerPolicy,
    private readonly auditService: AuditService,
    private readonly structuredLogger: StructuredLoggerService,
    private readonly context: AuditContextService,
    private readonly savings: SavingsService,
    private readonly loans: LoanService,
    private readonly calcService: LoanCalculationService,
  ) {}

  /** Registers a member holding the policy's initial deposit as savings. */
  async registerMember(
    fullName: string,
    memberNumber: string,
    asOfDate: Date,
    userId = 'system',
  ): Promise<Member> {
    const name = fullName.trim();
    const number = memberNumber.trim();
    if (!name || !number) {
      throw new ValidationError('Full name and member number are required');
    }

    const memberId = randomUUID();
    const duplicate = () => new ConflictError(`Member number ${number} already registered`);

    try {
      return await this.auditService.run(
        buildTransactionId(memberId),
        LedgerOperations.MEMBER_REGISTRATION,
        userId,
        { subjectId: memberId, memberNumber: number, asOfDate: toIsoDate(asOfDate) },
        async (manager) => {
          const member = manager.create(Member, {
            id: memberId,
            memberNumber: number,
            fullName: name,
            joinedOn: toIsoDate(asOfDate),
            savingsBalance: Money.zero(),
          });
          await manager.save(Member, member);

          if (this.policy.initialDeposit.isPositive()) {
            await this.savings.credit(
              manager,
              member,
              this.policy.initialDeposit,
              SavingsTransactionKinds.INITIAL_DEPOSIT,
              asOfDate,
            );
          }

          this.log('info', {
            event: 'member_registered',
            memberId,
            memberNumber: number,
            savingsBalance: member.savingsBalance,
          });
          return member;
        },
        {
          idempotency: {
            check: (manager) => manager.exists(Member, { where: { memberNumber: number } }),
            onDuplicate: () => {
              throw duplicate();
            },
          },
        },
      );
    } catch (error) {
      // a concurrent registration can pass the pre-check and lose on the unique index
      if (isUniqueViolation(error)) throw duplicate();
      throw error;
    }
  }

  async getMember(id: string): Promise<Member> {
    const member = await this.dataSource.getRepository(Member).findOne({ where: { id } });
    if (!member) throw new NotFoundException(`Member ${id} not found`);
    return member;
  }

  async listMembers(): Promise<Member[]> {
    return this.dataSource.getRepository(Member).find({
      order: { memberNumber: 'ASC' },
    });
  }

  /**
   * Savings and active-loan position as of a date. Read-only: overdue
   * interest that has not been applied yet is not projected.
   */
  async getMemberSummary(id: string, asOfDate: Date): Promise<MemberSummary> {
    const member = await this.getMember(id);
    const loan = await this.loans.getActiveLoanForMember(id);

    let activeLoan: MemberSummary['activeLoan'] = null;
    if (loan) {
      const dueDate = parseIsoDate(loan.nextDueDate);
      const isOverdue = this.calcService.isOverdue(
        { isActive: loan.isActive, nextDueDate: dueDate },
        asOfDate,
      );
      activeLoan = {
        loanId: loan.id,
        principal: loan.principal,
        currentBalance: loan.currentBalance,
        nextDueDate: loan.nextDueDate,
        isOverdue,
        daysOverdue: isOverdue ? differenceInCalendarDays(asOfDate, dueDate) : 0,
      };
    }

    return {
      memberId: member.id,
      memberNumber: member.memberNumber,
      fullName: member.fullName,
      asOfDate: toIsoDate(asOfDate),
      savingsBalance: member.savingsBalance,
      activeLoan,
    };
  }

  async getAuditTrail(id: string) {
    await this.getMember(id);
    return this.auditService.getAuditTrail(id);
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', metadata: Record<string, unknown>) {
    const ctx = this.context.getContext();
    if (!ctx) return;
    this.structuredLogger.log({
      level,
      service: 'member',
      operation: ctx.operation,
      transactionId: ctx.transactionId,
      userId: ctx.userId,
      metadata,
    });
  }
}
