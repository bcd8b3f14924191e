import { Inject, Injectable } from '@nestjs/common';
import { isAfter } from 'date-fns';
import { InvalidStateError, ValidationError } from '../../../common/errors/ledger.errors';
import { Money } from '../../../common/money/money';
import {
  LedgerWarningCodes,
  LoanTransactionKinds,
} from '../../../common/utils/constants/transaction-kinds.constants';
import { countOverduePeriods, nextDueDate } from '../../../common/utils/due-date.util';
import { LEDGER_POLICY, LedgerPolicy } from '../../../config/ledger-policy';
import {
  LedgerEntryDraft,
  LedgerEntryLike,
  LedgerStep,
  LedgerWarning,
  LoanLedgerState,
  OverdueCharge,
  OverdueStep,
  RepaymentStep,
} from '../interfaces/loan-ledger.interface';

function assertStorable(amount: Money, label: string): void {
  if (amount.exceedsCapacity()) {
    throw new ValidationError(`${label} would exceed the maximum of ${Money.MAX}`);
  }
}

/**
 * Pure loan ledger rules. Nothing here touches the database; every method
 * takes a state and returns the next one with the entries to append, leaving
 * its input untouched so a failed step never leaks a partial mutation.
 */
@Injectable()
export class LoanCalculationService {
  constructor(@Inject(LEDGER_POLICY) private readonly policy: LedgerPolicy) {}

  nextDueDate(reference: Date): Date {
    return nextDueDate(reference, this.policy.dueDay);
  }

  openLoan(principal: Money, asOf: Date): LedgerStep {
    if (!principal.isPositive()) {
      throw new ValidationError('Loan principal must be greater than zero');
    }

    const interestAmount = principal.times(this.policy.loanInterestRate);
    const totalAmount = principal.plus(interestAmount);
    assertStorable(totalAmount, 'Loan total');

    const state: LoanLedgerState = {
      principal,
      interestRate: this.policy.loanInterestRate,
      interestAmount,
      totalAmount,
      currentBalance: totalAmount,
      issueDate: asOf,
      nextDueDate: this.nextDueDate(asOf),
      isActive: true,
      closedOn: null,
    };

    return {
      state,
      entries: [
        {
          kind: LoanTransactionKinds.LOAN_ISSUED,
          amount: totalAmount,
          note: `Loan issued: principal ${principal} plus interest ${interestAmount}`,
          effectiveDate: asOf,
          periodIndex: null,
        },
      ],
    };
  }

  /**
   * Compounds overdue interest once per due-day boundary crossed since the
   * loan's due date, each period charged on the balance after the previous
   * one, then moves the due date past `asOf`.
   */
  accrueOverdueInterest(current: LoanLedgerState, asOf: Date): OverdueStep {
    const periods = current.isActive
      ? countOverduePeriods(current.nextDueDate, asOf, this.policy.dueDay)
      : 0;
    if (periods === 0) {
      return { state: current, entries: [], charges: [] };
    }

    let balance = current.currentBalance;
    const charges: OverdueCharge[] = [];
    const entries: LedgerEntryDraft[] = [];

    for (let periodIndex = 1; periodIndex <= periods; periodIndex++) {
      const chargeAmount = balance.times(this.policy.overdueInterestRate);
      balance = balance.plus(chargeAmount);
      charges.push({ periodIndex, chargeAmount, newBalance: balance });
      entries.push({
        kind: LoanTransactionKinds.OVERDUE_INTEREST,
        amount: chargeAmount,
        note: `Overdue interest (period ${periodIndex} of ${periods}): ${chargeAmount}`,
        effectiveDate: asOf,
        periodIndex,
      });
    }
    assertStorable(balance, 'Loan balance');

    return {
      state: { ...current, currentBalance: balance, nextDueDate: this.nextDueDate(asOf) },
      entries,
      charges,
    };
  }

  applyRepayment(current: LoanLedgerState, payment: Money, asOf: Date): RepaymentStep {
    if (!current.isActive) {
      throw new InvalidStateError('Loan not active');
    }
    if (!payment.isPositive()) {
      throw new ValidationError('Payment amount must be greater than zero');
    }

    const accrued = this.accrueOverdueInterest(current, asOf);
    const balance = accrued.state.currentBalance;
    if (payment.greaterThan(balance)) {
      throw new ValidationError(
        `Payment exceeds balance: payment ${payment}, outstanding ${balance}`,
      );
    }

    const remaining = balance.minus(payment);
    const settled = remaining.isZero();
    const state: LoanLedgerState = settled
      ? { ...accrued.state, currentBalance: remaining, isActive: false, closedOn: asOf }
      : { ...accrued.state, currentBalance: remaining, nextDueDate: this.nextDueDate(asOf) };

    return {
      state,
      charges: accrued.charges,
      entries: [
        ...accrued.entries,
        {
          kind: LoanTransactionKinds.REPAYMENT,
          amount: payment,
          note: settled
            ? `Loan repayment of ${payment}; loan settled`
            : `Loan repayment of ${payment}`,
          effectiveDate: asOf,
          periodIndex: null,
        },
      ],
    };
  }

  /** Left fold of a loan ledger from zero; the authoritative balance. */
  replayBalance(entries: Iterable<LedgerEntryLike>): Money {
    let balance = Money.zero();
    for (const entry of entries) {
      balance =
        entry.kind === LoanTransactionKinds.REPAYMENT
          ? balance.minus(entry.amount)
          : balance.plus(entry.amount);
    }
    return balance;
  }

  overdueWarnings(charges: OverdueCharge[]): LedgerWarning[] {
    if (charges.length === 0) return [];
    const totalCharged = Money.sum(charges.map((charge) => charge.chargeAmount));
    return [
      {
        code: LedgerWarningCodes.OVERDUE_INTEREST_APPLIED,
        message: `Applied overdue interest of ${totalCharged} (${charges.length} period(s) overdue)`,
        periods: charges.length,
        totalCharged,
      },
    ];
  }

  isOverdue(state: Pick<LoanLedgerState, 'isActive' | 'nextDueDate'>, asOf: Date): boolean {
    return state.isActive && isAfter(asOf, state.nextDueDate);
  }
}
