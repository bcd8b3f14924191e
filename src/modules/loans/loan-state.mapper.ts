import { parseIsoDate, toIsoDate } from '../../common/utils/dates.util';
import { LoanTransaction } from './entities/loan-transaction.entity';
import { Loan } from './entities/loan.entity';
import { LedgerEntryDraft, LoanLedgerState } from './interfaces/loan-ledger.interface';

export function toLedgerState(loan: Loan): LoanLedgerState {
  return {
    principal: loan.principal,
    interestRate: loan.interestRate,
    interestAmount: loan.interestAmount,
    totalAmount: loan.totalAmount,
    currentBalance: loan.currentBalance,
    issueDate: parseIsoDate(loan.issueDate),
    nextDueDate: parseIsoDate(loan.nextDueDate),
    isActive: loan.isActive,
    closedOn: loan.closedOn ? parseIsoDate(loan.closedOn) : null,
  };
}

/** Copies an engine state onto the entity in place. */
export function applyLedgerState(loan: Loan, state: LoanLedgerState): Loan {
  loan.principal = state.principal;
  loan.interestRate = state.interestRate;
  loan.interestAmount = state.interestAmount;
  loan.totalAmount = state.totalAmount;
  loan.currentBalance = state.currentBalance;
  loan.issueDate = toIsoDate(state.issueDate);
  loan.nextDueDate = toIsoDate(state.nextDueDate);
  loan.isActive = state.isActive;
  loan.closedOn = state.closedOn ? toIsoDate(state.closedOn) : null;
  return loan;
}

export function toTransactionRows(
  loanId: string,
  drafts: LedgerEntryDraft[],
): Array<Pick<LoanTransaction, 'loanId' | 'kind' | 'amount' | 'note' | 'effectiveDate' | 'periodIndex'>> {
  return drafts.map((draft) => ({
    loanId,
    kind: draft.kind,
    amount: draft.amount,
    note: draft.note,
    effectiveDate: toIsoDate(draft.effectiveDate),
    periodIndex: draft.periodIndex,
  }));
}
