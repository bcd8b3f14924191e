import Decimal from 'decimal.js';
import { Money } from '../../../common/money/money';
import type {
  LedgerWarningCode,
  LoanTransactionKind,
} from '../../../common/utils/constants/transaction-kinds.constants';

/** The part of a loan the interest engine reads and evolves. */
export interface LoanLedgerState {
  principal: Money;
  interestRate: Decimal;
  interestAmount: Money;
  totalAmount: Money;
  currentBalance: Money;
  issueDate: Date;
  nextDueDate: Date;
  isActive: boolean;
  closedOn: Date | null;
}

export interface LedgerEntryDraft {
  kind: LoanTransactionKind;
  amount: Money;
  note: string;
  effectiveDate: Date;
  periodIndex: number | null;
}

export interface OverdueCharge {
  periodIndex: number;
  chargeAmount: Money;
  newBalance: Money;
}

export interface LedgerWarning {
  code: LedgerWarningCode;
  message: string;
  periods: number;
  totalCharged: Money;
}

/** A new loan state plus the ledger entries that produced it. */
export interface LedgerStep {
  state: LoanLedgerState;
  entries: LedgerEntryDraft[];
}

export interface OverdueStep extends LedgerStep {
  charges: OverdueCharge[];
}

export type RepaymentStep = OverdueStep;

/** Minimal ledger row shape needed to replay a balance. */
export interface LedgerEntryLike {
  kind: LoanTransactionKind;
  amount: Money;
}
