import { Money } from '../../../common/money/money';
import { LoanTransaction } from '../entities/loan-transaction.entity';
import { Loan } from '../entities/loan.entity';

export interface LoanLedgerView {
  loan: Loan;
  transactions: LoanTransaction[];
  /** Balance rebuilt from the ledger; equals `loan.currentBalance` when in balance. */
  replayedBalance: Money;
  inBalance: boolean;
}
