import { Money } from '../../../common/money/money';
import { LedgerWarning, OverdueCharge } from '../../loans/interfaces/loan-ledger.interface';

export interface OverdueApplication {
  loanId: string;
  memberId: string;
  charges: OverdueCharge[];
  totalCharged: Money;
  nextDueDate: string;
  currentBalance: Money;
  warnings: LedgerWarning[];
}

export interface OverdueFailure {
  loanId: string;
  error: string;
}

export interface OverdueBatchReport {
  asOfDate: string;
  loansScanned: number;
  loansCharged: number;
  totalInterestCharged: Money;
  results: OverdueApplication[];
  failures: OverdueFailure[];
}
