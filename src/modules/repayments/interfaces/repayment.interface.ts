import { Loan } from '../../loans/entities/loan.entity';
import { LedgerWarning, OverdueCharge } from '../../loans/interfaces/loan-ledger.interface';

export interface RepaymentResult {
  loan: Loan;
  /** Overdue interest charged just before the payment was applied. */
  overdueCharges: OverdueCharge[];
  warnings: LedgerWarning[];
}
