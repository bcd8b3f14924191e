import { Money } from '../../../common/money/money';
import { SavingsTransaction } from '../entities/savings-transaction.entity';

export interface SavingsPaymentResult {
  memberId: string;
  savingsBalance: Money;
  transaction: SavingsTransaction;
}
