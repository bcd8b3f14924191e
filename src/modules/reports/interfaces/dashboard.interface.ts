import { Money } from '../../../common/money/money';

export interface Dashboard {
  asOfDate: string;
  totalMembers: number;
  totalSavings: Money;
  activeLoans: number;
  overdueLoans: number;
  outstandingBalance: Money;
}
