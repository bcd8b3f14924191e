import { Money } from '../../../common/money/money';

export interface ActiveLoanSummary {
  loanId: string;
  principal: Money;
  currentBalance: Money;
  nextDueDate: string;
  isOverdue: boolean;
  daysOverdue: number;
}

export interface MemberSummary {
  memberId: string;
  memberNumber: string;
  fullName: string;
  asOfDate: string;
  savingsBalance: Money;
  activeLoan: ActiveLoanSummary | null;
}
