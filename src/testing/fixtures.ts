import Decimal from 'decimal.js';
import { Money } from '../common/money/money';
import { Loan } from '../modules/loans/entities/loan.entity';
import { Member } from '../modules/members/entities/member.entity';

/** An active 10000.00 loan issued on 2024-01-10, due 2024-02-05. */
export function buildLoan(overrides: Partial<Loan> = {}): Loan {
  return Object.assign(new Loan(), {
    id: 'loan-1',
    memberId: 'member-1',
    principal: Money.of('10000.00'),
    interestRate: new Decimal('0.20'),
    interestAmount: Money.of('2000.00'),
    totalAmount: Money.of('12000.00'),
    currentBalance: Money.of('12000.00'),
    issueDate: '2024-01-10',
    nextDueDate: '2024-02-05',
    isActive: true,
    closedOn: null,
    ...overrides,
  });
}

export function buildMember(overrides: Partial<Member> = {}): Member {
  return Object.assign(new Member(), {
    id: 'member-1',
    memberNumber: 'M-001',
    fullName: 'Test Member',
    joinedOn: '2024-01-01',
    savingsBalance: Money.of('1000.00'),
    ...overrides,
  });
}
