import Decimal from 'decimal.js';
import { Money } from '../common/money/money';
import { DEFAULT_DUE_DAY } from '../common/utils/due-date.util';

export const LEDGER_POLICY = Symbol('LEDGER_POLICY');

/**
 * Business constants of the scheme. Built once from the environment and
 * injected, so tests can run alternate rates side by side.
 */
export interface LedgerPolicy {
  /** Flat interest charged once at issuance, as a fraction of principal. */
  readonly loanInterestRate: Decimal;
  /** Rate compounded per overdue period on the outstanding balance. */
  readonly overdueInterestRate: Decimal;
  readonly dueDay: number;
  readonly initialDeposit: Money;
  readonly monthlySubscription: Money;
}

export type LedgerPolicyOverrides = {
  -readonly [K in keyof LedgerPolicy]?: LedgerPolicy[K];
};

export const DEFAULT_LEDGER_POLICY: LedgerPolicy = Object.freeze({
  loanInterestRate: new Decimal('0.20'),
  overdueInterestRate: new Decimal('0.20'),
  dueDay: DEFAULT_DUE_DAY,
  initialDeposit: Money.of('1000.00'),
  monthlySubscription: Money.of('500.00'),
});

export function createLedgerPolicy(overrides: LedgerPolicyOverrides = {}): LedgerPolicy {
  const policy = { ...DEFAULT_LEDGER_POLICY, ...overrides };
  if (!Number.isInteger(policy.dueDay) || policy.dueDay < 1 || policy.dueDay > 28) {
    throw new RangeError(`Due day must be an integer between 1 and 28, got ${policy.dueDay}`);
  }
  if (policy.loanInterestRate.isNegative() || policy.overdueInterestRate.isNegative()) {
    throw new RangeError('Interest rates cannot be negative');
  }
  return Object.freeze(policy);
}
