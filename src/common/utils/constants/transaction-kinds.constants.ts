/**
 * Savings ledger entry kinds
 */
export const SavingsTransactionKinds = {
  INITIAL_DEPOSIT: 'initial_deposit',
  SUBSCRIPTION: 'subscription',
} as const;

export type SavingsTransactionKind =
  (typeof SavingsTransactionKinds)[keyof typeof SavingsTransactionKinds];

/**
 * Loan ledger entry kinds. Issuance and overdue interest increase the
 * balance, repayments decrease it.
 */
export const LoanTransactionKinds = {
  LOAN_ISSUED: 'loan_issued',
  REPAYMENT: 'repayment',
  OVERDUE_INTEREST: 'overdue_interest',
} as const;

export type LoanTransactionKind =
  (typeof LoanTransactionKinds)[keyof typeof LoanTransactionKinds];

/**
 * Audited operations
 */
export const LedgerOperations = {
  MEMBER_REGISTRATION: 'MEMBER_REGISTRATION',
  SAVINGS_PAYMENT: 'SAVINGS_PAYMENT',
  LOAN_ISSUE: 'LOAN_ISSUE',
  REPAYMENT: 'REPAYMENT',
  OVERDUE_INTEREST: 'OVERDUE_INTEREST',
} as const;

export type LedgerOperation = (typeof LedgerOperations)[keyof typeof LedgerOperations];

/**
 * Structured warning codes surfaced to API callers
 */
export const LedgerWarningCodes = {
  OVERDUE_INTEREST_APPLIED: 'OVERDUE_INTEREST_APPLIED',
} as const;

export type LedgerWarningCode = (typeof LedgerWarningCodes)[keyof typeof LedgerWarningCodes];
