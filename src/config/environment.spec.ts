import { ledgerPolicyFromEnvironment, validateEnvironment } from './environment';
import { createLedgerPolicy, DEFAULT_LEDGER_POLICY } from './ledger-policy';

describe('validateEnvironment', () => {
  it('applies defaults for a sqlite setup', () => {
    const env = validateEnvironment({ DB_TYPE: 'better-sqlite3' });

    expect(env.DB_TYPE).toBe('better-sqlite3');
    expect(env.DB_DATABASE).toBe('ledger.sqlite');
    expect(env.DB_SYNCHRONIZE).toBe(false);
    expect(env.DB_LOGGING).toBe(false);
  });

  it('converts numeric and boolean strings', () => {
    const env = validateEnvironment({
      DB_TYPE: 'better-sqlite3',
      PORT: '8080',
      DB_SYNCHRONIZE: 'true',
      LOAN_DUE_DAY: '10',
    });

    expect(env.PORT).toBe(8080);
    expect(env.DB_SYNCHRONIZE).toBe(true);
    expect(env.LOAN_DUE_DAY).toBe(10);
  });

  it('requires DATABASE_URL for postgres', () => {
    expect(() => validateEnvironment({ DB_TYPE: 'postgres' })).toThrow(
      'Invalid environment: DATABASE_URL is required when DB_TYPE=postgres',
    );
  });

  it('rejects unknown database types and out-of-range due days', () => {
    expect(() => validateEnvironment({ DB_TYPE: 'mysql' })).toThrow(/^Invalid environment/);
    expect(() =>
      validateEnvironment({ DB_TYPE: 'better-sqlite3', LOAN_DUE_DAY: '31' }),
    ).toThrow(/^Invalid environment/);
  });
});

describe('ledger policy', () => {
  it('defaults to 20% issuance and overdue rates on the 5th', () => {
    const policy = ledgerPolicyFromEnvironment(validateEnvironment({ DB_TYPE: 'better-sqlite3' }));

    expect(policy.loanInterestRate.toString()).toBe('0.2');
    expect(policy.overdueInterestRate.toString()).toBe('0.2');
    expect(policy.dueDay).toBe(5);
    expect(policy.initialDeposit.toFixed()).toBe('1000.00');
    expect(policy.monthlySubscription.toFixed()).toBe('500.00');
  });

  it('takes overrides from the environment', () => {
    const policy = ledgerPolicyFromEnvironment(
      validateEnvironment({
        DB_TYPE: 'better-sqlite3',
        LOAN_INTEREST_RATE: '0.1',
        OVERDUE_INTEREST_RATE: '0.05',
        LOAN_DUE_DAY: '1',
        MONTHLY_SUBSCRIPTION: '250.50',
      }),
    );

    expect(policy.loanInterestRate.toString()).toBe('0.1');
    expect(policy.overdueInterestRate.toString()).toBe('0.05');
    expect(policy.dueDay).toBe(1);
    expect(policy.monthlySubscription.toFixed()).toBe('250.50');
    expect(policy.initialDeposit.equals(DEFAULT_LEDGER_POLICY.initialDeposit)).toBe(true);
  });

  it('rejects an invalid due day', () => {
    expect(() => createLedgerPolicy({ dueDay: 29 })).toThrow(RangeError);
  });
});
