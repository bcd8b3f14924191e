import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsDecimal,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import Decimal from 'decimal.js';
import { Money } from '../common/money/money';
import { createLedgerPolicy, LedgerPolicy, LedgerPolicyOverrides } from './ledger-policy';

export const DATABASE_TYPES = ['postgres', 'better-sqlite3'] as const;
export type DatabaseType = (typeof DATABASE_TYPES)[number];

const toBoolean = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.toLowerCase() === 'true' : value;

const toInteger = ({ value }: { value: unknown }) =>
  typeof value === 'string' && value.trim() !== '' ? Number(value) : value;

export class EnvironmentVariables {
  @IsOptional()
  @Transform(toInteger)
  @IsInt()
  PORT?: number;

  @IsIn(DATABASE_TYPES)
  DB_TYPE: DatabaseType = 'postgres';

  @IsOptional()
  @IsString()
  DATABASE_URL?: string;

  @IsString()
  DB_DATABASE = 'ledger.sqlite';

  @Transform(toBoolean)
  @IsBoolean()
  DB_SYNCHRONIZE = false;

  @Transform(toBoolean)
  @IsBoolean()
  DB_LOGGING = false;

  @IsOptional()
  @IsDecimal()
  LOAN_INTEREST_RATE?: string;

  @IsOptional()
  @IsDecimal()
  OVERDUE_INTEREST_RATE?: string;

  @IsOptional()
  @Transform(toInteger)
  @IsInt()
  @Min(1)
  @Max(28)
  LOAN_DUE_DAY?: number;

  @IsOptional()
  @IsDecimal({ decimal_digits: '0,2' })
  INITIAL_DEPOSIT?: string;

  @IsOptional()
  @IsDecimal({ decimal_digits: '0,2' })
  MONTHLY_SUBSCRIPTION?: string;
}

export function validateEnvironment(
  config: Record<string, string | undefined>,
): EnvironmentVariables {
  const env = plainToInstance(EnvironmentVariables, config, {
    exposeDefaultValues: true,
  });
  const errors = validateSync(env, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  if (env.DB_TYPE === 'postgres' && !env.DATABASE_URL) {
    throw new Error('Invalid environment: DATABASE_URL is required when DB_TYPE=postgres');
  }
  return env;
}

export function ledgerPolicyFromEnvironment(env: EnvironmentVariables): LedgerPolicy {
  const overrides: LedgerPolicyOverrides = {};
  if (env.LOAN_INTEREST_RATE) overrides.loanInterestRate = new Decimal(env.LOAN_INTEREST_RATE);
  if (env.OVERDUE_INTEREST_RATE) {
    overrides.overdueInterestRate = new Decimal(env.OVERDUE_INTEREST_RATE);
  }
  if (env.LOAN_DUE_DAY !== undefined) overrides.dueDay = env.LOAN_DUE_DAY;
  if (env.INITIAL_DEPOSIT) overrides.initialDeposit = Money.of(env.INITIAL_DEPOSIT);
  if (env.MONTHLY_SUBSCRIPTION) overrides.monthlySubscription = Money.of(env.MONTHLY_SUBSCRIPTION);
  return createLedgerPolicy(overrides);
}
