import { ValidationError } from '../errors/ledger.errors';
import { Money } from './money';

/** Parses a request amount; it must be positive and fit a money column. */
export function parsePositiveAmount(value: string, field = 'Amount'): Money {
  let amount: Money;
  try {
    amount = Money.of(value);
  } catch {
    throw new ValidationError(`${field} must be a decimal with at most two places`);
  }
  if (!amount.isPositive()) {
    throw new ValidationError(`${field} must be greater than zero`);
  }
  if (amount.exceedsCapacity()) {
    throw new ValidationError(`${field} must not exceed ${Money.MAX}`);
  }
  return amount;
}
