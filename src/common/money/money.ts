import Decimal from 'decimal.js';

/**
 * Fixed-point monetary amount with two decimal places.
 *
 * Every result is rounded half-even to cents, so repeated compounding of a
 * stored balance never accumulates binary floating-point error.
 */
export class Money {
  static readonly SCALE = 2;
  static readonly ROUNDING = Decimal.ROUND_HALF_EVEN;

  private static readonly PATTERN = /^-?\d+(\.\d{1,2})?$/;

  /** Largest amount a `decimal(14,2)` column holds. */
  static readonly MAX = new Money(new Decimal('999999999999.99'));

  private constructor(private readonly value: Decimal) {}

  static zero(): Money {
    return new Money(new Decimal(0));
  }

  /**
   * Builds an amount from a decimal string or a database value. Strings with
   * more than two fractional digits are rejected; use {@link Money.round} for
   * computed values.
   */
  static of(value: string | number | Decimal): Money {
    if (value instanceof Decimal) {
      return Money.round(value);
    }
    const text = typeof value === 'number' ? value.toString() : value.trim();
    if (!Money.PATTERN.test(text)) {
      throw new RangeError(`Invalid money amount: "${text}"`);
    }
    return new Money(new Decimal(text));
  }

  static round(value: Decimal): Money {
    return new Money(value.toDecimalPlaces(Money.SCALE, Money.ROUNDING));
  }

  static sum(amounts: Iterable<Money>): Money {
    let total = Money.zero();
    for (const amount of amounts) {
      total = total.plus(amount);
    }
    return total;
  }

  plus(other: Money): Money {
    return new Money(this.value.plus(other.value));
  }

  minus(other: Money): Money {
    return new Money(this.value.minus(other.value));
  }

  times(factor: Decimal | string | number): Money {
    return Money.round(this.value.times(factor));
  }

  exceedsCapacity(): boolean {
    return this.value.abs().greaterThan(Money.MAX.value);
  }

  isZero(): boolean {
    return this.value.isZero();
  }

  isPositive(): boolean {
    return this.value.greaterThan(0);
  }

  isNegative(): boolean {
    return this.value.lessThan(0);
  }

  equals(other: Money): boolean {
    return this.value.equals(other.value);
  }

  greaterThan(other: Money): boolean {
    return this.value.greaterThan(other.value);
  }

  lessThan(other: Money): boolean {
    return this.value.lessThan(other.value);
  }

  compare(other: Money): number {
    return this.value.comparedTo(other.value);
  }

  toDecimal(): Decimal {
    return this.value;
  }

  toFixed(): string {
    return this.value.toFixed(Money.SCALE);
  }

  toString(): string {
    return this.toFixed();
  }

  toJSON(): string {
    return this.toFixed();
  }
}
