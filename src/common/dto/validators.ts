import { applyDecorators } from '@nestjs/common';
import { Transform } from 'class-transformer';
import { IsDecimal, IsISO8601, Matches } from 'class-validator';
import { ISO_DATE_PATTERN } from '../utils/dates.util';

/** A `yyyy-MM-dd` calendar date that exists. */
export function IsCalendarDate() {
  return applyDecorators(
    Matches(ISO_DATE_PATTERN, { message: '$property must be formatted as yyyy-MM-dd' }),
    IsISO8601({ strict: true }),
  );
}

/**
 * Money travels as a decimal string; plain JSON numbers are accepted and
 * converted before validation.
 */
export function IsMoneyAmount() {
  return applyDecorators(
    Transform(({ value }: { value: unknown }) => (typeof value === 'number' ? String(value) : value)),
    IsDecimal(
      { decimal_digits: '0,2' },
      { message: '$property must be a decimal amount with at most two places' },
    ),
  );
}
