import { format, isValid, parse, startOfDay } from 'date-fns';

export const ISO_DATE_FORMAT = 'yyyy-MM-dd';
export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Parses a `yyyy-MM-dd` calendar date to local midnight. */
export function parseIsoDate(value: string): Date {
  const parsed = ISO_DATE_PATTERN.test(value)
    ? parse(value, ISO_DATE_FORMAT, new Date(0))
    : new Date(Number.NaN);
  if (!isValid(parsed)) {
    throw new RangeError(`Invalid calendar date: "${value}"`);
  }
  return parsed;
}

export function toIsoDate(date: Date): string {
  return format(date, ISO_DATE_FORMAT);
}

export function today(): Date {
  return startOfDay(new Date());
}

/** Resolves an optional request date, defaulting to today at the edge of the API. */
export function resolveAsOfDate(value?: string): Date {
  return value ? parseIsoDate(value) : today();
}
