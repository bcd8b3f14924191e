import {
  addMonths,
  differenceInCalendarMonths,
  getDate,
  isAfter,
  setDate,
  startOfDay,
} from 'date-fns';

export const DEFAULT_DUE_DAY = 5;

/**
 * Next due date relative to a reference date: the due day of the same month
 * when the reference is on or before it, otherwise the due day of the
 * following month.
 */
export function nextDueDate(reference: Date, dueDay = DEFAULT_DUE_DAY): Date {
  const day = startOfDay(reference);
  const anchor = getDate(day) <= dueDay ? day : addMonths(day, 1);
  return setDate(anchor, dueDay);
}

/**
 * Number of due-day boundaries `b` with `dueDate <= b < asOf`. Zero when the
 * loan is not overdue, at least one otherwise.
 */
export function countOverduePeriods(
  dueDate: Date,
  asOf: Date,
  dueDay = DEFAULT_DUE_DAY,
): number {
  const due = startOfDay(dueDate);
  const current = startOfDay(asOf);
  if (!isAfter(current, due)) return 0;

  const crossedThisMonth = getDate(current) > dueDay ? 1 : 0;
  return differenceInCalendarMonths(current, due) + crossedThisMonth;
}
