/**
 * Series Utilities
 *
 * Ordering checks, as-of joins and calendar arithmetic shared by every
 * component. Daily and weekly series are only ever aligned through asOf.
 */

import { differenceInCalendarDays, format, isValid, parseISO, subDays, subMonths } from 'date-fns';
import { UnsortedSeriesError } from '../core/errors.js';
import type { CalendarPeriod } from '../core/config.js';
import type { IsoDate } from '../core/types/regime.types.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export interface Dated {
  date: IsoDate;
}

export interface AsOfOptions {
  /** Reject matches older than this many calendar days */
  maxLagDays?: number;
}

export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && isValid(parseISO(value));
}

/**
 * Fail fast unless dates are strictly ascending
 */
export function assertAscending(series: readonly Dated[], seriesId: string): void {
  for (let i = 1; i < series.length; i++) {
    if (series[i].date <= series[i - 1].date) {
      throw new UnsortedSeriesError(seriesId, i, series[i - 1].date, series[i].date);
    }
  }
}

/**
 * Index of the last observation dated on or before `date`, or -1
 */
export function asOfIndex(series: readonly Dated[], date: IsoDate): number {
  let lo = 0;
  let hi = series.length - 1;
  let found = -1;

  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (series[mid].date <= date) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }

  return found;
}

/**
 * Nearest prior-or-equal observation
 */
export function asOf<T extends Dated>(
  series: readonly T[],
  date: IsoDate,
  options: AsOfOptions = {}
): T | undefined {
  const idx = asOfIndex(series, date);
  if (idx < 0) return undefined;

  const match = series[idx];
  if (options.maxLagDays !== undefined && daysBetween(match.date, date) > options.maxLagDays) {
    return undefined;
  }
  return match;
}

/**
 * As-of join of a list of dates against a series
 */
export function alignAsOf<T extends Dated>(
  dates: readonly IsoDate[],
  series: readonly T[],
  options: AsOfOptions = {}
): Array<T | undefined> {
  return dates.map(date => asOf(series, date, options));
}

/**
 * Subtract a calendar period; month arithmetic clamps to month end
 */
export function shiftDate(date: IsoDate, period: CalendarPeriod): IsoDate {
  const parsed = parseISO(date);
  const shifted = period.unit === 'days'
    ? subDays(parsed, period.amount)
    : subMonths(parsed, period.amount);
  return format(shifted, 'yyyy-MM-dd');
}

export function daysBetween(from: IsoDate, to: IsoDate): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

/**
 * Latest observation as of `date` and the observation one period before it.
 * `past` is undefined when the lookback date predates the series start;
 * both are undefined when the latest observation is older than `maxLagDays`.
 */
export function lookbackPair<T extends Dated>(
  series: readonly T[],
  date: IsoDate,
  period: CalendarPeriod,
  options: AsOfOptions = {}
): { current: T | undefined; past: T | undefined } {
  const current = asOf(series, date, options);
  const past = current ? asOf(series, shiftDate(current.date, period)) : undefined;
  return { current, past };
}
