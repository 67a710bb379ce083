import { DateTime } from 'luxon';
import { ValidationError } from './errors.js';

/**
 * Calendar helpers. Dates travel as `YYYY-MM-DD` keys and times as `HH:mm:ss`,
 * both in the business timezone, which is how the visits table stores them.
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const DATE_KEY_RE = /^\d{4}-\d{2}-\d{2}$/;

export type PeriodPreset = 'today' | 'last_7_days' | 'this_month';

export const PERIOD_PRESETS: readonly PeriodPreset[] = ['today', 'last_7_days', 'this_month'];

export interface DateRange {
  from: string;
  to: string;
}

export function zonedNow(clock: Clock, timezone: string): DateTime {
  return DateTime.fromJSDate(clock(), { zone: timezone });
}

export function toDateKey(dt: DateTime): string {
  return dt.toFormat('yyyy-MM-dd');
}

export function toTimeKey(dt: DateTime): string {
  return dt.toFormat('HH:mm:ss');
}

export function isDateKey(value: string): boolean {
  return DATE_KEY_RE.test(value) && DateTime.fromISO(value, { zone: 'utc' }).isValid;
}

function parseDateKey(value: string): DateTime {
  return DateTime.fromISO(value, { zone: 'utc' });
}

export function addDays(dateKey: string, days: number): string {
  return toDateKey(parseDateKey(dateKey).plus({ days }));
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number {
  return Math.round(parseDateKey(to).diff(parseDateKey(from), 'days').days);
}

/** Every date key from `from` through `to`, inclusive. */
export function eachDay(from: string, to: string): string[] {
  const days: string[] = [];
  const total = daysBetween(from, to);
  for (let i = 0; i <= total; i++) {
    days.push(addDays(from, i));
  }
  return days;
}

export function isPeriodPreset(value: string): value is PeriodPreset {
  return (PERIOD_PRESETS as readonly string[]).includes(value);
}

export function presetRange(preset: PeriodPreset, today: string): DateRange {
  switch (preset) {
    case 'today':
      return { from: today, to: today };
    case 'last_7_days':
      return { from: addDays(today, -6), to: today };
    case 'this_month':
      return { from: `${today.slice(0, 8)}01`, to: today };
  }
}

export interface RangeQuery {
  period?: string;
  from?: string;
  to?: string;
}

export const MAX_RANGE_DAYS = 366;

/**
 * Resolves either a preset or an explicit `from`/`to` pair (inclusive) into a
 * date range. With neither, the current month is used.
 */
export function resolveDateRange(query: RangeQuery, today: string): DateRange {
  if (query.period !== undefined) {
    if (!isPeriodPreset(query.period)) {
      throw new ValidationError(
        `Invalid period: must be one of ${PERIOD_PRESETS.join(', ')}`,
      );
    }
    return presetRange(query.period, today);
  }

  if (query.from === undefined && query.to === undefined) {
    return presetRange('this_month', today);
  }

  if (query.from === undefined || query.to === undefined) {
    throw new ValidationError('Both from and to are required for a custom range');
  }
  if (!isDateKey(query.from) || !isDateKey(query.to)) {
    throw new ValidationError('Invalid date: from and to must be YYYY-MM-DD');
  }

  const span = daysBetween(query.from, query.to);
  if (span < 0) {
    throw new ValidationError('Invalid range: from must not be after to');
  }
  if (span + 1 > MAX_RANGE_DAYS) {
    throw new ValidationError(`Invalid range: at most ${MAX_RANGE_DAYS} days`);
  }

  return { from: query.from, to: query.to };
}
