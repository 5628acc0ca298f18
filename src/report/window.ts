import { TZDate } from '@date-fns/tz';
import { startOfDay, startOfHour, startOfMinute, subDays } from 'date-fns';
import { ConfigurationError } from '../shared/errors.js';
import type { ReportWindow } from './types.js';

export type RunBoundary = 'minute' | 'hour' | 'day';

export interface WindowOptions {
  lookbackHours: number;
  timezone: string;
  alignTo: RunBoundary;
}

const HOUR_MS = 3_600_000;
const HOURS_PER_DAY = 24;

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

function alignDown(instant: TZDate, boundary: RunBoundary): TZDate {
  switch (boundary) {
    case 'minute':
      return startOfMinute(instant);
    case 'hour':
      return startOfHour(instant);
    case 'day':
      return startOfDay(instant);
  }
}

/**
 * Derive the `[start, end)` window for a run starting at `now`.
 *
 * `end` is `now` truncated to the current run boundary in the configured
 * timezone, so a tick that fires a few seconds late still produces the same
 * window and consecutive daily runs meet without gap or overlap.
 *
 * Whole days of lookback are counted on the local calendar, so a window that
 * spans a daylight-saving change is 23 or 25 hours long. Only the remainder
 * is subtracted as elapsed hours.
 */
export function computeWindow(now: Date, options: WindowOptions): ReportWindow {
  const { lookbackHours, timezone, alignTo } = options;

  if (!Number.isFinite(lookbackHours) || lookbackHours <= 0) {
    throw new ConfigurationError('Lookback must be a positive number of hours', { lookbackHours });
  }
  if (!isValidTimezone(timezone)) {
    throw new ConfigurationError(`Unknown timezone: ${timezone}`, { timezone });
  }
  if (Number.isNaN(now.getTime())) {
    throw new ConfigurationError('Current time is not a valid date');
  }

  const end = alignDown(new TZDate(now.getTime(), timezone), alignTo);
  const days = Math.floor(lookbackHours / HOURS_PER_DAY);
  const remainderMs = Math.round((lookbackHours - days * HOURS_PER_DAY) * HOUR_MS);
  const startMs = subDays(end, days).getTime() - remainderMs;

  return Object.freeze({
    start: new Date(startMs),
    end: new Date(end.getTime()),
    timezone,
  });
}
