import { describe, it, expect } from 'vitest';
import { computeWindow, isValidTimezone } from '../window.js';
import { ConfigurationError } from '../../shared/errors.js';

describe('computeWindow', () => {
  it('covers the previous 24 hours in the configured timezone', () => {
    const window = computeWindow(new Date('2024-01-15T08:00:00+09:00'), {
      lookbackHours: 24,
      timezone: 'Asia/Tokyo',
      alignTo: 'hour',
    });

    expect(window.start.getTime()).toBe(new Date('2024-01-14T08:00:00+09:00').getTime());
    expect(window.end.getTime()).toBe(new Date('2024-01-15T08:00:00+09:00').getTime());
    expect(window.start.toISOString()).toBe('2024-01-13T23:00:00.000Z');
    expect(window.end.toISOString()).toBe('2024-01-14T23:00:00.000Z');
    expect(window.timezone).toBe('Asia/Tokyo');
  });

  it('gives a late tick the same window', () => {
    const opts = { lookbackHours: 24, timezone: 'Asia/Tokyo', alignTo: 'hour' as const };
    const onTime = computeWindow(new Date('2024-01-15T08:00:00+09:00'), opts);
    const late = computeWindow(new Date('2024-01-15T08:00:42.250+09:00'), opts);

    expect(late.start.getTime()).toBe(onTime.start.getTime());
    expect(late.end.getTime()).toBe(onTime.end.getTime());
  });

  it('aligns to local midnight for day boundaries', () => {
    // 01:30 on 2 June in Kolkata (UTC+05:30)
    const window = computeWindow(new Date('2024-06-01T20:00:00Z'), {
      lookbackHours: 24,
      timezone: 'Asia/Kolkata',
      alignTo: 'day',
    });

    expect(window.end.toISOString()).toBe('2024-06-01T18:30:00.000Z');
    expect(window.start.toISOString()).toBe('2024-05-31T18:30:00.000Z');
  });

  it('aligns to the minute', () => {
    const window = computeWindow(new Date('2024-01-01T10:15:30.500Z'), {
      lookbackHours: 1,
      timezone: 'UTC',
      alignTo: 'minute',
    });

    expect(window.end.toISOString()).toBe('2024-01-01T10:15:00.000Z');
    expect(window.start.toISOString()).toBe('2024-01-01T09:15:00.000Z');
  });

  it('makes consecutive daily windows meet exactly', () => {
    const opts = { lookbackHours: 24, timezone: 'Europe/Berlin', alignTo: 'hour' as const };
    const first = computeWindow(new Date('2024-02-10T07:00:05Z'), opts);
    const second = computeWindow(new Date('2024-02-11T07:00:09Z'), opts);

    expect(second.start.getTime()).toBe(first.end.getTime());
  });

  it('keeps daily windows contiguous when the clocks go back', () => {
    // 08:00 local on both days; New York leaves daylight time on 3 November
    const opts = { lookbackHours: 24, timezone: 'America/New_York', alignTo: 'hour' as const };
    const first = computeWindow(new Date('2024-11-02T12:00:05Z'), opts);
    const second = computeWindow(new Date('2024-11-03T13:00:05Z'), opts);

    expect(first.end.toISOString()).toBe('2024-11-02T12:00:00.000Z');
    expect(second.start.toISOString()).toBe('2024-11-02T12:00:00.000Z');
    expect(second.end.toISOString()).toBe('2024-11-03T13:00:00.000Z');
  });

  it('keeps midnight-aligned windows contiguous when the clocks go back', () => {
    const opts = { lookbackHours: 24, timezone: 'America/New_York', alignTo: 'day' as const };
    const first = computeWindow(new Date('2024-11-03T12:00:05Z'), opts);
    const second = computeWindow(new Date('2024-11-04T13:00:05Z'), opts);

    expect(first.end.toISOString()).toBe('2024-11-03T04:00:00.000Z');
    expect(second.start.toISOString()).toBe('2024-11-03T04:00:00.000Z');
    expect(second.end.toISOString()).toBe('2024-11-04T05:00:00.000Z');
  });

  it('gives a 23-hour window on the day the clocks go forward', () => {
    const window = computeWindow(new Date('2024-03-10T12:00:00Z'), {
      lookbackHours: 24,
      timezone: 'America/New_York',
      alignTo: 'hour',
    });

    expect(window.start.toISOString()).toBe('2024-03-09T13:00:00.000Z');
    expect(window.end.toISOString()).toBe('2024-03-10T12:00:00.000Z');
  });

  it('counts whole days on the calendar and the remainder in hours', () => {
    const window = computeWindow(new Date('2024-11-03T13:00:05Z'), {
      lookbackHours: 36,
      timezone: 'America/New_York',
      alignTo: 'hour',
    });

    expect(window.start.toISOString()).toBe('2024-11-02T00:00:00.000Z');
    expect(window.end.toISOString()).toBe('2024-11-03T13:00:00.000Z');
  });

  it('returns a frozen window with start before end', () => {
    const window = computeWindow(new Date('2024-01-15T00:00:00Z'), {
      lookbackHours: 0.5,
      timezone: 'UTC',
      alignTo: 'minute',
    });

    expect(Object.isFrozen(window)).toBe(true);
    expect(window.end.getTime() - window.start.getTime()).toBe(30 * 60 * 1000);
  });

  it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])('rejects lookback %s', (lookbackHours) => {
    expect(() =>
      computeWindow(new Date('2024-01-15T00:00:00Z'), { lookbackHours, timezone: 'UTC', alignTo: 'hour' }),
    ).toThrow(ConfigurationError);
  });

  it('rejects an unknown timezone', () => {
    expect(() =>
      computeWindow(new Date('2024-01-15T00:00:00Z'), {
        lookbackHours: 24,
        timezone: 'Mars/Olympus_Mons',
        alignTo: 'hour',
      }),
    ).toThrow('Unknown timezone: Mars/Olympus_Mons');
  });
});

describe('isValidTimezone', () => {
  it('accepts IANA names and UTC', () => {
    expect(isValidTimezone('UTC')).toBe(true);
    expect(isValidTimezone('America/New_York')).toBe(true);
  });

  it('rejects nonsense', () => {
    expect(isValidTimezone('Not/AZone')).toBe(false);
  });
});
