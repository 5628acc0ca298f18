import { describe, it, expect } from 'vitest';
import { NO_RECORDS, ReportFormatter, describeWindow, formatInTimezone, reportDate } from '../formatter.js';
import { createReportRow, fingerprintRow, toCellValue } from '../row.js';
import { sha256 } from '../../shared/utils.js';

const LABELS = ['Username', 'Plan'];

function row(id: string, createdAt: string, username: string, plan: string) {
  return createReportRow(id, new Date(createdAt), LABELS, [username, plan]);
}

function formatter(summaryMaxItems = 50): ReportFormatter {
  return new ReportFormatter(
    {
      fields: [
        { column: 'username', label: 'Username' },
        { column: 'plan', label: 'Plan' },
      ],
    },
    { timezone: 'Asia/Tokyo', summaryMaxItems },
  );
}

describe('fingerprintRow', () => {
  it('hashes id, ISO timestamp and values', () => {
    const createdAt = new Date('2024-01-01T00:00:00Z');
    expect(fingerprintRow('1', createdAt, ['alice'])).toBe(
      sha256(JSON.stringify(['1', '2024-01-01T00:00:00.000Z', 'alice'])),
    );
  });

  it('changes when a displayed value changes', () => {
    const createdAt = new Date('2024-01-01T00:00:00Z');
    expect(fingerprintRow('1', createdAt, ['alice'])).not.toBe(fingerprintRow('1', createdAt, ['alicia']));
  });

  it('does not confuse value boundaries', () => {
    const createdAt = new Date('2024-01-01T00:00:00Z');
    expect(fingerprintRow('1', createdAt, ['a', 'bc'])).not.toBe(fingerprintRow('1', createdAt, ['ab', 'c']));
  });
});

describe('toCellValue', () => {
  it('stringifies driver values', () => {
    expect(toCellValue(null)).toBe('');
    expect(toCellValue(undefined)).toBe('');
    expect(toCellValue(42)).toBe('42');
    expect(toCellValue(10n)).toBe('10');
    expect(toCellValue(true)).toBe('true');
    expect(toCellValue(new Date('2024-05-01T12:00:00Z'))).toBe('2024-05-01T12:00:00.000Z');
    expect(toCellValue(Buffer.from('bytes'))).toBe('bytes');
    expect(toCellValue({ a: 1 })).toBe('{"a":1}');
  });
});

describe('createReportRow', () => {
  it('maps labels to cells and freezes the row', () => {
    const r = row('7', '2024-01-14T23:30:00Z', 'alice', 'pro');
    expect(r.values).toEqual({ Username: 'alice', Plan: 'pro' });
    expect(Object.isFrozen(r)).toBe(true);
    expect(r.fingerprint).toBe(fingerprintRow('7', new Date('2024-01-14T23:30:00Z'), ['alice', 'pro']));
  });
});

describe('ReportFormatter', () => {
  it('builds the header with the fingerprint last', () => {
    expect(formatter().header()).toEqual(['Created At', 'Source ID', 'Username', 'Plan', 'Fingerprint']);
  });

  it('formats cells in header order with local timestamps', () => {
    const r = row('7', '2024-01-14T23:30:00Z', 'alice', 'pro');
    const [normalized] = formatter().format([r]);

    expect(normalized?.cells).toEqual(['2024-01-15 08:30:00', '7', 'alice', 'pro', r.fingerprint]);
    expect(normalized?.fingerprint).toBe(r.fingerprint);
  });

  it('produces identical output for identical input', () => {
    const rows = [row('1', '2024-01-14T01:00:00Z', 'a', 'x'), row('2', '2024-01-14T02:00:00Z', 'b', 'y')];
    expect(JSON.stringify(formatter().format(rows))).toBe(JSON.stringify(formatter().format(rows)));
  });

  it('summarises no rows as "No new records"', () => {
    expect(formatter().summaryText([])).toBe(NO_RECORDS);
    expect(NO_RECORDS).toBe('No new records');
  });

  it('lists one bullet per row and falls back to the id', () => {
    const rows = [row('1', '2024-01-14T01:00:00Z', 'alice', 'pro'), row('9', '2024-01-14T02:00:00Z', '', '')];
    expect(formatter().summaryText(rows)).toBe('• alice - pro\n• 9');
  });

  it('caps the listing with a "+N more" line', () => {
    const rows = [
      row('1', '2024-01-14T01:00:00Z', 'a', ''),
      row('2', '2024-01-14T02:00:00Z', 'b', ''),
      row('3', '2024-01-14T03:00:00Z', 'c', ''),
    ];
    expect(formatter(2).summaryText(rows)).toBe('• a\n• b\n+1 more');
  });
});

describe('window helpers', () => {
  const window = {
    start: new Date('2024-01-13T23:00:00Z'),
    end: new Date('2024-01-14T23:00:00Z'),
    timezone: 'Asia/Tokyo',
  };

  it('describes the window in local time', () => {
    expect(describeWindow(window)).toBe('2024-01-14 08:00 → 2024-01-15 08:00 (Asia/Tokyo)');
  });

  it('reports on the local date of the window start', () => {
    expect(reportDate(window)).toBe('2024-01-14');
  });

  it('formats instants in a timezone', () => {
    expect(formatInTimezone(new Date('2024-07-01T00:00:00Z'), 'America/New_York')).toBe('2024-06-30 20:00:00');
  });
});
