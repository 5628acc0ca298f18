import { TZDate } from '@date-fns/tz';
import { format as formatDate } from 'date-fns';
import type { ReportDefinition } from '../shared/config.js';
import type { NormalizedRow, ReportRow, ReportWindow } from './types.js';

export const NO_RECORDS = 'No new records';

export interface FormatterOptions {
  timezone: string;
  summaryMaxItems: number;
}

export function formatInTimezone(date: Date, timezone: string, pattern = 'yyyy-MM-dd HH:mm:ss'): string {
  return formatDate(new TZDate(date.getTime(), timezone), pattern);
}

export function describeWindow(window: ReportWindow): string {
  const start = formatInTimezone(window.start, window.timezone, 'yyyy-MM-dd HH:mm');
  const end = formatInTimezone(window.end, window.timezone, 'yyyy-MM-dd HH:mm');
  return `${start} → ${end} (${window.timezone})`;
}

/** Calendar date the window reports on, i.e. the local date of its start. */
export function reportDate(window: ReportWindow): string {
  return formatInTimezone(window.start, window.timezone, 'yyyy-MM-dd');
}

export class ReportFormatter {
  private readonly labels: readonly string[];

  constructor(
    definition: Pick<ReportDefinition, 'fields'>,
    private readonly options: FormatterOptions,
  ) {
    this.labels = definition.fields.map((f) => f.label);
  }

  header(): string[] {
    return ['Created At', 'Source ID', ...this.labels, 'Fingerprint'];
  }

  format(rows: readonly ReportRow[]): NormalizedRow[] {
    return rows.map((row) => ({
      cells: [
        formatInTimezone(row.createdAt, this.options.timezone),
        row.sourceId,
        ...this.labels.map((label) => row.values[label] ?? ''),
        row.fingerprint,
      ],
      fingerprint: row.fingerprint,
    }));
  }

  /**
   * One bullet per row, capped so a busy day cannot produce an unbounded message.
   */
  summaryText(rows: readonly ReportRow[]): string {
    if (rows.length === 0) return NO_RECORDS;

    const max = this.options.summaryMaxItems;
    const lines = rows.slice(0, max).map((row) => {
      const shown = this.labels.map((label) => row.values[label] ?? '').filter((v) => v.length > 0);
      return `• ${shown.length > 0 ? shown.join(' - ') : row.sourceId}`;
    });

    if (rows.length > max) {
      lines.push(`+${rows.length - max} more`);
    }
    return lines.join('\n');
  }
}
