import type { ReportDefinition } from '../shared/config.js';
import { DataIntegrityError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { createReportRow, toCellValue } from '../report/row.js';
import type { ReportRow, ReportWindow } from '../report/types.js';
import type { SqlClient, SqlRow } from './sqlClient.js';

const NAIVE_TIMESTAMP = /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Interpret a driver timestamp. Zone-less text is UTC, matching how the
 * drivers are configured to bind window bounds.
 */
export function parseTimestamp(value: unknown): Date | null {
  let date: Date | null = null;
  if (value instanceof Date) {
    date = value;
  } else if (typeof value === 'string') {
    const text = value.trim();
    date = NAIVE_TIMESTAMP.test(text) ? new Date(`${text.replace(' ', 'T')}Z`) : new Date(text);
  } else if (typeof value === 'number') {
    date = new Date(value);
  }
  return date && !Number.isNaN(date.getTime()) ? date : null;
}

export interface ReportQuery {
  sql: string;
  labels: string[];
}

/**
 * Build the window query for a report. Column references come from validated
 * configuration; the window bounds are always bound parameters.
 */
export function buildReportQuery(definition: ReportDefinition): ReportQuery {
  const { id_column: id, created_at_column: created } = definition;
  const columns = [
    `${id} AS source_id`,
    `${created} AS created_at`,
    ...definition.fields.map((f, i) => `${f.column} AS f${i}`),
  ];

  const sql = [
    `SELECT ${columns.join(', ')}`,
    `FROM ${definition.from}`,
    `WHERE ${created} >= ? AND ${created} < ?`,
    `ORDER BY ${created} ASC, ${id} ASC`,
  ].join(' ');

  return { sql, labels: definition.fields.map((f) => f.label) };
}

/**
 * `SELECT 1` probe. Any failure is reported as `false`, never thrown.
 */
export async function probeDatabase(client: SqlClient): Promise<boolean> {
  try {
    await client.query('SELECT 1 AS ok');
    return true;
  } catch (err) {
    logger.warn({ error: errorMessage(err) }, 'Database health check failed');
    return false;
  }
}

/** What the runner needs from a data source. */
export interface ReportSource {
  fetchNew(window: ReportWindow): Promise<ReportRow[]>;
  healthCheck(): Promise<boolean>;
}

export class DataSource implements ReportSource {
  private readonly query: ReportQuery;

  constructor(
    private readonly client: SqlClient,
    definition: ReportDefinition,
  ) {
    this.query = buildReportQuery(definition);
  }

  async fetchNew(window: ReportWindow): Promise<ReportRow[]> {
    const rows = await this.client.query(this.query.sql, [window.start, window.end]);
    const result = rows.map((row) => this.toReportRow(row));
    logger.debug({ rows: result.length }, 'Fetched report rows');
    return result;
  }

  healthCheck(): Promise<boolean> {
    return probeDatabase(this.client);
  }

  private toReportRow(row: SqlRow): ReportRow {
    const rawId = row['source_id'];
    if (rawId === null || rawId === undefined) {
      throw new DataIntegrityError('Query returned a row without an id', { columns: Object.keys(row) });
    }

    const createdAt = parseTimestamp(row['created_at']);
    if (!createdAt) {
      throw new DataIntegrityError('Query returned a row with an unreadable creation time', {
        sourceId: toCellValue(rawId),
        value: toCellValue(row['created_at']),
      });
    }

    const cells = this.query.labels.map((_, i) => toCellValue(row[`f${i}`]));
    return createReportRow(toCellValue(rawId), createdAt, this.query.labels, cells);
  }
}
