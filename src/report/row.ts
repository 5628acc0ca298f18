import { sha256 } from '../shared/utils.js';
import type { CellValue, ReportRow } from './types.js';

/**
 * Stable fingerprint over a row's identity and displayed content. Two runs over
 * overlapping windows produce the same value for the same upstream record.
 */
export function fingerprintRow(
  sourceId: string,
  createdAt: Date,
  values: readonly CellValue[],
): string {
  return sha256(JSON.stringify([sourceId, createdAt.toISOString(), ...values]));
}

export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

export function createReportRow(
  sourceId: string,
  createdAt: Date,
  labels: readonly string[],
  cells: readonly CellValue[],
): ReportRow {
  const values: Record<string, CellValue> = {};
  labels.forEach((label, i) => {
    values[label] = cells[i] ?? '';
  });

  return Object.freeze({
    sourceId,
    createdAt,
    values: Object.freeze(values),
    fingerprint: fingerprintRow(sourceId, createdAt, labels.map((l) => values[l] ?? '')),
  });
}
