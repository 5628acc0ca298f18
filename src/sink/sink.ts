import { DataIntegrityError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { withRetry, type RetryOptions } from '../shared/retry.js';
import type { NormalizedRow } from '../report/types.js';

/**
 * Storage primitives of a sheet-like table. Row 1 is the header; data rows
 * follow in append order.
 */
export interface SheetBackend {
  readonly description: string;
  /** Header cells, or null when the table is empty. */
  readHeader(): Promise<string[] | null>;
  writeHeader(header: readonly string[]): Promise<void>;
  /** Cells of one column for every data row, header excluded. */
  readColumn(index: number): Promise<string[]>;
  appendRows(rows: readonly (readonly string[])[]): Promise<void>;
}

export interface AppendResult {
  appended: number;
  skipped: number;
}

export interface AppendOptions {
  retry?: Omit<RetryOptions, 'label'>;
  /** Called after every chunk that is confirmed written. */
  onAppended?: (count: number) => void;
  /** Called once the rows already in the sink are known, before any write. */
  onSkipped?: (count: number) => void;
}

/** Append-only, de-duplicating report log. */
export interface Sink {
  ensureHeader(): Promise<void>;
  readFingerprints(): Promise<Set<string>>;
  appendNew(rows: readonly NormalizedRow[], options?: AppendOptions): Promise<AppendResult>;
}

function trimTrailingEmpty(cells: readonly string[]): string[] {
  const out = [...cells];
  while (out.length > 0 && out[out.length - 1]?.trim() === '') out.pop();
  return out;
}

export class SheetSink implements Sink {
  private readonly header: readonly string[];
  private readonly fingerprintColumn: number;

  constructor(
    private readonly backend: SheetBackend,
    header: readonly string[],
    private readonly batchSize = 500,
  ) {
    if (header.length === 0) {
      throw new DataIntegrityError('Sink header must not be empty');
    }
    this.header = [...header];
    // fingerprint is always the last column
    this.fingerprintColumn = header.length - 1;
  }

  async ensureHeader(): Promise<void> {
    const existing = await this.backend.readHeader();
    const actual = existing ? trimTrailingEmpty(existing) : [];

    if (actual.length === 0) {
      await this.backend.writeHeader(this.header);
      logger.info({ sink: this.backend.description, header: this.header }, 'Wrote sink header');
      return;
    }

    const matches =
      actual.length === this.header.length && actual.every((cell, i) => cell.trim() === this.header[i]);
    if (!matches) {
      throw new DataIntegrityError('Sink header does not match the report schema', {
        sink: this.backend.description,
        expected: this.header,
        actual,
      });
    }
  }

  async readFingerprints(): Promise<Set<string>> {
    const cells = await this.backend.readColumn(this.fingerprintColumn);
    return new Set(cells.map((c) => c.trim()).filter((c) => c.length > 0));
  }

  /**
   * Append rows whose fingerprint the sink has not seen, preserving order.
   * Each chunk is retried on transient failure; a retry re-reads the
   * fingerprints first so a write that landed without acknowledgement is not
   * repeated. Every row of a chunk was absent when the sink was scanned, so
   * rows found on a retry were written by this call and count as appended.
   */
  async appendNew(rows: readonly NormalizedRow[], options: AppendOptions = {}): Promise<AppendResult> {
    if (rows.length === 0) return { appended: 0, skipped: 0 };

    const retry = (label: string): RetryOptions => ({
      policy: { maxAttempts: 1, initialDelayMs: 0, factor: 1, maxDelayMs: 0 },
      ...options.retry,
      label,
    });

    const seen = await withRetry(() => this.readFingerprints(), retry('sink.readFingerprints'));
    const fresh: NormalizedRow[] = [];
    let skipped = 0;
    for (const row of rows) {
      if (seen.has(row.fingerprint)) {
        skipped++;
      } else {
        seen.add(row.fingerprint);
        fresh.push(row);
      }
    }
    options.onSkipped?.(skipped);

    let appended = 0;
    for (let offset = 0; offset < fresh.length; offset += this.batchSize) {
      const chunk = fresh.slice(offset, offset + this.batchSize);

      await withRetry(async (attempt) => {
        let pending = chunk;
        if (attempt > 1) {
          const present = await this.readFingerprints();
          pending = chunk.filter((r) => !present.has(r.fingerprint));
          if (pending.length < chunk.length) {
            logger.warn(
              { sink: this.backend.description, landed: chunk.length - pending.length },
              'Earlier append landed without acknowledgement',
            );
          }
        }
        if (pending.length > 0) {
          await this.backend.appendRows(pending.map((r) => r.cells));
        }
      }, retry('sink.appendRows'));

      appended += chunk.length;
      options.onAppended?.(chunk.length);
    }

    logger.info({ sink: this.backend.description, appended, skipped }, 'Sink append complete');
    return { appended, skipped };
  }
}
