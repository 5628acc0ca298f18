export type CellValue = string;

/** One reported entity, e.g. one new user. */
export interface ReportRow {
  readonly sourceId: string;
  readonly createdAt: Date;
  /** Display label → stringified value, in the report's field order. */
  readonly values: Readonly<Record<string, CellValue>>;
  readonly fingerprint: string;
}

/** Half-open range `[start, end)`. */
export interface ReportWindow {
  readonly start: Date;
  readonly end: Date;
  readonly timezone: string;
}

/** A row as written to the sink: cells matching the header, fingerprint last. */
export interface NormalizedRow {
  readonly cells: readonly CellValue[];
  readonly fingerprint: string;
}

export type RunStatus = 'success' | 'partial_failure' | 'failure';

/** `setup`: the report's collaborators could not be built, nothing ran. */
export type PipelineStage = 'setup' | 'window' | 'fetch' | 'format' | 'write' | 'notify';

export type RunState =
  | 'idle'
  | 'window_computed'
  | 'fetched'
  | 'formatted'
  | 'written'
  | 'notified'
  | 'done'
  | 'failed';

export interface RunError {
  /** Error class, e.g. TransientIOError. */
  readonly kind: string;
  readonly code: string;
  readonly message: string;
}

export interface RunResult {
  readonly runId: string;
  readonly report: string;
  readonly status: RunStatus;
  readonly window: ReportWindow | null;
  readonly rowsFetched: number;
  readonly rowsAppended: number;
  readonly rowsSkippedAsDuplicate: number;
  readonly failedStage?: PipelineStage;
  readonly error?: RunError;
  readonly notificationError?: string;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly durationMs: number;
}

export interface HealthStatus {
  readonly db: boolean;
}
