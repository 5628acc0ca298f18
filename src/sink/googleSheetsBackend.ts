import { google, type drive_v3, type sheets_v4 } from 'googleapis';
import { ConfigurationError, TransientIOError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { SheetBackend } from './sink.js';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets', 'https://www.googleapis.com/auth/drive'];
const SPREADSHEET_MIME = 'application/vnd.google-apps.spreadsheet';

/** The parts of the Sheets v4 client the backend calls. */
export interface SheetsApi {
  spreadsheets: {
    get(params: sheets_v4.Params$Resource$Spreadsheets$Get): Promise<{ data: sheets_v4.Schema$Spreadsheet }>;
    create(params: sheets_v4.Params$Resource$Spreadsheets$Create): Promise<{ data: sheets_v4.Schema$Spreadsheet }>;
    batchUpdate(params: sheets_v4.Params$Resource$Spreadsheets$Batchupdate): Promise<unknown>;
    values: {
      get(params: sheets_v4.Params$Resource$Spreadsheets$Values$Get): Promise<{ data: sheets_v4.Schema$ValueRange }>;
      update(params: sheets_v4.Params$Resource$Spreadsheets$Values$Update): Promise<unknown>;
      append(params: sheets_v4.Params$Resource$Spreadsheets$Values$Append): Promise<unknown>;
    };
  };
}

/** The parts of the Drive v3 client used to find and share spreadsheets by name. */
export interface DriveApi {
  files: {
    list(params: drive_v3.Params$Resource$Files$List): Promise<{ data: drive_v3.Schema$FileList }>;
  };
  permissions: {
    create(params: drive_v3.Params$Resource$Permissions$Create): Promise<unknown>;
  };
}

export interface SpreadsheetOptions {
  /** Takes precedence over `spreadsheetName`. */
  spreadsheetId: string;
  /** Opened by name, or created and shared when no spreadsheet has it. */
  spreadsheetName: string;
  shareWith: readonly string[];
}

export interface GoogleSheetsOptions extends SpreadsheetOptions {
  /** Service account key file; empty uses application default credentials. */
  keyFile?: string;
  timeoutMs: number;
}

/** Zero-based column index to A1 letters (0 → A, 26 → AA). */
export function columnLetter(index: number): string {
  let n = index + 1;
  let letters = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export function quoteSheetTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

function httpStatus(err: unknown): number | undefined {
  if (!(err instanceof Error)) return undefined;
  if ('status' in err && typeof err.status === 'number') return err.status;
  if ('response' in err) {
    const response = err.response;
    if (response !== null && typeof response === 'object' && 'status' in response) {
      return typeof response.status === 'number' ? response.status : undefined;
    }
  }
  return undefined;
}

export function classifyGoogleError(err: unknown, op: string): Error {
  const status = httpStatus(err);
  const message = `Google Sheets ${op} failed: ${errorMessage(err)}`;

  // no HTTP status: connection reset, DNS, socket timeout
  if (status === undefined || status === 408 || status === 429 || status >= 500) {
    return new TransientIOError(message, { op, status });
  }
  // 400/403/404: wrong spreadsheet id, missing share, bad range
  return new ConfigurationError(message, { op, status });
}

async function call<T>(op: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw classifyGoogleError(err, op);
  }
}

function driveQueryLiteral(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * Resolves the spreadsheet every report worksheet lives in. A configured id
 * is used as is; otherwise the spreadsheet is looked up by name through Drive
 * and created, then shared with the report recipients, when none exists.
 * Resolution happens once per locator.
 */
export class SpreadsheetLocator {
  private resolved: Promise<string> | null = null;
  private readonly worksheets = new Map<string, GoogleSheetsBackend>();

  constructor(
    readonly sheets: SheetsApi,
    private readonly drive: DriveApi,
    private readonly options: SpreadsheetOptions,
  ) {
    if (!options.spreadsheetId && !options.spreadsheetName) {
      throw new ConfigurationError('Neither sheets.spreadsheet_id nor sheets.spreadsheet_name is configured');
    }
  }

  get label(): string {
    return this.options.spreadsheetId || this.options.spreadsheetName;
  }

  spreadsheetId(): Promise<string> {
    if (!this.resolved) {
      this.resolved = this.locate().catch((err: unknown) => {
        this.resolved = null;
        throw err;
      });
    }
    return this.resolved;
  }

  worksheet(name: string): GoogleSheetsBackend {
    let backend = this.worksheets.get(name);
    if (!backend) {
      backend = new GoogleSheetsBackend(this, name);
      this.worksheets.set(name, backend);
    }
    return backend;
  }

  private async locate(): Promise<string> {
    if (this.options.spreadsheetId) return this.options.spreadsheetId;

    const name = this.options.spreadsheetName;
    const found = await call('findSpreadsheet', () =>
      this.drive.files.list({
        q: `name = ${driveQueryLiteral(name)} and mimeType = '${SPREADSHEET_MIME}' and trashed = false`,
        fields: 'files(id, name)',
        pageSize: 1,
      }),
    );
    const existing = found.data.files?.[0]?.id;
    if (existing) {
      logger.debug({ spreadsheet: name, id: existing }, 'Opened existing spreadsheet');
      return existing;
    }

    const created = await call('createSpreadsheet', () =>
      this.sheets.spreadsheets.create({
        requestBody: { properties: { title: name } },
        fields: 'spreadsheetId',
      }),
    );
    const id = created.data.spreadsheetId;
    if (!id) {
      throw new TransientIOError(`Google Sheets did not return an id for the new spreadsheet ${name}`);
    }
    logger.info({ spreadsheet: name, id }, 'Created spreadsheet');

    await this.share(id);
    return id;
  }

  /** Sharing is best effort: the account may already own it or the address may be unknown. */
  private async share(fileId: string): Promise<void> {
    for (const emailAddress of this.options.shareWith) {
      try {
        await this.drive.permissions.create({
          fileId,
          sendNotificationEmail: false,
          requestBody: { type: 'user', role: 'writer', emailAddress },
        });
        logger.info({ spreadsheet: fileId, emailAddress }, 'Shared spreadsheet');
      } catch (err) {
        logger.warn({ spreadsheet: fileId, emailAddress, error: errorMessage(err) }, 'Could not share spreadsheet');
      }
    }
  }
}

export function connectSpreadsheet(options: GoogleSheetsOptions): SpreadsheetLocator {
  const auth = new google.auth.GoogleAuth({
    keyFile: options.keyFile ? options.keyFile : undefined,
    scopes: SCOPES,
  });
  const sheets = google.sheets({ version: 'v4', auth, timeout: options.timeoutMs });
  const drive = google.drive({ version: 'v3', auth, timeout: options.timeoutMs });
  return new SpreadsheetLocator(sheets, drive, options);
}

/**
 * Worksheet tab in a Google spreadsheet, addressed with A1 ranges. The tab is
 * created on first use when absent.
 */
export class GoogleSheetsBackend implements SheetBackend {
  readonly description: string;
  private tabReady = false;
  private readonly tab: string;
  private readonly sheets: SheetsApi;

  constructor(
    private readonly spreadsheet: SpreadsheetLocator,
    private readonly worksheet: string,
  ) {
    this.sheets = spreadsheet.sheets;
    this.description = `sheets:${spreadsheet.label}/${worksheet}`;
    this.tab = quoteSheetTitle(worksheet);
  }

  async readHeader(): Promise<string[] | null> {
    const values = await this.getValues(`${this.tab}!1:1`, 'ROWS');
    const header = values[0];
    return header && header.length > 0 ? header : null;
  }

  async writeHeader(header: readonly string[]): Promise<void> {
    const spreadsheetId = await this.ready();
    await call('writeHeader', () =>
      this.sheets.spreadsheets.values.update({
        spreadsheetId,
        range: `${this.tab}!A1`,
        valueInputOption: 'RAW',
        requestBody: { values: [[...header]] },
      }),
    );
  }

  async readColumn(index: number): Promise<string[]> {
    const col = columnLetter(index);
    const values = await this.getValues(`${this.tab}!${col}2:${col}`, 'COLUMNS');
    return values[0] ?? [];
  }

  async appendRows(rows: readonly (readonly string[])[]): Promise<void> {
    if (rows.length === 0) return;
    const spreadsheetId = await this.ready();
    await call('appendRows', () =>
      this.sheets.spreadsheets.values.append({
        spreadsheetId,
        range: `${this.tab}!A1`,
        valueInputOption: 'RAW',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values: rows.map((r) => [...r]) },
      }),
    );
    logger.debug({ sink: this.description, rows: rows.length }, 'Appended rows');
  }

  /** Spreadsheet id, with the worksheet tab created when missing. */
  private async ready(): Promise<string> {
    const spreadsheetId = await this.spreadsheet.spreadsheetId();
    if (this.tabReady) return spreadsheetId;

    const meta = await call('getSpreadsheet', () =>
      this.sheets.spreadsheets.get({
        spreadsheetId,
        fields: 'sheets.properties.title',
      }),
    );
    const titles = (meta.data.sheets ?? []).map((s) => s.properties?.title);

    if (!titles.includes(this.worksheet)) {
      await call('addSheet', () =>
        this.sheets.spreadsheets.batchUpdate({
          spreadsheetId,
          requestBody: { requests: [{ addSheet: { properties: { title: this.worksheet } } }] },
        }),
      );
      logger.info({ sink: this.description }, 'Created worksheet');
    }
    this.tabReady = true;
    return spreadsheetId;
  }

  private async getValues(range: string, majorDimension: 'ROWS' | 'COLUMNS'): Promise<string[][]> {
    const spreadsheetId = await this.ready();
    const res = await call('getValues', () =>
      this.sheets.spreadsheets.values.get({
        spreadsheetId,
        range,
        majorDimension,
        valueRenderOption: 'FORMATTED_VALUE',
      }),
    );
    const values: unknown[][] = res.data.values ?? [];
    return values.map((row) => row.map((cell) => (cell === null || cell === undefined ? '' : String(cell))));
  }
}
