/**
 * Google Sheets adapter for the spreadsheet store.
 * Each table is one sheet of a single spreadsheet; the first row is the header.
 */

import { google, type sheets_v4 } from 'googleapis';
import type { Env } from '../../config/env';
import { RateLimitError, StoreError, toError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { sleep, withRetry, type RetryOptions } from '../../utils/retry';
import type { Cell, RawRow, SpreadsheetStore } from '../types';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

const DEFAULT_BATCH_SIZE = 500;
const DEFAULT_PAUSE_MS = 300;

const log = createLogger('sheets-store');

export interface GoogleSheetsStoreOptions {
  spreadsheetId: string;
  credentialsPath?: string;
  /** Rows per update call. */
  batchSize?: number;
  /** Pause between update calls, keeps writes under the per-minute quota. */
  pauseMs?: number;
  retry?: RetryOptions;
}

const quoteSheet = (name: string): string => `'${name.replace(/'/g, "''")}'`;

function field(source: unknown, key: string): unknown {
  if (typeof source !== 'object' || source === null) return undefined;
  return Object.entries(source).find(([name]) => name === key)?.[1];
}

function statusOf(error: unknown): number | undefined {
  const status = field(field(error, 'response'), 'status');
  if (typeof status === 'number') return status;
  const code = field(error, 'code');
  if (typeof code === 'number') return code;
  if (typeof code === 'string' && /^\d{3}$/.test(code)) return Number(code);
  return undefined;
}

function retryAfterOf(error: unknown): number | undefined {
  const headers = field(field(error, 'response'), 'headers');
  const value = field(headers, 'retry-after');
  const seconds = typeof value === 'string' ? Number(value) : value;
  return typeof seconds === 'number' && Number.isFinite(seconds) ? seconds : undefined;
}

export function toStoreError(operation: string, table: string | undefined, error: unknown): StoreError {
  if (error instanceof StoreError) return error;

  const err = toError(error);
  const status = statusOf(error);
  if (status === 429 || /quota exceeded|rate limit/i.test(err.message)) {
    return new RateLimitError(operation, table, retryAfterOf(error), err);
  }
  return new StoreError(operation, `Sheets ${operation} failed: ${err.message}`, {
    table,
    originalError: err,
    status,
  });
}

const toCells = (values: unknown[][] | null | undefined): Cell[][] =>
  (values ?? []).map(row =>
    row.map(cell => (cell === null || cell === undefined ? '' : String(cell)))
  );

export class GoogleSheetsStore implements SpreadsheetStore {
  private readonly sheets: sheets_v4.Sheets;
  private readonly spreadsheetId: string;
  private readonly batchSize: number;
  private readonly pauseMs: number;
  private readonly retry: RetryOptions;

  constructor(options: GoogleSheetsStoreOptions) {
    const auth = new google.auth.GoogleAuth({
      keyFile: options.credentialsPath,
      scopes: SCOPES,
    });
    this.sheets = google.sheets({ version: 'v4', auth });
    this.spreadsheetId = options.spreadsheetId;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.pauseMs = options.pauseMs ?? DEFAULT_PAUSE_MS;
    this.retry = options.retry ?? {};
  }

  static fromEnv(env: Env): GoogleSheetsStore {
    return new GoogleSheetsStore({
      spreadsheetId: env.GOOGLE_SPREADSHEET_ID,
      credentialsPath: env.GOOGLE_CREDENTIALS_PATH,
      batchSize: env.SHEETS_WRITE_BATCH_SIZE,
      pauseMs: env.SHEETS_WRITE_PAUSE_MS,
    });
  }

  private call<T>(operation: string, table: string | undefined, fn: () => Promise<T>): Promise<T> {
    return withRetry(async () => {
      try {
        return await fn();
      } catch (error) {
        throw toStoreError(operation, table, error);
      }
    }, this.retry);
  }

  private async sheetTitles(): Promise<Set<string>> {
    const response = await this.call('getSpreadsheet', undefined, () =>
      this.sheets.spreadsheets.get({
        spreadsheetId: this.spreadsheetId,
        fields: 'sheets.properties.title',
      })
    );
    const titles = (response.data.sheets ?? [])
      .map(sheet => sheet.properties?.title)
      .filter((title): title is string => typeof title === 'string');
    return new Set(titles);
  }

  private async addSheet(name: string): Promise<void> {
    await this.call('addSheet', name, () =>
      this.sheets.spreadsheets.batchUpdate({
        spreadsheetId: this.spreadsheetId,
        requestBody: { requests: [{ addSheet: { properties: { title: name } } }] },
      })
    );
    log.info('Sheet created', { table: name });
  }

  async readTable(name: string): Promise<RawRow[]> {
    const titles = await this.sheetTitles();
    if (!titles.has(name)) return [];

    const response = await this.call('readTable', name, () =>
      this.sheets.spreadsheets.values.get({
        spreadsheetId: this.spreadsheetId,
        range: quoteSheet(name),
        valueRenderOption: 'FORMATTED_VALUE',
      })
    );
    return toCells(response.data.values).map((cells, index) => ({ index, cells }));
  }

  /**
   * Clears the sheet, then writes `rows` in chunks of `batchSize`. A failure
   * part-way leaves the sheet partially written.
   */
  async writeTable(name: string, rows: Cell[][]): Promise<void> {
    const titles = await this.sheetTitles();
    if (!titles.has(name)) {
      await this.addSheet(name);
    }

    await this.call('clearTable', name, () =>
      this.sheets.spreadsheets.values.clear({
        spreadsheetId: this.spreadsheetId,
        range: quoteSheet(name),
      })
    );

    for (let start = 0; start < rows.length; start += this.batchSize) {
      if (start > 0 && this.pauseMs > 0) {
        await sleep(this.pauseMs);
      }
      const chunk = rows.slice(start, start + this.batchSize);
      await this.call('writeTable', name, () =>
        this.sheets.spreadsheets.values.update({
          spreadsheetId: this.spreadsheetId,
          range: `${quoteSheet(name)}!A${start + 1}`,
          valueInputOption: 'RAW',
          requestBody: { values: chunk },
        })
      );
    }

    log.debug('Table written', { table: name, rows: rows.length });
  }

  async appendRows(name: string, rows: Cell[][]): Promise<void> {
    if (rows.length === 0) return;

    await this.call('appendRows', name, () =>
      this.sheets.spreadsheets.values.append({
        spreadsheetId: this.spreadsheetId,
        range: `${quoteSheet(name)}!A1`,
        valueInputOption: 'RAW',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values: rows },
      })
    );
  }

  async ensureTable(name: string, header: Cell[]): Promise<void> {
    const titles = await this.sheetTitles();
    if (titles.has(name)) return;

    await this.addSheet(name);
    await this.call('ensureTable', name, () =>
      this.sheets.spreadsheets.values.update({
        spreadsheetId: this.spreadsheetId,
        range: `${quoteSheet(name)}!A1`,
        valueInputOption: 'RAW',
        requestBody: { values: [header] },
      })
    );
  }
}
