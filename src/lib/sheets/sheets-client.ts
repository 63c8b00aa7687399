/**
 * Google Sheets access for published rows (Sheets API v4, service account).
 */

import type { PublishedRow } from '@/types';
import { google, type sheets_v4 } from 'googleapis';
import { z } from 'zod';
import type { AppConfig } from '../config';
import { ConfigurationError, errorMessage, PublishUnauthorizedError, PublishUnavailableError } from '../errors';

export const SHEET_HEADER = [
  'Name',
  'Address',
  'Phone',
  'Website',
  'Region',
  'Source URL',
  'Published At',
  'Area',
  'Rating',
  'Reviews',
] as const;

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

export interface ConnectionStatus {
  ok: boolean;
  spreadsheetTitle?: string;
  sheetName: string;
  rowCount?: number;
  error?: string;
}

export interface RequestOptions {
  /** Aborts the HTTP request */
  signal?: AbortSignal;
}

/**
 * Spreadsheet collaborator. `appendRows` is all-or-nothing per call.
 */
export interface SpreadsheetClient {
  fetchExistingRows(spreadsheetId: string, options?: RequestOptions): Promise<PublishedRow[]>;
  appendRows(spreadsheetId: string, rows: PublishedRow[], options?: RequestOptions): Promise<void>;
  testConnection(spreadsheetId: string): Promise<ConnectionStatus>;
}

const serviceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

type ServiceAccountCredentials = z.infer<typeof serviceAccountSchema>;

/**
 * GOOGLE_SHEETS_CREDENTIALS holds either the service-account JSON itself or a path to it
 */
function resolveAuth(credentials: string) {
  const trimmed = credentials.trim();
  if (!trimmed.startsWith('{')) {
    return new google.auth.GoogleAuth({ keyFile: trimmed, scopes: SCOPES });
  }

  let parsed: ServiceAccountCredentials;
  try {
    parsed = serviceAccountSchema.parse(JSON.parse(trimmed));
  } catch (error) {
    throw new ConfigurationError('GOOGLE_SHEETS_CREDENTIALS is not a valid service-account key', {
      cause: errorMessage(error),
    });
  }
  return new google.auth.GoogleAuth({
    credentials: { client_email: parsed.client_email, private_key: parsed.private_key },
    scopes: SCOPES,
  });
}

export function getHttpStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  if ('code' in error && typeof error.code === 'number') return error.code;
  return undefined;
}

/**
 * Map a Sheets API failure: 401/403 are authorization problems, everything else is unavailability.
 */
export function toPublishError(error: unknown, action: string): PublishUnauthorizedError | PublishUnavailableError {
  if (error instanceof PublishUnauthorizedError || error instanceof PublishUnavailableError) return error;

  const status = getHttpStatus(error);
  const message = `Google Sheets ${action} failed: ${errorMessage(error)}`;
  if (status === 401 || status === 403) {
    return new PublishUnauthorizedError(message, status);
  }
  return new PublishUnavailableError(message, status);
}

function cell(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}

export function rowToValues(row: PublishedRow): string[] {
  return [
    row.name,
    row.address,
    row.phone,
    row.website,
    row.region,
    row.sourceUrl,
    row.publishedAt,
    row.area,
    row.rating,
    row.reviewCount,
  ];
}

export function valuesToRow(values: readonly unknown[]): PublishedRow {
  return {
    name: cell(values[0]),
    address: cell(values[1]),
    phone: cell(values[2]),
    website: cell(values[3]),
    region: cell(values[4]),
    sourceUrl: cell(values[5]),
    publishedAt: cell(values[6]),
    area: cell(values[7]),
    rating: cell(values[8]),
    reviewCount: cell(values[9]),
  };
}

export class GoogleSheetsClient implements SpreadsheetClient {
  private readonly sheets: sheets_v4.Sheets;
  private readonly sheetName: string;
  private readonly ensuredSheets = new Set<string>();

  constructor(options: { credentials: string; sheetName: string }) {
    this.sheetName = options.sheetName;
    this.sheets = google.sheets({ version: 'v4', auth: resolveAuth(options.credentials) });
  }

  private get range(): string {
    return `'${this.sheetName.replace(/'/g, "''")}'!A:J`;
  }

  /**
   * Create the worksheet with its header row when it does not exist yet
   */
  private async ensureSheet(spreadsheetId: string, options: RequestOptions): Promise<void> {
    if (this.ensuredSheets.has(spreadsheetId)) return;

    const spreadsheet = await this.sheets.spreadsheets.get(
      { spreadsheetId, fields: 'sheets.properties.title' },
      { signal: options.signal }
    );
    const titles = (spreadsheet.data.sheets ?? []).map((sheet) => sheet.properties?.title);

    if (!titles.includes(this.sheetName)) {
      console.log(`[Sheets] Creating worksheet "${this.sheetName}"`);
      await this.sheets.spreadsheets.batchUpdate(
        {
          spreadsheetId,
          requestBody: { requests: [{ addSheet: { properties: { title: this.sheetName } } }] },
        },
        { signal: options.signal }
      );
      await this.sheets.spreadsheets.values.update(
        {
          spreadsheetId,
          range: this.range,
          valueInputOption: 'RAW',
          requestBody: { values: [[...SHEET_HEADER]] },
        },
        { signal: options.signal }
      );
    }

    this.ensuredSheets.add(spreadsheetId);
  }

  async fetchExistingRows(spreadsheetId: string, options: RequestOptions = {}): Promise<PublishedRow[]> {
    try {
      await this.ensureSheet(spreadsheetId, options);
      const response = await this.sheets.spreadsheets.values.get(
        { spreadsheetId, range: this.range },
        { signal: options.signal }
      );
      const values = response.data.values ?? [];
      const dataRows = values.length > 0 && cell(values[0][0]) === SHEET_HEADER[0] ? values.slice(1) : values;
      return dataRows.map((row) => valuesToRow(row));
    } catch (error) {
      throw toPublishError(error, 'read');
    }
  }

  async appendRows(spreadsheetId: string, rows: PublishedRow[], options: RequestOptions = {}): Promise<void> {
    if (rows.length === 0) return;
    try {
      await this.ensureSheet(spreadsheetId, options);
      await this.sheets.spreadsheets.values.append(
        {
          spreadsheetId,
          range: this.range,
          valueInputOption: 'RAW',
          insertDataOption: 'INSERT_ROWS',
          requestBody: { values: rows.map(rowToValues) },
        },
        { signal: options.signal }
      );
      console.log(`[Sheets] Appended ${rows.length} row(s) to "${this.sheetName}"`);
    } catch (error) {
      throw toPublishError(error, 'append');
    }
  }

  async testConnection(spreadsheetId: string): Promise<ConnectionStatus> {
    try {
      const spreadsheet = await this.sheets.spreadsheets.get({ spreadsheetId, fields: 'properties.title' });
      const rows = await this.fetchExistingRows(spreadsheetId);
      return {
        ok: true,
        spreadsheetTitle: spreadsheet.data.properties?.title ?? undefined,
        sheetName: this.sheetName,
        rowCount: rows.length,
      };
    } catch (error) {
      return { ok: false, sheetName: this.sheetName, error: toPublishError(error, 'connection test').message };
    }
  }
}

export function createSheetsClient(config: AppConfig['sheets']): GoogleSheetsClient {
  return new GoogleSheetsClient({ credentials: config.credentials, sheetName: config.sheetName });
}
