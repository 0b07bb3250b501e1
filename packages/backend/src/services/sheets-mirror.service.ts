import { google, sheets_v4 } from 'googleapis';
import type { ProjectCatalogue } from '../config/projects';
import type { DayKey } from '../stores/booking.store';
import { breakerFor, CIRCUIT_BREAKER_CONFIGS } from '../utils/circuit-breaker';
import { MirrorSyncError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { DEFAULT_TIMEOUTS, withTimeout } from '../utils/timeout';
import { formatTime, parseTime } from '../utils/slot-time';
import {
  cellFromColumns,
  columnsFromCell,
  fromSheetDate,
  toSheetDate,
  toSheetDayLabel,
  type MirrorCell,
  type MirrorGateway,
  type MirrorSlotRef,
  type OccupiedMirrorCell,
} from './mirror-gateway';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];
const HEADER_ROW = ['Date (DD.MM)', 'Date (DD.MM.YYYY)', 'Time', 'Client ID', 'Name', 'Service'];
const CLEARED_COLUMNS = ['', '', ''];

const sheetsCircuitBreaker = breakerFor(CIRCUIT_BREAKER_CONFIGS.SHEETS_API);

interface SheetRow {
  /** 1-based row number in the worksheet */
  rowNumber: number;
  /** YYYY-MM-DD */
  date: string;
  /** HH:MM */
  time: string;
  clientId: string;
  clientName: string;
  serviceName: string;
}

export interface SheetsMirrorOptions {
  catalogue: ProjectCatalogue;
  /** Used for projects without their own googleSheetId */
  defaultSheetId: string;
  credentialsFile: string;
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

function quoteSheetName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}

function clientColumnsRange(specialist: string, rowNumber: number): string {
  return `${quoteSheetName(specialist)}!D${rowNumber}:F${rowNumber}`;
}

function isMissingSheetError(error: unknown): boolean {
  return errorMessage(error).includes('Unable to parse range');
}

/**
 * Google Sheets implementation of the mirror. One spreadsheet per project,
 * one worksheet per specialist.
 */
export class SheetsMirrorGateway implements MirrorGateway {
  private client: sheets_v4.Sheets | null = null;
  /** Tail of the write chain per worksheet */
  private readonly worksheetWrites = new Map<string, Promise<void>>();

  constructor(private readonly options: SheetsMirrorOptions) {}

  private getClient(): sheets_v4.Sheets {
    if (!this.client) {
      const auth = new google.auth.GoogleAuth({
        keyFile: this.options.credentialsFile,
        scopes: SCOPES,
      });
      this.client = google.sheets({
        version: 'v4',
        auth,
        timeout: DEFAULT_TIMEOUTS.EXTERNAL_API,
      });
      logger.info('Google Sheets client initialized');
    }
    return this.client;
  }

  private spreadsheetIdFor(projectId: string): string {
    const project = this.options.catalogue.get(projectId);
    const id = project.googleSheetId ?? this.options.defaultSheetId;
    if (!id) {
      throw new MirrorSyncError(`No spreadsheet configured for project ${projectId}`, { projectId });
    }
    return id;
  }

  /**
   * Execute a Sheets call with circuit breaker and timeout protection.
   * Every failure surfaces as MirrorSyncError.
   */
  private async call<T>(operation: string, context: Record<string, unknown>, fn: () => Promise<T>): Promise<T> {
    try {
      return await sheetsCircuitBreaker.execute(() =>
        withTimeout(fn(), DEFAULT_TIMEOUTS.EXTERNAL_API, operation, context)
      );
    } catch (error) {
      if (error instanceof MirrorSyncError) throw error;
      throw new MirrorSyncError(`Sheets ${operation} failed: ${errorMessage(error)}`, context);
    }
  }

  /**
   * All rows of a specialist's worksheet; empty when the worksheet does not exist yet
   */
  private async readRows(spreadsheetId: string, specialist: string): Promise<SheetRow[]> {
    const sheets = this.getClient();
    let values: unknown[][];

    try {
      const response = await sheets.spreadsheets.values.get({
        spreadsheetId,
        range: `${quoteSheetName(specialist)}!A:F`,
      });
      values = response.data.values ?? [];
    } catch (error) {
      if (isMissingSheetError(error)) return [];
      throw error;
    }

    // Row 1 is the header. Rows are typed by hand, so dates and times are
    // normalized and rows that are neither are left out.
    const rows: SheetRow[] = [];
    values.slice(1).forEach((row, index) => {
      const date = fromSheetDate(cellText(row[1]));
      const minutes = parseTime(cellText(row[2]));
      if (date === null || minutes === null) return;
      rows.push({
        rowNumber: index + 2,
        date,
        time: formatTime(minutes),
        clientId: cellText(row[3]),
        clientName: cellText(row[4]),
        serviceName: cellText(row[5]),
      });
    });
    return rows;
  }

  private async ensureWorksheet(spreadsheetId: string, specialist: string): Promise<void> {
    const sheets = this.getClient();
    const meta = await sheets.spreadsheets.get({ spreadsheetId, fields: 'sheets.properties.title' });
    const exists = (meta.data.sheets ?? []).some((sheet) => sheet.properties?.title === specialist);
    if (exists) return;

    logger.info({ specialist }, 'Creating mirror worksheet for specialist');
    await sheets.spreadsheets.batchUpdate({
      spreadsheetId,
      requestBody: { requests: [{ addSheet: { properties: { title: specialist } } }] },
    });
    await sheets.spreadsheets.values.update({
      spreadsheetId,
      range: `${quoteSheetName(specialist)}!A1:F1`,
      valueInputOption: 'RAW',
      requestBody: { values: [HEADER_ROW] },
    });
  }

  /** Every row for the slot; more than one only after hand edits */
  private findRows(rows: SheetRow[], date: string, time: string): SheetRow[] {
    return rows.filter((row) => row.date === date && row.time === time);
  }

  /**
   * Writes to one worksheet run one at a time, so a read-then-append never
   * races another write of the same specialist.
   */
  private async serialized<T>(ref: MirrorSlotRef, fn: () => Promise<T>): Promise<T> {
    const key = `${ref.projectId}\u0000${ref.specialist}`;
    const previous = this.worksheetWrites.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.worksheetWrites.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.worksheetWrites.get(key) === tail) this.worksheetWrites.delete(key);
    }
  }

  private async writeCell(ref: MirrorSlotRef, cell: MirrorCell): Promise<void> {
    const spreadsheetId = this.spreadsheetIdFor(ref.projectId);
    const sheets = this.getClient();
    const rows = await this.readRows(spreadsheetId, ref.specialist);
    const [existing, ...duplicates] = this.findRows(rows, ref.date, ref.time);
    const columns = columnsFromCell(cell);

    if (existing) {
      // The first row takes the cell; duplicates of the slot are emptied
      await sheets.spreadsheets.values.batchUpdate({
        spreadsheetId,
        requestBody: {
          valueInputOption: 'RAW',
          data: [
            { range: clientColumnsRange(ref.specialist, existing.rowNumber), values: [columns] },
            ...duplicates.map((row) => ({
              range: clientColumnsRange(ref.specialist, row.rowNumber),
              values: [CLEARED_COLUMNS],
            })),
          ],
        },
      });
      if (duplicates.length > 0) {
        logger.warn(
          { ...ref, rows: duplicates.map((row) => row.rowNumber) },
          'Duplicate mirror rows for one slot emptied'
        );
      }
      return;
    }

    // Clearing a row that was never written is a no-op
    if (cell.kind === 'empty') return;

    if (rows.length === 0) {
      await this.ensureWorksheet(spreadsheetId, ref.specialist);
    }
    const firstOfDay = !rows.some((row) => row.date === ref.date);
    await sheets.spreadsheets.values.append({
      spreadsheetId,
      range: `${quoteSheetName(ref.specialist)}!A:F`,
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: {
        values: [[firstOfDay ? toSheetDayLabel(ref.date) : '', toSheetDate(ref.date), ref.time, ...columns]],
      },
    });
  }

  async readSlot(ref: MirrorSlotRef): Promise<MirrorCell> {
    return this.call('readSlot', { ...ref }, async () => {
      const rows = await this.readRows(this.spreadsheetIdFor(ref.projectId), ref.specialist);
      const [row] = this.findRows(rows, ref.date, ref.time);
      return row ? cellFromColumns(row.clientId, row.clientName, row.serviceName) : { kind: 'empty' };
    });
  }

  async readDay(key: DayKey): Promise<Map<string, OccupiedMirrorCell>> {
    return this.call('readDay', { ...key }, async () => {
      const rows = await this.readRows(this.spreadsheetIdFor(key.projectId), key.specialist);
      const day = new Map<string, OccupiedMirrorCell>();

      for (const row of rows) {
        // First row of a slot wins, as it does for writes
        if (row.date !== key.date || day.has(row.time)) continue;
        const cell = cellFromColumns(row.clientId, row.clientName, row.serviceName);
        if (cell.kind !== 'empty') day.set(row.time, cell);
      }
      return day;
    });
  }

  async setSlot(ref: MirrorSlotRef, cell: OccupiedMirrorCell): Promise<void> {
    await this.serialized(ref, () => this.call('setSlot', { ...ref }, () => this.writeCell(ref, cell)));
  }

  async clearSlot(ref: MirrorSlotRef): Promise<void> {
    await this.serialized(ref, () =>
      this.call('clearSlot', { ...ref }, () => this.writeCell(ref, { kind: 'empty' }))
    );
  }
}
