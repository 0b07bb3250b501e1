/**
 * Spreadsheet mirror contract and row layout.
 *
 * One worksheet per specialist. Each row is one slot:
 *   A: DD.MM (first row of the day only)  B: DD.MM.YYYY  C: HH:MM
 *   D: client id  E: client name  F: service
 * Continuation rows of a multi-slot booking carry the marker in D-F.
 */

import { MIRROR_CONTINUATION_MARKER } from '@slotkeeper/shared';
import type { DayKey } from '../stores/booking.store';

export type MirrorCell =
  | { kind: 'empty' }
  | { kind: 'start'; clientId: string; clientName: string | null; serviceName: string | null }
  | { kind: 'continuation' };

export type OccupiedMirrorCell = Exclude<MirrorCell, { kind: 'empty' }>;

export interface MirrorSlotRef extends DayKey {
  time: string;
}

export interface MirrorGateway {
  readSlot(ref: MirrorSlotRef): Promise<MirrorCell>;
  /** Every non-empty slot of the day keyed by HH:MM. Missing keys are empty. */
  readDay(key: DayKey): Promise<Map<string, OccupiedMirrorCell>>;
  setSlot(ref: MirrorSlotRef, cell: OccupiedMirrorCell): Promise<void>;
  clearSlot(ref: MirrorSlotRef): Promise<void>;
}

export const EMPTY_CELL: MirrorCell = { kind: 'empty' };
export const CONTINUATION_CELL: OccupiedMirrorCell = { kind: 'continuation' };

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const SHEET_DATE = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;

/** YYYY-MM-DD -> DD.MM.YYYY */
export function toSheetDate(isoDate: string): string {
  const match = ISO_DATE.exec(isoDate);
  if (!match) return isoDate;
  return `${match[3]}.${match[2]}.${match[1]}`;
}

/** YYYY-MM-DD -> DD.MM */
export function toSheetDayLabel(isoDate: string): string {
  const match = ISO_DATE.exec(isoDate);
  if (!match) return isoDate;
  return `${match[3]}.${match[2]}`;
}

/**
 * Date cell -> YYYY-MM-DD, null when the cell is not a date. Staff type dates
 * by hand, so D.M.YYYY and ISO dates are accepted besides DD.MM.YYYY.
 */
export function fromSheetDate(value: string): string | null {
  const text = value.trim();
  if (ISO_DATE.test(text)) return text;
  const match = SHEET_DATE.exec(text);
  if (!match) return null;
  return `${match[3]}-${match[2].padStart(2, '0')}-${match[1].padStart(2, '0')}`;
}

function emptyToNull(value: string): string | null {
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Interpret columns D-F of a row
 */
export function cellFromColumns(clientId: string, clientName: string, serviceName: string): MirrorCell {
  const id = clientId.trim();
  if (id === '') return EMPTY_CELL;
  if (id === MIRROR_CONTINUATION_MARKER) return CONTINUATION_CELL;
  return {
    kind: 'start',
    clientId: id,
    clientName: emptyToNull(clientName),
    serviceName: emptyToNull(serviceName),
  };
}

/**
 * Columns D-F for a cell
 */
export function columnsFromCell(cell: MirrorCell): [string, string, string] {
  switch (cell.kind) {
    case 'empty':
      return ['', '', ''];
    case 'continuation':
      return [MIRROR_CONTINUATION_MARKER, MIRROR_CONTINUATION_MARKER, MIRROR_CONTINUATION_MARKER];
    case 'start':
      return [cell.clientId, cell.clientName ?? '', cell.serviceName ?? ''];
  }
}
