/**
 * Tests for the spreadsheet row layout helpers and the Google Sheets gateway
 * Covers: date and column codecs, hand-typed rows, update versus append,
 *         day labels, worksheet creation, serialized writes, duplicate rows
 */

jest.mock('../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
  maskIdentifier: (value: string) => value,
}));

jest.mock('googleapis', () => ({
  google: {
    auth: { GoogleAuth: jest.fn() },
    sheets: () => mockWorkbook.api,
  },
}));

import {
  cellFromColumns,
  columnsFromCell,
  fromSheetDate,
  toSheetDate,
  toSheetDayLabel,
} from '../services/mirror-gateway';
import { MirrorPublisher } from '../services/mirror-publisher.service';
import { MirrorReconciler } from '../services/mirror-reconciler.service';
import { SheetsMirrorGateway } from '../services/sheets-mirror.service';
import { MirrorSyncError } from '../utils/errors';
import { FakeWorkbook } from './support/fake-workbook';
import { createCatalogue, day, PROJECT_ID, TODAY, TOMORROW } from './support/fixtures';
import { MemoryBookingStore } from './support/memory-booking.store';
import { MemoryLocks } from './support/memory-locks';

let mockWorkbook = new FakeWorkbook();

const ANN_HAIRCUT = {
  kind: 'start',
  clientId: 'client-a',
  clientName: 'Ann Lee',
  serviceName: 'Haircut',
} as const;

describe('sheet dates', () => {
  it('writes ISO dates the way the sheet shows them', () => {
    expect(toSheetDate('2030-03-05')).toBe('05.03.2030');
    expect(toSheetDayLabel('2030-03-05')).toBe('05.03');
  });

  it('reads sheet dates back, padding single digits', () => {
    expect(fromSheetDate('05.03.2030')).toBe('2030-03-05');
    expect(fromSheetDate(' 5.3.2030 ')).toBe('2030-03-05');
  });

  it('takes ISO dates as they are', () => {
    expect(fromSheetDate('2030-03-05')).toBe('2030-03-05');
  });

  it('answers null for cells that are not dates', () => {
    expect(fromSheetDate('Tuesday')).toBeNull();
    expect(fromSheetDate('')).toBeNull();
  });
});

describe('client columns', () => {
  it('reads an empty client id as an empty slot', () => {
    expect(cellFromColumns('  ', 'Ann', 'Haircut')).toEqual({ kind: 'empty' });
  });

  it('reads the marker as a continuation row', () => {
    expect(cellFromColumns('-', '-', '-')).toEqual({ kind: 'continuation' });
  });

  it('reads a start row, blank optional columns as null', () => {
    expect(cellFromColumns(' client-a ', '', 'Haircut')).toEqual({
      kind: 'start',
      clientId: 'client-a',
      clientName: null,
      serviceName: 'Haircut',
    });
  });

  it('writes each kind of cell', () => {
    expect(columnsFromCell({ kind: 'empty' })).toEqual(['', '', '']);
    expect(columnsFromCell({ kind: 'continuation' })).toEqual(['-', '-', '-']);
    expect(
      columnsFromCell({ kind: 'start', clientId: 'client-a', clientName: null, serviceName: 'Haircut' })
    ).toEqual(['client-a', '', 'Haircut']);
  });
});

describe('SheetsMirrorGateway', () => {
  const HAND_TYPED_ROW = ['5.3', '5.3.2030', '9:00', 'client-a', 'Ann Lee', ''];
  const slot = (time: string, specialist: string = 'Anna') => ({ ...day(specialist), time });

  let gateway: SheetsMirrorGateway;

  beforeEach(() => {
    mockWorkbook = new FakeWorkbook();
    gateway = new SheetsMirrorGateway({
      catalogue: createCatalogue(),
      defaultSheetId: 'test-sheet',
      credentialsFile: 'test-credentials.json',
    });
  });

  describe('reading', () => {
    it('finds rows typed with single-digit dates and times', async () => {
      mockWorkbook.addWorksheet('Anna', [HAND_TYPED_ROW]);

      await expect(gateway.readSlot(slot('09:00'))).resolves.toEqual({
        kind: 'start',
        clientId: 'client-a',
        clientName: 'Ann Lee',
        serviceName: null,
      });
      const cells = await gateway.readDay(day('Anna'));
      expect([...cells.keys()]).toEqual(['09:00']);
    });

    it('leaves out rows whose date or time does not parse', async () => {
      mockWorkbook.addWorksheet('Anna', [
        ['', 'Notes', 'call back', 'client-z', '', ''],
        ['', '05.03.2030', 'lunch', 'client-y', '', ''],
        ['05.03', '05.03.2030', '10:30', 'client-b', '', 'Haircut'],
      ]);

      const cells = await gateway.readDay(day('Anna'));
      expect([...cells.keys()]).toEqual(['10:30']);
    });

    it('reads a missing worksheet as an empty day', async () => {
      await expect(gateway.readDay(day('Maria'))).resolves.toEqual(new Map());
      await expect(gateway.readSlot(slot('09:00', 'Maria'))).resolves.toEqual({ kind: 'empty' });
    });

    it('surfaces API failures as MirrorSyncError', async () => {
      mockWorkbook.addWorksheet('Anna');
      mockWorkbook.readFailure = 'backend error';

      const read = gateway.readDay(day('Anna'));
      await expect(read).rejects.toBeInstanceOf(MirrorSyncError);
      await expect(read).rejects.toThrow('Sheets readDay failed: backend error');
    });
  });

  describe('writing', () => {
    it('updates an existing row in place', async () => {
      mockWorkbook.addWorksheet('Anna', [HAND_TYPED_ROW]);

      await gateway.setSlot(slot('09:00'), {
        kind: 'start',
        clientId: 'client-b',
        clientName: 'Bob',
        serviceName: 'Haircut',
      });

      expect(mockWorkbook.rows('Anna').slice(1)).toEqual([
        ['5.3', '5.3.2030', '9:00', 'client-b', 'Bob', 'Haircut'],
      ]);
      expect(mockWorkbook.writes()).toEqual(['values.batchUpdate']);
    });

    it('appends rows, labelling only the first row of a day', async () => {
      mockWorkbook.addWorksheet('Anna', [['04.03', '04.03.2030', '09:00', 'client-z', '', '']]);

      await gateway.setSlot(slot('10:00'), ANN_HAIRCUT);
      await gateway.setSlot(slot('11:00'), { ...ANN_HAIRCUT, clientId: 'client-b' });

      expect(mockWorkbook.rows('Anna').slice(2)).toEqual([
        ['05.03', '05.03.2030', '10:00', 'client-a', 'Ann Lee', 'Haircut'],
        ['', '05.03.2030', '11:00', 'client-b', 'Ann Lee', 'Haircut'],
      ]);
    });

    it('creates a missing worksheet with its header', async () => {
      mockWorkbook.addWorksheet('Anna');

      await gateway.setSlot(slot('09:00', 'Maria'), ANN_HAIRCUT);

      expect(mockWorkbook.rows('Maria')).toEqual([
        ['Date (DD.MM)', 'Date (DD.MM.YYYY)', 'Time', 'Client ID', 'Name', 'Service'],
        ['05.03', '05.03.2030', '09:00', 'client-a', 'Ann Lee', 'Haircut'],
      ]);
    });

    it('writes nothing when clearing a row that was never written', async () => {
      mockWorkbook.addWorksheet('Anna', [HAND_TYPED_ROW]);

      await gateway.clearSlot(slot('11:00'));

      expect(mockWorkbook.writes()).toEqual([]);
    });

    it('empties the client columns when clearing a row', async () => {
      mockWorkbook.addWorksheet('Anna', [HAND_TYPED_ROW]);

      await gateway.clearSlot(slot('09:00'));

      expect(mockWorkbook.rows('Anna')[1]).toEqual(['5.3', '5.3.2030', '9:00', '', '', '']);
      await expect(gateway.readSlot(slot('09:00'))).resolves.toEqual({ kind: 'empty' });
    });

    it('runs concurrent writes to one worksheet one after another', async () => {
      await Promise.all([
        gateway.setSlot(slot('09:00'), ANN_HAIRCUT),
        gateway.setSlot(slot('10:00'), { ...ANN_HAIRCUT, clientId: 'client-b' }),
      ]);

      expect(mockWorkbook.rows('Anna').slice(1)).toEqual([
        ['05.03', '05.03.2030', '09:00', 'client-a', 'Ann Lee', 'Haircut'],
        ['', '05.03.2030', '10:00', 'client-b', 'Ann Lee', 'Haircut'],
      ]);
      expect(mockWorkbook.writes()).toEqual([
        'spreadsheets.batchUpdate',
        'values.update',
        'values.append',
        'values.append',
      ]);
    });

    it('keeps the first of duplicate rows and empties the rest', async () => {
      mockWorkbook.addWorksheet('Anna', [
        ['05.03', '05.03.2030', '09:00', 'client-a', 'Ann Lee', ''],
        ['', '5.3.2030', '9:00', 'client-x', 'Someone', ''],
      ]);
      const before = await gateway.readDay(day('Anna'));
      expect(before.get('09:00')).toEqual({
        kind: 'start',
        clientId: 'client-a',
        clientName: 'Ann Lee',
        serviceName: null,
      });

      await gateway.setSlot(slot('09:00'), {
        kind: 'start',
        clientId: 'client-b',
        clientName: 'Bob',
        serviceName: 'Haircut',
      });

      expect(mockWorkbook.rows('Anna').slice(1)).toEqual([
        ['05.03', '05.03.2030', '09:00', 'client-b', 'Bob', 'Haircut'],
        ['', '5.3.2030', '9:00', '', '', ''],
      ]);
    });
  });

  describe('with the reconciler', () => {
    it('keeps a synced booking whose row was typed by hand', async () => {
      mockWorkbook.addWorksheet('Anna', [HAND_TYPED_ROW]);
      const catalogue = createCatalogue();
      const store = new MemoryBookingStore();
      const booking = store.seed(
        {
          projectId: PROJECT_ID,
          specialist: 'Anna',
          date: TOMORROW,
          startTime: '09:00',
          durationSlots: 1,
          clientId: 'client-a',
          clientName: 'Ann Lee',
          clientPhone: null,
          serviceName: null,
        },
        {
          mirrorSyncedVersion: 1,
          mirrorSyncedAt: new Date(Date.now() - 60_000),
          mirrorRanges: [{ specialist: 'Anna', date: TOMORROW, startTime: '09:00', durationSlots: 1 }],
        }
      );
      const reconciler = new MirrorReconciler({
        store,
        catalogue,
        mirror: gateway,
        publisher: new MirrorPublisher(store, gateway, catalogue),
        locks: new MemoryLocks(),
        settings: { enabled: true, intervalMs: 60_000, days: 2 },
        today: () => TODAY,
      });

      const result = await reconciler.reconcileDay(PROJECT_ID, 'Anna', TOMORROW);

      expect(result.cancelled).toBe(0);
      expect(result.created).toBe(0);
      expect((await store.findById(booking.id))?.status).toBe('active');
      expect(mockWorkbook.writes()).toEqual([]);
    });
  });
});
