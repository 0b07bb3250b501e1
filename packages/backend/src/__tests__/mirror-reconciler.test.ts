/**
 * Tests for mirror reconciliation
 * Covers: adopting removals, edits and additions from the mirror, pushing unsynced
 *         bookings, deferral while a change is in flight, sweep locking
 */

jest.mock('../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
  maskIdentifier: (value: string) => value,
}));

import type { NewBooking } from '../stores/booking.store';
import { MirrorPublisher } from '../services/mirror-publisher.service';
import { MirrorReconciler } from '../services/mirror-reconciler.service';
import { SlotAllocator } from '../services/slot-allocator.service';
import { waitForBackgroundTasks } from '../utils/background-task';
import { MirrorSyncError, ValidationError } from '../utils/errors';
import { FakeMirror } from './support/fake-mirror';
import { createCatalogue, day, PROJECT_ID, TODAY, TOMORROW } from './support/fixtures';
import { MemoryBookingStore } from './support/memory-booking.store';
import { MemoryLocks } from './support/memory-locks';

const SWEEP_LOCK = 'lock:mirror-reconcile';

function newBooking(overrides: Partial<NewBooking> = {}): NewBooking {
  return {
    projectId: PROJECT_ID,
    specialist: 'Anna',
    date: TOMORROW,
    startTime: '10:00',
    durationSlots: 1,
    clientId: 'client-a',
    clientName: null,
    clientPhone: null,
    serviceName: null,
    ...overrides,
  };
}

describe('MirrorReconciler', () => {
  let store: MemoryBookingStore;
  let mirror: FakeMirror;
  let locks: MemoryLocks;
  let allocator: SlotAllocator;
  let reconciler: MirrorReconciler;

  beforeEach(() => {
    const catalogue = createCatalogue();
    store = new MemoryBookingStore();
    mirror = new FakeMirror();
    locks = new MemoryLocks();
    const publisher = new MirrorPublisher(store, mirror, catalogue);
    allocator = new SlotAllocator({ store, catalogue, mirror, publisher, today: () => TODAY });
    reconciler = new MirrorReconciler({
      store,
      catalogue,
      mirror,
      publisher,
      locks,
      settings: { enabled: true, intervalMs: 60_000, days: 2 },
      today: () => TODAY,
    });
  });

  afterEach(async () => {
    await waitForBackgroundTasks(5000);
  });

  async function bookAndMirror(startTime: string, clientId: string = 'client-a') {
    const booking = await allocator.allocate({
      projectId: PROJECT_ID,
      specialist: 'Anna',
      date: TOMORROW,
      startTime,
      durationSlots: 1,
      clientId,
      clientName: 'Ann Lee',
    });
    await waitForBackgroundTasks();
    return booking;
  }

  describe('reconcileDay', () => {
    it('cancels a synced booking whose row was removed from the mirror', async () => {
      const booking = await bookAndMirror('10:00');
      mirror.remove({ ...day('Anna'), time: '10:00' });

      const result = await reconciler.reconcileDay(PROJECT_ID, 'Anna', TOMORROW);

      expect(result.cancelled).toBe(1);
      const stored = await store.findById(booking.id);
      expect(stored?.status).toBe('cancelled');
      expect(stored?.mirrorSyncedVersion).toBe(stored?.version);
      expect(stored?.mirrorRanges).toEqual([]);
    });

    it('takes client fields edited in the mirror', async () => {
      const booking = await bookAndMirror('10:00');
      mirror.put(
        { ...day('Anna'), time: '10:00' },
        { kind: 'start', clientId: 'client-a', clientName: 'Ann Lee-Smith', serviceName: 'Haircut' }
      );

      const result = await reconciler.reconcileDay(PROJECT_ID, 'Anna', TOMORROW);

      expect(result.updated).toBe(1);
      const stored = await store.findById(booking.id);
      expect(stored?.clientName).toBe('Ann Lee-Smith');
      expect(stored?.serviceName).toBe('Haircut');
      expect(stored?.mirrorSyncedVersion).toBe(2);
      expect(result.pushed).toBe(0);
    });

    it('creates a booking for a run added by staff', async () => {
      mirror.put({ ...day('Anna'), time: '09:00' }, { kind: 'start', clientId: 'walk-in', clientName: 'Bob', serviceName: null });
      mirror.put({ ...day('Anna'), time: '09:30' }, { kind: 'continuation' });

      const result = await reconciler.reconcileDay(PROJECT_ID, 'Anna', TOMORROW);

      expect(result.created).toBe(1);
      const [created] = store.active();
      expect(created).toMatchObject({
        specialist: 'Anna',
        date: TOMORROW,
        startTime: '09:00',
        durationSlots: 2,
        clientId: 'walk-in',
        clientName: 'Bob',
        mirrorSyncedVersion: 1,
      });
      expect(await allocator.getAvailableSlots(PROJECT_ID, 'Anna', TOMORROW, 1)).toEqual(['10:00', '10:30', '11:00', '11:30']);
    });

    it('skips a mirror row off the slot grid', async () => {
      mirror.put({ ...day('Anna'), time: '09:15' }, { kind: 'start', clientId: 'walk-in', clientName: null, serviceName: null });

      const result = await reconciler.reconcileDay(PROJECT_ID, 'Anna', TOMORROW);

      expect(result.skipped).toBe(1);
      expect(store.all()).toHaveLength(0);
    });

    it('pushes a booking the mirror never received instead of cancelling it', async () => {
      mirror.writesFail = true;
      const booking = await bookAndMirror('10:00');
      mirror.writesFail = false;

      const result = await reconciler.reconcileDay(PROJECT_ID, 'Anna', TOMORROW);

      expect(result).toMatchObject({ cancelled: 0, pushed: 1, pushFailed: 0 });
      expect(mirror.describeDay(day('Anna'))).toEqual(['10:00 client-a']);
      expect((await store.findById(booking.id))?.mirrorSyncedVersion).toBe(1);
    });

    it('counts a failed push and keeps the booking active', async () => {
      mirror.writesFail = true;
      const booking = await bookAndMirror('10:00');

      const result = await reconciler.reconcileDay(PROJECT_ID, 'Anna', TOMORROW);

      expect(result).toMatchObject({ cancelled: 0, pushed: 0, pushFailed: 1 });
      expect((await store.findById(booking.id))?.status).toBe('active');
    });

    it('leaves a mirror row alone while its client has a change in flight', async () => {
      // Moved locally from 09:00 to 11:00; the mirror has not caught up yet
      store.seed(newBooking({ startTime: '11:00', clientId: 'client-x' }));
      mirror.put({ ...day('Anna'), time: '09:00' }, { kind: 'start', clientId: 'client-x', clientName: null, serviceName: null });

      const result = await reconciler.reconcileDay(PROJECT_ID, 'Anna', TOMORROW);

      expect(result).toMatchObject({ created: 0, deferred: 1, pushed: 1 });
      expect(store.all()).toHaveLength(1);
    });

    it('does not adopt a mirror row that overlaps an unsynced local booking', async () => {
      store.seed(newBooking({ startTime: '10:00', durationSlots: 2 }));
      mirror.put({ ...day('Anna'), time: '10:30' }, { kind: 'start', clientId: 'walk-in', clientName: null, serviceName: null });

      const result = await reconciler.reconcileDay(PROJECT_ID, 'Anna', TOMORROW);

      expect(result.skipped).toBe(1);
      expect(result.created).toBe(0);
      expect(store.active()).toHaveLength(1);
    });

    it('is a no-op on a day that already agrees', async () => {
      await bookAndMirror('10:00');
      const result = await reconciler.reconcileDay(PROJECT_ID, 'Anna', TOMORROW);
      expect(result).toEqual({ cancelled: 0, updated: 0, created: 0, skipped: 0, deferred: 0, pushed: 0, pushFailed: 0 });
    });

    it('fails the day when the mirror cannot be read', async () => {
      mirror.readsFail = true;
      await expect(reconciler.reconcileDay(PROJECT_ID, 'Anna', TOMORROW)).rejects.toThrow(MirrorSyncError);
    });

    it('rejects a malformed date', async () => {
      await expect(reconciler.reconcileDay(PROJECT_ID, 'Anna', '5 March')).rejects.toThrow(ValidationError);
    });
  });

  describe('reconcileAll', () => {
    it('sweeps every specialist and day in the window and releases the lock', async () => {
      mirror.put({ ...day('Maria', TODAY), time: '11:00' }, { kind: 'start', clientId: 'walk-in', clientName: null, serviceName: null });

      const result = await reconciler.reconcileAll('manual');

      expect(result).toMatchObject({ days: 4, failedDays: 0, created: 1 });
      expect(locks.held.size).toBe(0);
      expect(reconciler.getStatus()).toMatchObject({ lastTrigger: 'manual', lastError: null, running: false });
    });

    it('counts failed days and carries on', async () => {
      mirror.readsFail = true;
      const result = await reconciler.reconcileAll('scheduled');
      expect(result).toMatchObject({ days: 4, failedDays: 4 });
    });

    it('returns null while another instance holds the sweep lock', async () => {
      locks.held.set(SWEEP_LOCK, 'other-instance');
      expect(await reconciler.reconcileAll('manual')).toBeNull();
      expect(locks.held.get(SWEEP_LOCK)).toBe('other-instance');
    });

    it('returns null for a sweep that overlaps one already running here', async () => {
      const first = reconciler.reconcileAll('manual');
      const second = reconciler.reconcileAll('manual');

      expect(await second).toBeNull();
      expect(await first).toMatchObject({ days: 4 });
    });
  });

  describe('scheduleSpecialist', () => {
    it('resolves the specialist and reconciles in the background', async () => {
      mirror.put({ ...day('Anna'), time: '09:00' }, { kind: 'start', clientId: 'walk-in', clientName: null, serviceName: null });

      expect(reconciler.scheduleSpecialist(PROJECT_ID, 'anna')).toBe('Anna');
      await waitForBackgroundTasks();

      expect(store.active().map((booking) => booking.startTime)).toEqual(['09:00']);
    });

    it('rejects unknown specialists before queueing anything', () => {
      expect(() => reconciler.scheduleSpecialist(PROJECT_ID, 'Olga')).toThrow(ValidationError);
    });
  });
});
