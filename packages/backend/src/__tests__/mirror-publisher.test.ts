/**
 * Tests for pushing committed bookings to the spreadsheet mirror
 */

jest.mock('../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

import type { NewBooking } from '../stores/booking.store';
import { MirrorPublisher } from '../services/mirror-publisher.service';
import { FakeMirror } from './support/fake-mirror';
import { createCatalogue, day, PROJECT_ID, TOMORROW } from './support/fixtures';
import { MemoryBookingStore } from './support/memory-booking.store';

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

describe('MirrorPublisher', () => {
  let store: MemoryBookingStore;
  let mirror: FakeMirror;
  let publisher: MirrorPublisher;

  beforeEach(() => {
    store = new MemoryBookingStore();
    mirror = new FakeMirror();
    publisher = new MirrorPublisher(store, mirror, createCatalogue());
  });

  it('writes the client on the start row and the marker on the rest', async () => {
    const booking = store.seed(newBooking({ durationSlots: 3, clientName: 'Ann Lee', serviceName: 'Colouring' }));

    await publisher.sync(booking.id);

    expect(mirror.writes.map((write) => [write.ref.time, write.cell])).toEqual([
      ['10:00', { kind: 'start', clientId: 'client-a', clientName: 'Ann Lee', serviceName: 'Colouring' }],
      ['10:30', { kind: 'continuation' }],
      ['11:00', { kind: 'continuation' }],
    ]);
    const stored = await store.findById(booking.id);
    expect(stored?.mirrorSyncedVersion).toBe(1);
  });

  it('clears a range left behind by an earlier failed sync', async () => {
    const booking = store.seed(newBooking({ startTime: '11:00' }), {
      mirrorRanges: [{ specialist: 'Anna', date: TOMORROW, startTime: '09:00', durationSlots: 1 }],
    });
    mirror.put({ ...day('Anna'), time: '09:00' }, { kind: 'start', clientId: 'client-a', clientName: null, serviceName: null });

    await publisher.sync(booking.id);

    expect(mirror.describeDay(day('Anna'))).toEqual(['11:00 client-a']);
    expect((await store.findById(booking.id))?.mirrorRanges).toEqual([
      { specialist: 'Anna', date: TOMORROW, startTime: '11:00', durationSlots: 1 },
    ]);
  });

  it('keeps rows another active booking covers when clearing', async () => {
    store.seed(newBooking({ startTime: '10:30', clientId: 'client-b' }));
    mirror.put({ ...day('Anna'), time: '10:00' }, { kind: 'start', clientId: 'client-a', clientName: null, serviceName: null });
    mirror.put({ ...day('Anna'), time: '10:30' }, { kind: 'continuation' });

    await publisher.clearRange(PROJECT_ID, 'client-a', {
      specialist: 'Anna',
      date: TOMORROW,
      startTime: '10:00',
      durationSlots: 2,
    });

    expect(mirror.describeDay(day('Anna'))).toEqual(['10:30 -']);
  });

  it('does not mark a booking synced when it changed during the sync', async () => {
    const booking = store.seed(newBooking());
    mirror.setSlot = async (ref, cell) => {
      mirror.put(ref, cell);
      await store.withDayLocks([day('Anna')], (scope) => scope.update(booking.id, { clientName: 'Changed' }));
    };

    await publisher.sync(booking.id);

    const stored = await store.findById(booking.id);
    expect(stored?.version).toBe(2);
    expect(stored?.mirrorSyncedVersion).toBeNull();
  });

  it('ignores unknown bookings', async () => {
    await publisher.sync('00000000-0000-4000-8000-000000000000');
    expect(mirror.writes).toEqual([]);
  });
});
