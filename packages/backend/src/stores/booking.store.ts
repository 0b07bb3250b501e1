import type { BookingStatus } from '@slotkeeper/shared';

/** A run of rows the booking may occupy in the mirror */
export interface MirrorRange {
  specialist: string;
  date: string;
  startTime: string;
  durationSlots: number;
}

export interface Booking {
  id: string;
  projectId: string;
  specialist: string;
  /** YYYY-MM-DD */
  date: string;
  /** HH:MM */
  startTime: string;
  durationSlots: number;
  clientId: string;
  clientName: string | null;
  clientPhone: string | null;
  serviceName: string | null;
  status: BookingStatus;
  /** Incremented on every mutation */
  version: number;
  /** Version last written to the spreadsheet mirror, null if never */
  mirrorSyncedVersion: number | null;
  mirrorSyncedAt: Date | null;
  /**
   * Ranges that may still be written in the mirror. A range is added before it
   * is written and the list is reset to the current range once a sync completes.
   */
  mirrorRanges: MirrorRange[];
  createdAt: Date;
  updatedAt: Date;
}

/** One lockable unit of the calendar: a specialist's day within a project */
export interface DayKey {
  projectId: string;
  specialist: string;
  date: string;
}

export interface NewBooking {
  projectId: string;
  specialist: string;
  date: string;
  startTime: string;
  durationSlots: number;
  clientId: string;
  clientName: string | null;
  clientPhone: string | null;
  serviceName: string | null;
}

export type BookingPatch = Partial<
  Pick<
    Booking,
    'specialist' | 'date' | 'startTime' | 'durationSlots' | 'clientId' | 'clientName' | 'clientPhone' | 'serviceName'
  >
>;

export interface WriteOptions {
  /**
   * The mirror already shows this state (reconciliation adopting a mirror edit).
   * The new version is recorded as synced at this time, with the booking's own
   * range as its mirror range (none once cancelled).
   */
  mirrorSyncedAt?: Date;
}

/**
 * Operations available while one or more days are locked. Reads return the
 * state inside the lock; writes bump `version`.
 */
export interface BookingDayScope {
  activeOn(key: DayKey): Promise<Booking[]>;
  findById(id: string): Promise<Booking | null>;
  listByClient(projectId: string, clientId: string): Promise<Booking[]>;
  insert(input: NewBooking, options?: WriteOptions): Promise<Booking>;
  update(id: string, patch: BookingPatch, options?: WriteOptions): Promise<Booking>;
  cancel(id: string, options?: WriteOptions): Promise<Booking>;
}

export type BookingStatusCounts = Record<BookingStatus, number>;

export interface ClientBookingFilter {
  activeOnly?: boolean;
  /** Only bookings on or after this YYYY-MM-DD */
  fromDate?: string;
}

export interface BookingStore {
  /**
   * Lock the given days (deduplicated, in sorted key order) for the duration of `fn`
   */
  withDayLocks<T>(keys: readonly DayKey[], fn: (scope: BookingDayScope) => Promise<T>): Promise<T>;
  findById(id: string): Promise<Booking | null>;
  listActive(key: DayKey): Promise<Booking[]>;
  listByClient(projectId: string, clientId: string, filter?: ClientBookingFilter): Promise<Booking[]>;
  /**
   * Bookings whose current version is not in the mirror and that are on this day
   * now or may still have rows on it
   */
  listUnsynced(key: DayKey): Promise<Booking[]>;
  /** Add a range to the booking's mirror ranges unless already listed */
  addMirrorRange(id: string, range: MirrorRange): Promise<void>;
  /**
   * Record that `version` is in the mirror and that `ranges` are the only rows it
   * occupies there. No-op (false) if the booking has moved past `version`.
   */
  markSynced(id: string, version: number, syncedAt: Date, ranges: MirrorRange[]): Promise<boolean>;
  countByStatus(projectId?: string): Promise<BookingStatusCounts>;
}

export function mirrorRangeOf(booking: Booking): MirrorRange {
  return {
    specialist: booking.specialist,
    date: booking.date,
    startTime: booking.startTime,
    durationSlots: booking.durationSlots,
  };
}

export function sameMirrorRange(a: MirrorRange, b: MirrorRange): boolean {
  return (
    a.specialist === b.specialist &&
    a.date === b.date &&
    a.startTime === b.startTime &&
    a.durationSlots === b.durationSlots
  );
}

export function dayKeyId(key: DayKey): string {
  return `${key.projectId}\u0000${key.specialist}\u0000${key.date}`;
}

/**
 * Deduplicate and sort day keys so every caller acquires locks in the same order
 */
export function orderDayKeys(keys: readonly DayKey[]): DayKey[] {
  const unique = new Map<string, DayKey>();
  for (const key of keys) {
    unique.set(dayKeyId(key), key);
  }
  return [...unique.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, key]) => key);
}
