/**
 * Slot Allocator
 *
 * Conflict-free booking across the database of record and the spreadsheet mirror:
 * 1. validate (before any lock)
 * 2. cross-check the mirror (outside any lock; a mirror outage does not block)
 * 3. lock the day(s), re-check against active bookings, write
 * 4. push to the mirror in the background
 */

import { BOOKING_STATUS } from '@slotkeeper/shared';
import type { ProjectCatalogue, ProjectConfig } from '../config/projects';
import type {
  Booking,
  BookingPatch,
  BookingStatusCounts,
  BookingStore,
  DayKey,
} from '../stores/booking.store';
import { isIsoDate } from '../utils/date-parser';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import {
  availableStarts,
  buildSlotGrid,
  coveredSlots,
  formatTime,
  occupiedSlotStarts,
  parseTime,
  rangesOverlap,
  type TimeRange,
} from '../utils/slot-time';
import type { MirrorCell, MirrorGateway } from './mirror-gateway';
import type { MirrorPublisher } from './mirror-publisher.service';

export interface AllocateRequest {
  projectId: string;
  specialist: string;
  date: string;
  startTime: string;
  durationSlots: number;
  clientId: string;
  clientName?: string | null;
  clientPhone?: string | null;
  serviceName?: string | null;
}

export interface ChangeRequest {
  specialist?: string;
  date?: string;
  startTime?: string;
  durationSlots?: number;
  serviceName?: string | null;
  clientName?: string | null;
  clientPhone?: string | null;
}

export interface BookingHint {
  serviceName?: string | null;
  date?: string | null;
  startTime?: string | null;
}

export interface SlotAllocatorDeps {
  store: BookingStore;
  catalogue: ProjectCatalogue;
  mirror: MirrorGateway;
  publisher: MirrorPublisher;
  /** Today's date (YYYY-MM-DD) in the business timezone */
  today: () => string;
}

interface ValidatedRun {
  project: ProjectConfig;
  key: DayKey;
  startTime: string;
  durationSlots: number;
}

export class SlotAllocator {
  constructor(private readonly deps: SlotAllocatorDeps) {}

  // ============================================
  // Queries
  // ============================================

  async getAvailableSlots(
    projectId: string,
    specialist: string,
    date: string,
    durationSlots: number
  ): Promise<string[]> {
    const project = this.deps.catalogue.get(projectId);
    const name = this.deps.catalogue.resolveSpecialist(project, specialist);
    if (!isIsoDate(date)) {
      throw new ValidationError(`Invalid date: ${date}`, { date });
    }
    this.assertDuration(durationSlots);

    const grid = buildSlotGrid(project.workHours, project.slotMinutes);
    const active = await this.deps.store.listActive({ projectId, specialist: name, date });
    const occupied = occupiedSlotStarts(grid, active, project.slotMinutes);

    return availableStarts(grid, occupied, durationSlots, project.slotMinutes).map(formatTime);
  }

  durationSlotsFor(projectId: string, serviceName: string | null | undefined): number {
    const project = this.deps.catalogue.get(projectId);
    return this.deps.catalogue.durationSlotsFor(project, serviceName);
  }

  async listClientBookings(projectId: string, clientId: string, activeOnly: boolean = true): Promise<Booking[]> {
    this.deps.catalogue.get(projectId);
    return this.deps.store.listByClient(projectId, clientId, {
      activeOnly,
      fromDate: activeOnly ? this.deps.today() : undefined,
    });
  }

  /**
   * Pick the client's upcoming booking a cancel/change request refers to:
   * same service first, then same date (and time), then the most recently created.
   */
  async findClientBooking(projectId: string, clientId: string, hint: BookingHint = {}): Promise<Booking | null> {
    const bookings = await this.listClientBookings(projectId, clientId, true);
    if (bookings.length === 0) return null;

    if (hint.serviceName) {
      const wanted = hint.serviceName.trim().toLowerCase();
      const byService = bookings.find((booking) => booking.serviceName?.toLowerCase() === wanted);
      if (byService) return byService;
    }

    if (hint.date) {
      const sameDay = bookings.filter((booking) => booking.date === hint.date);
      const byTime = hint.startTime
        ? sameDay.find((booking) => booking.startTime === hint.startTime)
        : undefined;
      if (byTime) return byTime;
      if (sameDay.length > 0) return sameDay[0];
    }

    return [...bookings].sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())[0];
  }

  async getBookingStats(projectId?: string): Promise<BookingStatusCounts> {
    return this.deps.store.countByStatus(projectId);
  }

  // ============================================
  // Mutations
  // ============================================

  async allocate(request: AllocateRequest): Promise<Booking> {
    if (!request.clientId) {
      throw new ValidationError('clientId is required');
    }
    const run = this.validateRun(request.projectId, request.specialist, request.date, request.startTime, request.durationSlots);

    await this.checkMirror(run);

    const booking = await this.deps.store.withDayLocks([run.key], async (scope) => {
      const active = await scope.activeOn(run.key);
      this.assertNoOverlap(run, active);

      return scope.insert({
        ...run.key,
        startTime: run.startTime,
        durationSlots: run.durationSlots,
        clientId: request.clientId,
        clientName: request.clientName ?? null,
        clientPhone: request.clientPhone ?? null,
        serviceName: request.serviceName ?? null,
      });
    });

    logger.info(
      {
        bookingId: booking.id,
        projectId: booking.projectId,
        clientId: booking.clientId,
        specialist: booking.specialist,
        date: booking.date,
        startTime: booking.startTime,
        durationSlots: booking.durationSlots,
      },
      'Booking allocated'
    );

    this.deps.publisher.schedule(booking.id);
    return booking;
  }

  async cancel(projectId: string, bookingId: string): Promise<Booking> {
    const existing = await this.requireBooking(projectId, bookingId);

    const result = await this.deps.store.withDayLocks([existing], async (scope) => {
      const current = await scope.findById(bookingId);
      if (!current) {
        throw new NotFoundError(`Booking not found: ${bookingId}`, { bookingId });
      }
      if (current.status === BOOKING_STATUS.CANCELLED) {
        return { booking: current, changed: false };
      }
      return { booking: await scope.cancel(bookingId), changed: true };
    });

    if (result.changed) {
      logger.info(
        { bookingId, projectId, clientId: result.booking.clientId, date: result.booking.date },
        'Booking cancelled'
      );
      this.deps.publisher.schedule(bookingId);
    }
    return result.booking;
  }

  /**
   * Move or resize a booking in place (same id). The new range is checked
   * against every other active booking; the booking's own old range never
   * conflicts with it.
   */
  async change(projectId: string, bookingId: string, changes: ChangeRequest): Promise<Booking> {
    const existing = await this.requireBooking(projectId, bookingId);
    if (existing.status !== BOOKING_STATUS.ACTIVE) {
      throw new ValidationError('Cancelled bookings cannot be changed', { bookingId });
    }

    const durationSlots =
      changes.durationSlots ??
      (changes.serviceName !== undefined && changes.serviceName !== existing.serviceName
        ? this.durationSlotsFor(projectId, changes.serviceName)
        : existing.durationSlots);

    const run = this.validateRun(
      projectId,
      changes.specialist ?? existing.specialist,
      changes.date ?? existing.date,
      changes.startTime ?? existing.startTime,
      durationSlots
    );

    await this.checkMirror(run, existing);

    const { before, after } = await this.deps.store.withDayLocks([existing, run.key], async (scope) => {
      const current = await scope.findById(bookingId);
      if (!current || current.status !== BOOKING_STATUS.ACTIVE) {
        throw new NotFoundError(`Active booking not found: ${bookingId}`, { bookingId });
      }
      // The run and the locked days were derived from `existing`
      if (current.version !== existing.version) {
        throw new ConflictError(`Booking ${bookingId} was changed concurrently`, 'local', {
          bookingId,
          expectedVersion: existing.version,
          actualVersion: current.version,
        });
      }

      const active = (await scope.activeOn(run.key)).filter((booking) => booking.id !== bookingId);
      this.assertNoOverlap(run, active);

      const patch: BookingPatch = {
        specialist: run.key.specialist,
        date: run.key.date,
        startTime: run.startTime,
        durationSlots: run.durationSlots,
      };
      if (changes.serviceName !== undefined) patch.serviceName = changes.serviceName;
      if (changes.clientName !== undefined) patch.clientName = changes.clientName;
      if (changes.clientPhone !== undefined) patch.clientPhone = changes.clientPhone;

      return { before: current, after: await scope.update(bookingId, patch) };
    });

    logger.info(
      {
        bookingId,
        projectId,
        clientId: after.clientId,
        from: { specialist: before.specialist, date: before.date, startTime: before.startTime },
        to: { specialist: after.specialist, date: after.date, startTime: after.startTime },
        version: after.version,
      },
      'Booking changed'
    );

    this.deps.publisher.schedule(bookingId);
    return after;
  }

  // ============================================
  // Internals
  // ============================================

  private async requireBooking(projectId: string, bookingId: string): Promise<Booking> {
    this.deps.catalogue.get(projectId);
    const booking = await this.deps.store.findById(bookingId);
    if (!booking || booking.projectId !== projectId) {
      throw new NotFoundError(`Booking not found: ${bookingId}`, { bookingId, projectId });
    }
    return booking;
  }

  private assertDuration(durationSlots: number): void {
    if (!Number.isInteger(durationSlots) || durationSlots < 1) {
      throw new ValidationError(`durationSlots must be a positive integer, got ${durationSlots}`);
    }
  }

  private validateRun(
    projectId: string,
    specialist: string,
    date: string,
    startTime: string,
    durationSlots: number
  ): ValidatedRun {
    const project = this.deps.catalogue.get(projectId);
    const name = this.deps.catalogue.resolveSpecialist(project, specialist);

    if (!isIsoDate(date)) {
      throw new ValidationError(`Invalid date: ${date}`, { date });
    }
    if (date < this.deps.today()) {
      throw new ValidationError(`Date is in the past: ${date}`, { date });
    }
    this.assertDuration(durationSlots);

    const start = parseTime(startTime);
    if (start === null) {
      throw new ValidationError(`Invalid time: ${startTime}`, { startTime });
    }

    const grid = new Set(buildSlotGrid(project.workHours, project.slotMinutes));
    if (!grid.has(start)) {
      throw new ValidationError(`${formatTime(start)} is not a slot start within business hours`, {
        startTime,
        workHours: project.workHours,
        slotMinutes: project.slotMinutes,
      });
    }
    const outside = coveredSlots(start, durationSlots, project.slotMinutes).find((slot) => !grid.has(slot));
    if (outside !== undefined) {
      throw new ValidationError(
        `Booking of ${durationSlots} slots from ${formatTime(start)} runs past closing time`,
        { startTime, durationSlots, workHours: project.workHours }
      );
    }

    return {
      project,
      key: { projectId, specialist: name, date },
      startTime: formatTime(start),
      durationSlots,
    };
  }

  /**
   * Any occupied mirror row in the requested run is a conflict; the mirror is the
   * tie-break authority. Rows of `ignore` (the booking being changed) are skipped.
   * A mirror read failure is logged and the allocation goes ahead.
   */
  private async checkMirror(run: ValidatedRun, ignore?: Booking): Promise<void> {
    const start = parseTime(run.startTime) ?? 0;
    const times = coveredSlots(start, run.durationSlots, run.project.slotMinutes).map(formatTime);

    const ignoredTimes = new Set<string>();
    if (ignore && ignore.specialist === run.key.specialist && ignore.date === run.key.date) {
      const ignoreStart = parseTime(ignore.startTime) ?? 0;
      for (const slot of coveredSlots(ignoreStart, ignore.durationSlots, run.project.slotMinutes)) {
        ignoredTimes.add(formatTime(slot));
      }
    }

    const toCheck = times.filter((time) => !ignoredTimes.has(time));
    let cells: Array<{ time: string; cell: MirrorCell }>;
    try {
      cells = await Promise.all(
        toCheck.map(async (time) => ({ time, cell: await this.deps.mirror.readSlot({ ...run.key, time }) }))
      );
    } catch (error) {
      logger.warn({ err: error, ...run.key, startTime: run.startTime }, 'Mirror unavailable for cross-check, relying on local store');
      return;
    }

    const taken = cells.find(({ cell }) => cell.kind !== 'empty');
    if (taken) {
      logger.info({ ...run.key, time: taken.time }, 'Slot occupied in mirror');
      throw new ConflictError(`Slot ${taken.time} is already taken`, 'mirror', {
        ...run.key,
        time: taken.time,
      });
    }
  }

  private assertNoOverlap(run: ValidatedRun, active: Booking[]): void {
    const requested: TimeRange = { startTime: run.startTime, durationSlots: run.durationSlots };
    const clash = active.find((booking) => rangesOverlap(requested, booking, run.project.slotMinutes));
    if (clash) {
      logger.info(
        { ...run.key, startTime: run.startTime, conflictingBookingId: clash.id },
        'Slot occupied locally'
      );
      throw new ConflictError(`Slot ${run.startTime} is already taken`, 'local', {
        ...run.key,
        startTime: run.startTime,
        conflictingBookingId: clash.id,
      });
    }
  }
}
