import { BOOKING_STATUS } from '@slotkeeper/shared';
import type { Booking, BookingStore, MirrorRange } from '../stores/booking.store';
import { mirrorRangeOf, sameMirrorRange } from '../stores/booking.store';
import { runBackgroundTask } from '../utils/background-task';
import { logger } from '../utils/logger';
import { coveredSlots, formatTime, parseTime, type TimeRange } from '../utils/slot-time';
import { CONTINUATION_CELL, type MirrorGateway } from './mirror-gateway';
import type { ProjectCatalogue } from '../config/projects';

/**
 * Writes committed booking state to the spreadsheet mirror.
 *
 * A sync always re-reads the booking and writes its latest version, so syncs
 * that run out of order converge. Every range the booking may have left in the
 * mirror is tracked on the booking itself, so a range that failed to clear is
 * retried by the next sync instead of being forgotten.
 */
export class MirrorPublisher {
  constructor(
    private readonly store: BookingStore,
    private readonly mirror: MirrorGateway,
    private readonly catalogue: ProjectCatalogue
  ) {}

  /**
   * Fire-and-forget sync after a commit. Failures are logged by the task runner
   * and healed by the next reconciliation pass.
   */
  schedule(bookingId: string): void {
    runBackgroundTask(() => this.sync(bookingId), {
      name: 'mirror-sync',
      context: { bookingId },
    });
  }

  /**
   * Bring the mirror in line with the booking's latest version and mark it synced.
   * Throws MirrorSyncError on the first failed write.
   */
  async sync(bookingId: string): Promise<void> {
    const booking = await this.store.findById(bookingId);
    if (!booking) {
      logger.warn({ bookingId }, 'Mirror sync for unknown booking');
      return;
    }

    const target = booking.status === BOOKING_STATUS.ACTIVE ? mirrorRangeOf(booking) : null;
    if (target && !booking.mirrorRanges.some((range) => sameMirrorRange(range, target))) {
      // Recorded first so a crash between the write and markSynced still leaves it tracked
      await this.store.addMirrorRange(booking.id, target);
    }

    for (const range of booking.mirrorRanges) {
      if (target && sameMirrorRange(range, target)) continue;
      await this.clearRange(booking.projectId, booking.clientId, range);
    }

    if (target) {
      await this.writeBooking(booking);
    }

    const marked = await this.store.markSynced(booking.id, booking.version, new Date(), target ? [target] : []);
    logger.info(
      { bookingId: booking.id, version: booking.version, status: booking.status, marked },
      marked ? 'Booking mirrored' : 'Booking changed during mirror sync, left for the next pass'
    );
  }

  /**
   * Start row carries the client; the rest of the run carries the continuation marker
   */
  async writeBooking(booking: Booking): Promise<void> {
    const [first, ...rest] = this.timesOf(booking.projectId, booking);
    if (first === undefined) return;

    const day = { projectId: booking.projectId, specialist: booking.specialist, date: booking.date };
    await this.mirror.setSlot(
      { ...day, time: first },
      {
        kind: 'start',
        clientId: booking.clientId,
        clientName: booking.clientName,
        serviceName: booking.serviceName,
      }
    );
    for (const time of rest) {
      await this.mirror.setSlot({ ...day, time }, CONTINUATION_CELL);
    }
  }

  /**
   * Clear the rows of `range` that no active booking covers. A row that shows
   * a different client was written by someone else and is left alone.
   */
  async clearRange(projectId: string, clientId: string, range: MirrorRange): Promise<void> {
    const day = { projectId, specialist: range.specialist, date: range.date };
    const active = await this.store.listActive(day);

    const keep = new Set<string>();
    for (const booking of active) {
      for (const time of this.timesOf(projectId, booking)) keep.add(time);
    }

    for (const time of this.timesOf(projectId, range)) {
      if (keep.has(time)) continue;

      const ref = { ...day, time };
      const cell = await this.mirror.readSlot(ref);
      if (cell.kind === 'empty') continue;
      if (cell.kind === 'start' && cell.clientId !== clientId) {
        logger.info({ ...ref, clientId: cell.clientId }, 'Mirror row now shows another client, not clearing');
        continue;
      }
      await this.mirror.clearSlot(ref);
    }
  }

  private timesOf(projectId: string, range: TimeRange): string[] {
    const project = this.catalogue.get(projectId);
    const start = parseTime(range.startTime);
    if (start === null) return [];
    return coveredSlots(start, range.durationSlots, project.slotMinutes).map(formatTime);
  }
}
