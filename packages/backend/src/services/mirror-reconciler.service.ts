/**
 * Mirror Reconciler
 *
 * Brings the database of record and the spreadsheet mirror back together.
 * The mirror is the tie-break authority for bookings it already showed: a row
 * removed or edited by staff is adopted locally, a row added by staff becomes a
 * booking. Local changes the mirror has not seen yet are pushed instead.
 *
 * "Seen" is decided by version: a booking counts as settled only if its current
 * version was written to the mirror before the mirror day was read.
 */

import { BOOKING_STATUS } from '@slotkeeper/shared';
import type { ProjectCatalogue } from '../config/projects';
import type { Booking, BookingDayScope, BookingStore, DayKey } from '../stores/booking.store';
import { runBackgroundTask } from '../utils/background-task';
import { dateRange, isIsoDate } from '../utils/date-parser';
import { ValidationError, errorMessage } from '../utils/errors';
import { LockedTaskRunner } from '../utils/locked-task-runner';
import { logger } from '../utils/logger';
import type { DistributedLocks } from '../utils/redis-locks';
import { buildSlotGrid, formatTime, parseTime, rangesOverlap } from '../utils/slot-time';
import { DEFAULT_TIMEOUTS } from '../utils/timeout';
import type { MirrorGateway, OccupiedMirrorCell } from './mirror-gateway';
import type { MirrorPublisher } from './mirror-publisher.service';

const LOCK_KEY = 'lock:mirror-reconcile';
const LOCK_TTL_SECONDS = 120;
const LOCK_RENEWAL_INTERVAL_MS = 30 * 1000;

// Startup delay to allow the server to come up before the first sweep
const STARTUP_DELAY_MS = 30 * 1000;

export interface ReconcilerSettings {
  enabled: boolean;
  intervalMs: number;
  /** Days swept, starting today */
  days: number;
}

export interface MirrorReconcilerDeps {
  store: BookingStore;
  catalogue: ProjectCatalogue;
  mirror: MirrorGateway;
  publisher: MirrorPublisher;
  locks: DistributedLocks;
  settings: ReconcilerSettings;
  /** Today's date (YYYY-MM-DD) in the business timezone */
  today: () => string;
}

export interface DayReconcileResult {
  /** Local bookings cancelled because their mirror row was removed */
  cancelled: number;
  /** Local bookings whose client fields were taken from the mirror */
  updated: number;
  /** Bookings created from rows added to the mirror */
  created: number;
  /** Mirror rows that could not become bookings (off-grid or overlapping) */
  skipped: number;
  /** Mirror rows left for a later pass while the client has changes in flight */
  deferred: number;
  /** Unsynced bookings pushed to the mirror */
  pushed: number;
  pushFailed: number;
}

export interface SweepResult extends DayReconcileResult {
  days: number;
  failedDays: number;
}

export type SweepTrigger = 'startup' | 'scheduled' | 'manual';

interface ReconcilerStatus {
  enabled: boolean;
  running: boolean;
  intervalMs: number;
  days: number;
  lastRunAt: Date | null;
  lastTrigger: SweepTrigger | null;
  lastResult: SweepResult | null;
  lastError: string | null;
}

function emptyResult(): DayReconcileResult {
  return { cancelled: 0, updated: 0, created: 0, skipped: 0, deferred: 0, pushed: 0, pushFailed: 0 };
}

function addInto(total: DayReconcileResult, day: DayReconcileResult): void {
  total.cancelled += day.cancelled;
  total.updated += day.updated;
  total.created += day.created;
  total.skipped += day.skipped;
  total.deferred += day.deferred;
  total.pushed += day.pushed;
  total.pushFailed += day.pushFailed;
}

function touchesDay(booking: Booking, key: DayKey): boolean {
  if (booking.specialist === key.specialist && booking.date === key.date) return true;
  return booking.mirrorRanges.some((range) => range.specialist === key.specialist && range.date === key.date);
}

export class MirrorReconciler {
  private intervalId: NodeJS.Timeout | null = null;
  private startupTimeoutId: NodeJS.Timeout | null = null;
  private running = false;
  private readonly instanceId: string;
  private readonly lockedRunner: LockedTaskRunner;
  private lastRunAt: Date | null = null;
  private lastTrigger: SweepTrigger | null = null;
  private lastResult: SweepResult | null = null;
  private lastError: string | null = null;

  constructor(private readonly deps: MirrorReconcilerDeps) {
    this.instanceId = `mirror-reconcile-${process.pid}-${Date.now().toString(36)}`;
    this.lockedRunner = new LockedTaskRunner(
      {
        lockKey: LOCK_KEY,
        lockTtlSeconds: LOCK_TTL_SECONDS,
        renewalIntervalMs: LOCK_RENEWAL_INTERVAL_MS,
        instanceId: this.instanceId,
        context: 'mirror-reconcile',
      },
      deps.locks
    );
  }

  // ============================================
  // Lifecycle
  // ============================================

  start(): void {
    const { settings } = this.deps;
    if (!settings.enabled) {
      logger.info('Mirror reconciliation disabled');
      return;
    }
    if (this.intervalId) {
      logger.warn('Mirror reconciler already running');
      return;
    }

    logger.info(
      { instanceId: this.instanceId, intervalMs: settings.intervalMs, days: settings.days },
      'Starting mirror reconciler'
    );

    this.startupTimeoutId = setTimeout(() => {
      this.startupTimeoutId = null;
      void this.runSafe('startup');
    }, STARTUP_DELAY_MS);

    this.intervalId = setInterval(() => {
      void this.runSafe('scheduled');
    }, settings.intervalMs);
  }

  stop(): void {
    if (this.startupTimeoutId) {
      clearTimeout(this.startupTimeoutId);
      this.startupTimeoutId = null;
    }
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    logger.info({ instanceId: this.instanceId }, 'Mirror reconciler stopped');
  }

  getStatus(): ReconcilerStatus {
    return {
      enabled: this.deps.settings.enabled,
      running: this.running,
      intervalMs: this.deps.settings.intervalMs,
      days: this.deps.settings.days,
      lastRunAt: this.lastRunAt,
      lastTrigger: this.lastTrigger,
      lastResult: this.lastResult,
      lastError: this.lastError,
    };
  }

  private async runSafe(trigger: SweepTrigger): Promise<void> {
    try {
      await this.reconcileAll(trigger);
    } catch (error) {
      logger.error({ err: error, trigger }, 'Mirror reconciliation sweep crashed');
    }
  }

  // ============================================
  // Sweeps
  // ============================================

  /**
   * Reconcile every project × specialist × day in the sweep window, under the
   * distributed sweep lock. Returns null when a sweep is already running here or
   * on another instance.
   */
  async reconcileAll(trigger: SweepTrigger = 'manual'): Promise<SweepResult | null> {
    if (this.running) {
      logger.debug({ trigger }, 'Mirror reconciliation already in progress, skipping');
      return null;
    }
    this.running = true;

    try {
      const taskResult = await this.lockedRunner.run(async (ctx) => {
        const total: SweepResult = { ...emptyResult(), days: 0, failedDays: 0 };
        const dates = dateRange(this.deps.today(), this.deps.settings.days);

        for (const project of this.deps.catalogue.list()) {
          for (const specialist of project.specialists) {
            for (const date of dates) {
              if (!ctx.isLockValid()) {
                logger.warn({ trigger }, 'Sweep lock lost, stopping mirror reconciliation early');
                return total;
              }
              await this.reconcileInto(total, project.id, specialist, date);
            }
          }
        }
        return total;
      });

      if (!taskResult.acquired) {
        logger.debug({ trigger, instanceId: this.instanceId }, 'Another instance is reconciling the mirror');
        return null;
      }
      if (taskResult.error) {
        this.lastError = taskResult.error.message;
        throw taskResult.error;
      }

      const result = taskResult.result ?? { ...emptyResult(), days: 0, failedDays: 0 };
      this.lastRunAt = new Date();
      this.lastTrigger = trigger;
      this.lastResult = result;
      this.lastError = null;
      logger.info({ trigger, ...result }, 'Mirror reconciliation sweep complete');
      return result;
    } finally {
      this.running = false;
    }
  }

  /**
   * Reconcile one specialist over the sweep window. Used after a mirror edit.
   */
  async reconcileSpecialist(projectId: string, specialist: string): Promise<SweepResult> {
    const project = this.deps.catalogue.get(projectId);
    const name = this.deps.catalogue.resolveSpecialist(project, specialist);

    const total: SweepResult = { ...emptyResult(), days: 0, failedDays: 0 };
    for (const date of dateRange(this.deps.today(), this.deps.settings.days)) {
      await this.reconcileInto(total, project.id, name, date);
    }
    logger.info({ projectId, specialist: name, ...total }, 'Mirror reconciliation of specialist complete');
    return total;
  }

  /**
   * Queue a specialist reconciliation after a mirror edit. Unknown project or
   * specialist throws ValidationError before anything is queued.
   */
  scheduleSpecialist(projectId: string, specialist: string): string {
    const project = this.deps.catalogue.get(projectId);
    const name = this.deps.catalogue.resolveSpecialist(project, specialist);

    runBackgroundTask(() => this.reconcileSpecialist(project.id, name), {
      name: 'mirror-reconcile-edit',
      timeoutMs: DEFAULT_TIMEOUTS.RECONCILE_SWEEP,
      context: { projectId, specialist: name },
    });
    return name;
  }

  private async reconcileInto(total: SweepResult, projectId: string, specialist: string, date: string): Promise<void> {
    total.days++;
    try {
      addInto(total, await this.reconcileDay(projectId, specialist, date));
    } catch (error) {
      total.failedDays++;
      logger.warn({ err: error, projectId, specialist, date }, 'Mirror reconciliation of day failed');
    }
  }

  // ============================================
  // One day
  // ============================================

  async reconcileDay(projectId: string, specialist: string, date: string): Promise<DayReconcileResult> {
    const project = this.deps.catalogue.get(projectId);
    const name = this.deps.catalogue.resolveSpecialist(project, specialist);
    if (!isIsoDate(date)) {
      throw new ValidationError(`Invalid date: ${date}`, { date });
    }
    const key: DayKey = { projectId, specialist: name, date };
    const result = emptyResult();

    // Read before locking; anything synced after this instant is newer than the read
    const readAt = new Date();
    const cells = await this.deps.mirror.readDay(key);

    const grid = buildSlotGrid(project.workHours, project.slotMinutes);
    const settled = (booking: Booking): boolean =>
      booking.mirrorSyncedVersion === booking.version &&
      booking.mirrorSyncedAt !== null &&
      booking.mirrorSyncedAt.getTime() <= readAt.getTime();

    await this.deps.store.withDayLocks([key], async (scope) => {
      const remaining = await this.adoptMirrorEdits(scope, key, cells, settled, readAt, result);
      await this.adoptMirrorRows(scope, key, cells, grid, project.slotMinutes, remaining, readAt, result);
    });

    await this.pushUnsynced(key, result);

    if (result.cancelled + result.updated + result.created + result.skipped + result.pushed + result.pushFailed > 0) {
      logger.info({ ...key, ...result }, 'Mirror day reconciled');
    }
    return result;
  }

  /**
   * Apply mirror removals and client edits to settled local bookings.
   * Returns the bookings still active afterwards.
   */
  private async adoptMirrorEdits(
    scope: BookingDayScope,
    key: DayKey,
    cells: Map<string, OccupiedMirrorCell>,
    settled: (booking: Booking) => boolean,
    readAt: Date,
    result: DayReconcileResult
  ): Promise<Booking[]> {
    const remaining: Booking[] = [];

    for (const booking of await scope.activeOn(key)) {
      if (!settled(booking)) {
        remaining.push(booking);
        continue;
      }

      const cell = cells.get(booking.startTime);
      if (!cell || cell.kind !== 'start') {
        await scope.cancel(booking.id, { mirrorSyncedAt: readAt });
        result.cancelled++;
        logger.info(
          { bookingId: booking.id, ...key, startTime: booking.startTime, clientId: booking.clientId },
          'Booking removed from mirror, cancelled locally'
        );
        continue;
      }

      if (
        cell.clientId !== booking.clientId ||
        cell.clientName !== booking.clientName ||
        cell.serviceName !== booking.serviceName
      ) {
        const updated = await scope.update(
          booking.id,
          { clientId: cell.clientId, clientName: cell.clientName, serviceName: cell.serviceName },
          { mirrorSyncedAt: readAt }
        );
        result.updated++;
        logger.info(
          { bookingId: booking.id, ...key, startTime: booking.startTime, clientId: cell.clientId },
          'Booking edited in mirror, local fields updated'
        );
        remaining.push(updated);
        continue;
      }

      remaining.push(booking);
    }

    return remaining;
  }

  /**
   * Turn mirror start rows with no local booking into bookings
   */
  private async adoptMirrorRows(
    scope: BookingDayScope,
    key: DayKey,
    cells: Map<string, OccupiedMirrorCell>,
    grid: number[],
    slotMinutes: number,
    remaining: Booking[],
    readAt: Date,
    result: DayReconcileResult
  ): Promise<void> {
    const gridSet = new Set(grid);
    const starts = [...cells.entries()]
      .filter((entry): entry is [string, Extract<OccupiedMirrorCell, { kind: 'start' }>] => entry[1].kind === 'start')
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

    for (const [time, cell] of starts) {
      if (remaining.some((booking) => booking.startTime === time)) continue;

      const start = parseTime(time);
      if (start === null || !gridSet.has(start)) {
        result.skipped++;
        logger.warn({ ...key, time, clientId: cell.clientId }, 'Mirror row is off the slot grid, not adopted');
        continue;
      }

      let durationSlots = 1;
      for (let next = start + slotMinutes; gridSet.has(next); next += slotMinutes) {
        if (cells.get(formatTime(next))?.kind !== 'continuation') break;
        durationSlots++;
      }

      const startTime = formatTime(start);
      const clash = remaining.find((booking) =>
        rangesOverlap({ startTime, durationSlots }, booking, slotMinutes)
      );
      if (clash) {
        result.skipped++;
        logger.warn(
          { ...key, time, clientId: cell.clientId, conflictingBookingId: clash.id },
          'Mirror row overlaps an active booking, not adopted'
        );
        continue;
      }

      // A pending local change may be what put this row there (or is about to clear it)
      const inFlight = (await scope.listByClient(key.projectId, cell.clientId)).find(
        (booking) =>
          (booking.mirrorSyncedVersion !== booking.version && touchesDay(booking, key)) ||
          (booking.mirrorSyncedAt !== null && booking.mirrorSyncedAt.getTime() > readAt.getTime())
      );
      if (inFlight) {
        result.deferred++;
        logger.debug(
          { ...key, time, clientId: cell.clientId, bookingId: inFlight.id },
          'Client has a mirror change in flight, mirror row left for the next pass'
        );
        continue;
      }

      const booking = await scope.insert(
        {
          ...key,
          startTime,
          durationSlots,
          clientId: cell.clientId,
          clientName: cell.clientName,
          clientPhone: null,
          serviceName: cell.serviceName,
        },
        { mirrorSyncedAt: readAt }
      );
      remaining.push(booking);
      result.created++;
      logger.info(
        { bookingId: booking.id, ...key, startTime, durationSlots, clientId: cell.clientId },
        'Booking added in mirror, created locally'
      );
    }
  }

  /**
   * Push local changes the mirror has not seen: cancellations first so their rows
   * are free before active bookings are written.
   */
  private async pushUnsynced(key: DayKey, result: DayReconcileResult): Promise<void> {
    const unsynced = await this.deps.store.listUnsynced(key);
    const ordered = [
      ...unsynced.filter((booking) => booking.status === BOOKING_STATUS.CANCELLED),
      ...unsynced.filter((booking) => booking.status === BOOKING_STATUS.ACTIVE),
    ];

    for (const booking of ordered) {
      try {
        await this.deps.publisher.sync(booking.id);
        result.pushed++;
      } catch (error) {
        result.pushFailed++;
        logger.warn(
          { bookingId: booking.id, ...key, error: errorMessage(error) },
          'Mirror push failed, retrying on the next pass'
        );
      }
    }
  }
}
