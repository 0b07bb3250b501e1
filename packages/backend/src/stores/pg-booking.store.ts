import type { Pool, PoolClient } from 'pg';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { z } from 'zod';
import { BOOKING_STATUS, type BookingStatus } from '@slotkeeper/shared';
import type {
  Booking,
  BookingDayScope,
  BookingPatch,
  BookingStatusCounts,
  BookingStore,
  ClientBookingFilter,
  DayKey,
  MirrorRange,
  NewBooking,
  WriteOptions,
} from './booking.store';
import { orderDayKeys } from './booking.store';
import { NotFoundError } from '../utils/errors';
import { runQuery, withTransaction } from './pg-transaction';

type BookingRow = {
  id: string;
  project_id: string;
  specialist: string;
  booking_date: string;
  start_time: string;
  duration_slots: number;
  client_id: string;
  client_name: string | null;
  client_phone: string | null;
  service_name: string | null;
  status: BookingStatus;
  version: number;
  mirror_synced_version: number | null;
  mirror_synced_at: Date | null;
  mirror_ranges: unknown;
  created_at: Date;
  updated_at: Date;
};

const mirrorRangesSchema = z.array(
  z.object({
    specialist: z.string(),
    date: z.string(),
    startTime: z.string(),
    durationSlots: z.number().int().positive(),
  })
);

// DATE is rendered as text so no timezone conversion happens on the way out
const COLUMNS = `id, project_id, specialist, to_char(booking_date, 'YYYY-MM-DD') AS booking_date,
  start_time, duration_slots, client_id, client_name, client_phone, service_name,
  status, version, mirror_synced_version, mirror_synced_at, mirror_ranges, created_at, updated_at`;

const PATCH_COLUMNS: Record<keyof BookingPatch, string> = {
  specialist: 'specialist',
  date: 'booking_date',
  startTime: 'start_time',
  durationSlots: 'duration_slots',
  clientId: 'client_id',
  clientName: 'client_name',
  clientPhone: 'client_phone',
  serviceName: 'service_name',
};

function parseMirrorRanges(value: unknown): MirrorRange[] {
  const parsed = mirrorRangesSchema.safeParse(value);
  return parsed.success ? parsed.data : [];
}

function toBooking(row: BookingRow): Booking {
  return {
    id: row.id,
    projectId: row.project_id,
    specialist: row.specialist,
    date: row.booking_date,
    startTime: row.start_time,
    durationSlots: row.duration_slots,
    clientId: row.client_id,
    clientName: row.client_name,
    clientPhone: row.client_phone,
    serviceName: row.service_name,
    status: row.status,
    version: row.version,
    mirrorSyncedVersion: row.mirror_synced_version,
    mirrorSyncedAt: row.mirror_synced_at,
    mirrorRanges: parseMirrorRanges(row.mirror_ranges),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function isPatchKey(key: string): key is keyof BookingPatch {
  return key in PATCH_COLUMNS;
}

class PgBookingDayScope implements BookingDayScope {
  constructor(private readonly client: PoolClient) {}

  async activeOn(key: DayKey): Promise<Booking[]> {
    const result = await this.client.query<BookingRow>(
      `SELECT ${COLUMNS}
         FROM bookings
        WHERE project_id = $1 AND specialist = $2 AND booking_date = $3::date AND status = 'active'
        ORDER BY start_time`,
      [key.projectId, key.specialist, key.date]
    );
    return result.rows.map(toBooking);
  }

  async findById(id: string): Promise<Booking | null> {
    if (!isUuid(id)) return null;
    const result = await this.client.query<BookingRow>(
      `SELECT ${COLUMNS} FROM bookings WHERE id = $1 FOR UPDATE`,
      [id]
    );
    return result.rows.length > 0 ? toBooking(result.rows[0]) : null;
  }

  async listByClient(projectId: string, clientId: string): Promise<Booking[]> {
    const result = await this.client.query<BookingRow>(
      `SELECT ${COLUMNS} FROM bookings WHERE project_id = $1 AND client_id = $2`,
      [projectId, clientId]
    );
    return result.rows.map(toBooking);
  }

  async insert(input: NewBooking, options: WriteOptions = {}): Promise<Booking> {
    const syncedAt = options.mirrorSyncedAt ?? null;
    const ranges: MirrorRange[] = syncedAt
      ? [{ specialist: input.specialist, date: input.date, startTime: input.startTime, durationSlots: input.durationSlots }]
      : [];
    const result = await this.client.query<BookingRow>(
      `INSERT INTO bookings
         (id, project_id, specialist, booking_date, start_time, duration_slots,
          client_id, client_name, client_phone, service_name, status, version,
          mirror_synced_version, mirror_synced_at, mirror_ranges)
       VALUES ($1, $2, $3, $4::date, $5, $6, $7, $8, $9, $10, 'active', 1,
          CASE WHEN $11::timestamptz IS NULL THEN NULL ELSE 1 END, $11::timestamptz, $12::jsonb)
       RETURNING ${COLUMNS}`,
      [
        uuidv4(),
        input.projectId,
        input.specialist,
        input.date,
        input.startTime,
        input.durationSlots,
        input.clientId,
        input.clientName,
        input.clientPhone,
        input.serviceName,
        syncedAt,
        JSON.stringify(ranges),
      ]
    );
    return toBooking(result.rows[0]);
  }

  async update(id: string, patch: BookingPatch, options: WriteOptions = {}): Promise<Booking> {
    const assignments: string[] = [];
    const params: unknown[] = [id];

    for (const [key, value] of Object.entries(patch)) {
      if (!isPatchKey(key) || value === undefined) continue;
      params.push(value);
      const cast = key === 'date' ? '::date' : '';
      assignments.push(`${PATCH_COLUMNS[key]} = $${params.length}${cast}`);
    }

    return this.write(id, assignments, params, options);
  }

  async cancel(id: string, options: WriteOptions = {}): Promise<Booking> {
    const assignments = [`status = '${BOOKING_STATUS.CANCELLED}'`];
    // Adopting a mirror removal: nothing of this booking is left in the mirror
    if (options.mirrorSyncedAt) assignments.push(`mirror_ranges = '[]'::jsonb`);
    return this.write(id, assignments, [id], options);
  }

  private async write(
    id: string,
    assignments: string[],
    params: unknown[],
    options: WriteOptions
  ): Promise<Booking> {
    const sets = [...assignments, 'version = version + 1', 'updated_at = clock_timestamp()'];
    if (options.mirrorSyncedAt) {
      params.push(options.mirrorSyncedAt);
      sets.push('mirror_synced_version = version + 1', `mirror_synced_at = $${params.length}`);
    }

    const result = await this.client.query<BookingRow>(
      `UPDATE bookings SET ${sets.join(', ')} WHERE id = $1 RETURNING ${COLUMNS}`,
      params
    );
    if (result.rows.length === 0) {
      throw new NotFoundError(`Booking not found: ${id}`, { bookingId: id });
    }
    return toBooking(result.rows[0]);
  }
}

/**
 * PostgreSQL booking store. A day is locked with a transaction-scoped advisory
 * lock on (project, specialist|date), then its active rows are locked FOR UPDATE.
 */
export class PgBookingStore implements BookingStore {
  constructor(private readonly pool: Pool) {}

  async withDayLocks<T>(keys: readonly DayKey[], fn: (scope: BookingDayScope) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, 'bookings.withDayLocks', async (client) => {
      for (const key of orderDayKeys(keys)) {
        await client.query('SELECT pg_advisory_xact_lock(hashtext($1), hashtext($2))', [
          key.projectId,
          `${key.specialist}|${key.date}`,
        ]);
        await client.query(
          `SELECT id FROM bookings
            WHERE project_id = $1 AND specialist = $2 AND booking_date = $3::date AND status = 'active'
            FOR UPDATE`,
          [key.projectId, key.specialist, key.date]
        );
      }
      return fn(new PgBookingDayScope(client));
    });
  }

  async findById(id: string): Promise<Booking | null> {
    if (!isUuid(id)) return null;
    const rows = await runQuery<BookingRow>(
      this.pool,
      'bookings.findById',
      `SELECT ${COLUMNS} FROM bookings WHERE id = $1`,
      [id]
    );
    return rows.length > 0 ? toBooking(rows[0]) : null;
  }

  async listActive(key: DayKey): Promise<Booking[]> {
    const rows = await runQuery<BookingRow>(
      this.pool,
      'bookings.listActive',
      `SELECT ${COLUMNS}
         FROM bookings
        WHERE project_id = $1 AND specialist = $2 AND booking_date = $3::date AND status = 'active'
        ORDER BY start_time`,
      [key.projectId, key.specialist, key.date]
    );
    return rows.map(toBooking);
  }

  async listByClient(projectId: string, clientId: string, filter: ClientBookingFilter = {}): Promise<Booking[]> {
    const rows = await runQuery<BookingRow>(
      this.pool,
      'bookings.listByClient',
      `SELECT ${COLUMNS}
         FROM bookings
        WHERE project_id = $1 AND client_id = $2
          AND ($3::boolean IS NOT TRUE OR status = 'active')
          AND ($4::date IS NULL OR booking_date >= $4::date)
        ORDER BY booking_date, start_time`,
      [projectId, clientId, filter.activeOnly ?? false, filter.fromDate ?? null]
    );
    return rows.map(toBooking);
  }

  async listUnsynced(key: DayKey): Promise<Booking[]> {
    const rows = await runQuery<BookingRow>(
      this.pool,
      'bookings.listUnsynced',
      `SELECT ${COLUMNS}
         FROM bookings
        WHERE project_id = $1
          AND mirror_synced_version IS DISTINCT FROM version
          AND ((specialist = $2 AND booking_date = $3::date) OR mirror_ranges @> $4::jsonb)
        ORDER BY updated_at`,
      [key.projectId, key.specialist, key.date, JSON.stringify([{ specialist: key.specialist, date: key.date }])]
    );
    return rows.map(toBooking);
  }

  async addMirrorRange(id: string, range: MirrorRange): Promise<void> {
    const entry = JSON.stringify([range]);
    await runQuery<{ id: string }>(
      this.pool,
      'bookings.addMirrorRange',
      `UPDATE bookings
          SET mirror_ranges = mirror_ranges || $2::jsonb
        WHERE id = $1 AND NOT (mirror_ranges @> $2::jsonb)
        RETURNING id`,
      [id, entry]
    );
  }

  async markSynced(id: string, version: number, syncedAt: Date, ranges: MirrorRange[]): Promise<boolean> {
    const rows = await runQuery<{ id: string }>(
      this.pool,
      'bookings.markSynced',
      `UPDATE bookings
          SET mirror_synced_version = $2, mirror_synced_at = $3, mirror_ranges = $4::jsonb
        WHERE id = $1 AND version = $2
        RETURNING id`,
      [id, version, syncedAt, JSON.stringify(ranges)]
    );
    return rows.length > 0;
  }

  async countByStatus(projectId?: string): Promise<BookingStatusCounts> {
    const rows = await runQuery<{ status: BookingStatus; count: string }>(
      this.pool,
      'bookings.countByStatus',
      `SELECT status, COUNT(*) AS count
         FROM bookings
        WHERE ($1::text IS NULL OR project_id = $1)
        GROUP BY status`,
      [projectId ?? null]
    );

    const counts: BookingStatusCounts = { active: 0, cancelled: 0 };
    for (const row of rows) {
      counts[row.status] = Number(row.count);
    }
    return counts;
  }
}
