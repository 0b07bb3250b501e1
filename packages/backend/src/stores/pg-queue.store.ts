import type { Pool, PoolClient } from 'pg';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { QUEUE_STATUS, type QueueStatus } from '@slotkeeper/shared';
import type {
  ClientQueueScope,
  NewQueuedMessage,
  QueueStatusCounts,
  QueueStore,
  QueuedMessage,
} from './queue.store';
import { runQuery, withTransaction } from './pg-transaction';

type QueuedMessageRow = {
  id: string;
  seq: string;
  project_id: string;
  client_id: string;
  original_text: string;
  aggregated_text: string;
  status: QueueStatus;
  retry_count: number;
  created_at: Date;
  updated_at: Date;
};

const COLUMNS = `id, seq, project_id, client_id, original_text, aggregated_text,
  status, retry_count, created_at, updated_at`;

function toQueuedMessage(row: QueuedMessageRow): QueuedMessage {
  return {
    id: row.id,
    seq: Number(row.seq),
    projectId: row.project_id,
    clientId: row.client_id,
    originalText: row.original_text,
    aggregatedText: row.aggregated_text,
    status: row.status,
    retryCount: row.retry_count,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

class PgClientQueueScope implements ClientQueueScope {
  constructor(
    private readonly client: PoolClient,
    private readonly lockedRows: QueuedMessage[]
  ) {}

  get rows(): readonly QueuedMessage[] {
    return this.lockedRows;
  }

  async insertPending(input: NewQueuedMessage): Promise<QueuedMessage> {
    // clock_timestamp() rather than now(): the row is stamped after the client lock
    // was granted, so creation order matches lock order.
    const result = await this.client.query<QueuedMessageRow>(
      `INSERT INTO queued_messages
         (id, project_id, client_id, original_text, aggregated_text, status, retry_count, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, clock_timestamp(), clock_timestamp())
       RETURNING ${COLUMNS}`,
      [
        uuidv4(),
        input.projectId,
        input.clientId,
        input.originalText,
        input.aggregatedText,
        QUEUE_STATUS.PENDING,
        input.retryCount,
      ]
    );
    const inserted = toQueuedMessage(result.rows[0]);
    this.lockedRows.push(inserted);
    return inserted;
  }

  async setStatus(ids: readonly string[], status: QueueStatus): Promise<void> {
    if (ids.length === 0) return;

    const result = await this.client.query<QueuedMessageRow>(
      `UPDATE queued_messages
          SET status = $2, updated_at = clock_timestamp()
        WHERE id = ANY($1::uuid[])
        RETURNING ${COLUMNS}`,
      [ids, status]
    );

    for (const row of result.rows) {
      const updated = toQueuedMessage(row);
      const index = this.lockedRows.findIndex((existing) => existing.id === updated.id);
      if (index >= 0) this.lockedRows[index] = updated;
    }
  }
}

/**
 * PostgreSQL queue store. Per-client serialization uses a transaction-scoped
 * advisory lock keyed on (project, client) plus FOR UPDATE on the client's rows,
 * so a client with no rows yet is still serialized.
 */
export class PgQueueStore implements QueueStore {
  constructor(private readonly pool: Pool) {}

  async withClientLock<T>(
    projectId: string,
    clientId: string,
    fn: (scope: ClientQueueScope) => Promise<T>
  ): Promise<T> {
    return withTransaction(this.pool, 'queue.withClientLock', async (client) => {
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1), hashtext($2))', [projectId, clientId]);

      const locked = await client.query<QueuedMessageRow>(
        `SELECT ${COLUMNS}
           FROM queued_messages
          WHERE project_id = $1 AND client_id = $2
          ORDER BY created_at, seq
          FOR UPDATE`,
        [projectId, clientId]
      );

      return fn(new PgClientQueueScope(client, locked.rows.map(toQueuedMessage)));
    });
  }

  async findById(id: string): Promise<QueuedMessage | null> {
    if (!isUuid(id)) return null;

    const rows = await runQuery<QueuedMessageRow>(
      this.pool,
      'queue.findById',
      `SELECT ${COLUMNS} FROM queued_messages WHERE id = $1`,
      [id]
    );
    return rows.length > 0 ? toQueuedMessage(rows[0]) : null;
  }

  async countByStatus(projectId?: string): Promise<QueueStatusCounts> {
    const rows = await runQuery<{ status: QueueStatus; count: string }>(
      this.pool,
      'queue.countByStatus',
      `SELECT status, COUNT(*) AS count
         FROM queued_messages
        WHERE ($1::text IS NULL OR project_id = $1)
        GROUP BY status`,
      [projectId ?? null]
    );

    const counts: QueueStatusCounts = {
      PENDING: 0,
      PROCESSING: 0,
      COMPLETED: 0,
      CANCELLED: 0,
      SUPERSEDED: 0,
    };
    for (const row of rows) {
      counts[row.status] = Number(row.count);
    }
    return counts;
  }
}
