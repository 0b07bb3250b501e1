import { randomUUID } from 'crypto';
import { QUEUE_STATUS, type QueueStatus } from '@slotkeeper/shared';
import type {
  ClientQueueScope,
  NewQueuedMessage,
  QueueStatusCounts,
  QueueStore,
  QueuedMessage,
} from '../../stores/queue.store';
import { StoreUnavailableError } from '../../utils/errors';
import { KeyedMutex } from './keyed-mutex';

function copy(row: QueuedMessage): QueuedMessage {
  return { ...row, createdAt: new Date(row.createdAt), updatedAt: new Date(row.updatedAt) };
}

/**
 * Queue store held in memory. Client locks are serialized per (project, client)
 * like the advisory lock of the Postgres store.
 */
export class MemoryQueueStore implements QueueStore {
  private readonly rows = new Map<string, QueuedMessage>();
  private readonly mutex = new KeyedMutex();
  private seq = 0;

  /** When set, every operation fails as if the database were down */
  unavailable = false;

  async withClientLock<T>(
    projectId: string,
    clientId: string,
    fn: (scope: ClientQueueScope) => Promise<T>
  ): Promise<T> {
    this.assertAvailable();
    return this.mutex.run(`${projectId}\u0000${clientId}`, async () => {
      const locked = this.clientRows(projectId, clientId);
      const scope: ClientQueueScope = {
        rows: locked,
        insertPending: async (input) => {
          const inserted = this.insert(input);
          locked.push(copy(inserted));
          return copy(inserted);
        },
        setStatus: async (ids, status) => {
          this.assertAvailable();
          for (const id of ids) {
            const row = this.rows.get(id);
            if (!row) continue;
            row.status = status;
            row.updatedAt = new Date();
            const index = locked.findIndex((existing) => existing.id === id);
            if (index >= 0) locked[index] = copy(row);
          }
        },
      };
      return fn(scope);
    });
  }

  async findById(id: string): Promise<QueuedMessage | null> {
    this.assertAvailable();
    const row = this.rows.get(id);
    return row ? copy(row) : null;
  }

  async countByStatus(projectId?: string): Promise<QueueStatusCounts> {
    this.assertAvailable();
    const counts: QueueStatusCounts = {
      PENDING: 0,
      PROCESSING: 0,
      COMPLETED: 0,
      CANCELLED: 0,
      SUPERSEDED: 0,
    };
    for (const row of this.rows.values()) {
      if (projectId === undefined || row.projectId === projectId) counts[row.status]++;
    }
    return counts;
  }

  /** Every row of a client, oldest first */
  clientRows(projectId: string, clientId: string): QueuedMessage[] {
    return [...this.rows.values()]
      .filter((row) => row.projectId === projectId && row.clientId === clientId)
      .sort((a, b) => a.seq - b.seq)
      .map(copy);
  }

  statusesOf(projectId: string, clientId: string): QueueStatus[] {
    return this.clientRows(projectId, clientId).map((row) => row.status);
  }

  private insert(input: NewQueuedMessage): QueuedMessage {
    this.assertAvailable();
    const now = new Date();
    const row: QueuedMessage = {
      id: randomUUID(),
      seq: ++this.seq,
      ...input,
      status: QUEUE_STATUS.PENDING,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(row.id, row);
    return row;
  }

  private assertAvailable(): void {
    if (this.unavailable) {
      throw new StoreUnavailableError('Database unavailable during test');
    }
  }
}
