import type { Pool } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import type {
  DialogueMessage,
  DialogueRole,
  DialogueStore,
  Feedback,
  NewDialogueMessage,
  NewFeedback,
} from './dialogue.store';
import { runQuery } from './pg-transaction';

type DialogueRow = {
  id: string;
  project_id: string;
  client_id: string;
  role: DialogueRole;
  message: string;
  created_at: Date;
};

type FeedbackRow = {
  id: string;
  project_id: string;
  client_id: string;
  booking_id: string | null;
  rating: number | null;
  comment: string;
  created_at: Date;
};

const FEEDBACK_COLUMNS = 'id, project_id, client_id, booking_id, rating, comment, created_at';

function toDialogueMessage(row: DialogueRow): DialogueMessage {
  return {
    id: row.id,
    projectId: row.project_id,
    clientId: row.client_id,
    role: row.role,
    text: row.message,
    createdAt: row.created_at,
  };
}

function toFeedback(row: FeedbackRow): Feedback {
  return {
    id: row.id,
    projectId: row.project_id,
    clientId: row.client_id,
    bookingId: row.booking_id,
    rating: row.rating,
    comment: row.comment,
    createdAt: row.created_at,
  };
}

/**
 * PostgreSQL dialogue store. `seq` orders messages written in one statement.
 */
export class PgDialogueStore implements DialogueStore {
  constructor(private readonly pool: Pool) {}

  async append(messages: readonly NewDialogueMessage[]): Promise<void> {
    if (messages.length === 0) return;

    await runQuery(
      this.pool,
      'dialogue.append',
      `INSERT INTO dialogues (id, project_id, client_id, role, message)
       SELECT id, project_id, client_id, role, message
         FROM unnest($1::uuid[], $2::text[], $3::text[], $4::text[], $5::text[])
              WITH ORDINALITY AS incoming(id, project_id, client_id, role, message, position)
        ORDER BY position`,
      [
        messages.map(() => uuidv4()),
        messages.map((message) => message.projectId),
        messages.map((message) => message.clientId),
        messages.map((message) => message.role),
        messages.map((message) => message.text),
      ]
    );
  }

  async recent(projectId: string, clientId: string, limit: number): Promise<DialogueMessage[]> {
    const rows = await runQuery<DialogueRow>(
      this.pool,
      'dialogue.recent',
      `SELECT id, project_id, client_id, role, message, created_at
         FROM (SELECT * FROM dialogues
                WHERE project_id = $1 AND client_id = $2
                ORDER BY seq DESC
                LIMIT $3) latest
        ORDER BY seq`,
      [projectId, clientId, limit]
    );
    return rows.map(toDialogueMessage);
  }

  async recordFeedback(input: NewFeedback): Promise<Feedback> {
    const rows = await runQuery<FeedbackRow>(
      this.pool,
      'dialogue.recordFeedback',
      `INSERT INTO feedback (id, project_id, client_id, booking_id, rating, comment)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${FEEDBACK_COLUMNS}`,
      [uuidv4(), input.projectId, input.clientId, input.bookingId, input.rating, input.comment]
    );
    return toFeedback(rows[0]);
  }

  async listFeedback(projectId: string, limit: number): Promise<Feedback[]> {
    const rows = await runQuery<FeedbackRow>(
      this.pool,
      'dialogue.listFeedback',
      `SELECT ${FEEDBACK_COLUMNS}
         FROM feedback
        WHERE project_id = $1
        ORDER BY created_at DESC
        LIMIT $2`,
      [projectId, limit]
    );
    return rows.map(toFeedback);
  }
}
