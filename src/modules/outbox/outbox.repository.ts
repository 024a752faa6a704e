import type { SqlExecutor } from '../../database/sql-executor';
import { NewOutboxMessage, OutboxMessage } from './interfaces/outbox.interface';

export interface OutboxStore {
  /** Must be called inside the transaction whose commit publishes the message. */
  enqueue(message: NewOutboxMessage): Promise<void>;
  /** Oldest unprocessed message below the attempt limit, locked for this transaction. */
  claimNext(maxAttempts: number): Promise<OutboxMessage | null>;
  markProcessed(id: string): Promise<void>;
  recordFailure(id: string, error: string): Promise<void>;
}

type OutboxRow = {
  id: string;
  aggregate_type: string;
  aggregate_id: string;
  event_type: string;
  payload: unknown;
  attempt_count: number;
  last_error: string | null;
  created_at: Date;
  processed_at: Date | null;
};

export class PgOutboxRepository implements OutboxStore {
  constructor(private readonly client: SqlExecutor) {}

  async enqueue(message: NewOutboxMessage): Promise<void> {
    await this.client.query(
      `INSERT INTO outbox_messages (aggregate_type, aggregate_id, event_type, payload)
       VALUES ($1, $2, $3, $4)`,
      [message.aggregateType, message.aggregateId, message.eventType, JSON.stringify(message.payload)],
    );
  }

  async claimNext(maxAttempts: number): Promise<OutboxMessage | null> {
    const result = await this.client.query<OutboxRow>(
      `SELECT id, aggregate_type, aggregate_id, event_type, payload,
              attempt_count, last_error, created_at, processed_at
         FROM outbox_messages
        WHERE processed_at IS NULL AND attempt_count < $1
        ORDER BY created_at, id
        LIMIT 1
        FOR UPDATE SKIP LOCKED`,
      [maxAttempts],
    );
    const row = result.rows[0];
    if (!row) return null;

    return {
      id: row.id,
      aggregateType: row.aggregate_type,
      aggregateId: row.aggregate_id,
      eventType: row.event_type,
      // pg returns JSONB columns as objects already
      payload: row.payload,
      attemptCount: row.attempt_count,
      lastError: row.last_error,
      createdAt: row.created_at,
      processedAt: row.processed_at,
    };
  }

  async markProcessed(id: string): Promise<void> {
    await this.client.query(
      'UPDATE outbox_messages SET processed_at = NOW(), last_error = NULL WHERE id = $1',
      [id],
    );
  }

  async recordFailure(id: string, error: string): Promise<void> {
    await this.client.query(
      'UPDATE outbox_messages SET attempt_count = attempt_count + 1, last_error = $2 WHERE id = $1',
      [id, error],
    );
  }
}
