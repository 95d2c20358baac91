// src/db/notificationOutbox.ts
// What: Outbox of completion webhooks waiting for delivery.
// How: Rows are appended inside the job-completion transaction (appendNotification takes that client).
//      Dispatchers lease pending rows with FOR UPDATE SKIP LOCKED so two workers do not post the same row
//      at once; an expired lease makes the row claimable again.

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type { Pool, PoolClient } from './pool.js';
import type { NewNotification, Notification } from '../models/types.js';

export interface NotificationOutbox {
  claimPending(limit: number): Promise<Notification[]>;
  markDelivered(id: string, attempts: number): Promise<void>;
  markDropped(id: string, attempts: number, error: string): Promise<void>;
}

const LEASE_SECONDS = 300;

const rowSchema = z.object({
  id: z.string(),
  event: z.enum(['upload-processed', 'quiz-generated']),
  correlation_id: z.string(),
  url: z.string(),
  payload: z.record(z.unknown()),
  status: z.enum(['pending', 'delivered', 'dropped']),
  attempts: z.number().int(),
  last_error: z.string().nullable(),
  created_at: z.date(),
  delivered_at: z.date().nullable(),
});

export const toNotification = (row: unknown): Notification => rowSchema.parse(row);

export async function appendNotification(client: PoolClient, n: NewNotification): Promise<string> {
  const id = uuidv4();
  await client.query(
    `INSERT INTO notifications (id, event, correlation_id, url, payload)
     VALUES ($1, $2, $3, $4, $5::jsonb)`,
    [id, n.event, n.correlation_id, n.url, JSON.stringify(n.payload)],
  );
  return id;
}

export class PgNotificationOutbox implements NotificationOutbox {
  constructor(private readonly pool: Pool) {}

  async claimPending(limit: number): Promise<Notification[]> {
    const res = await this.pool.query(
      `UPDATE notifications SET lease_until = NOW() + make_interval(secs => $2)
       WHERE id IN (
         SELECT id FROM notifications
         WHERE status = 'pending' AND (lease_until IS NULL OR lease_until < NOW())
         ORDER BY created_at
         LIMIT $1
         FOR UPDATE SKIP LOCKED
       )
       RETURNING id, event, correlation_id, url, payload, status, attempts, last_error, created_at, delivered_at`,
      [limit, LEASE_SECONDS],
    );
    return res.rows
      .map(toNotification)
      .sort((a, b) => a.created_at.getTime() - b.created_at.getTime());
  }

  async markDelivered(id: string, attempts: number): Promise<void> {
    await this.pool.query(
      `UPDATE notifications
       SET status = 'delivered', attempts = attempts + $2, delivered_at = NOW(), last_error = NULL, lease_until = NULL
       WHERE id = $1`,
      [id, attempts],
    );
  }

  async markDropped(id: string, attempts: number, error: string): Promise<void> {
    await this.pool.query(
      `UPDATE notifications
       SET status = 'dropped', attempts = attempts + $2, last_error = $3, lease_until = NULL
       WHERE id = $1`,
      [id, attempts, error],
    );
  }
}
