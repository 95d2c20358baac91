// src/db/jobRepository.ts
// What: Postgres-backed job storage for the background queue.
// How: Jobs are rows in `jobs` with a JSONB payload validated back through zod on read. Workers claim the
//      oldest queued row with FOR UPDATE SKIP LOCKED; completion updates the row and appends the outbox
//      notification in the same transaction. Updates guard on the expected status, so a late finish after
//      a forced failure changes nothing.

import { z } from 'zod';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import type { Pool } from './pool.js';
import { withTransaction } from './pool.js';
import { appendNotification } from './notificationOutbox.js';
import { jobRequestSchema } from '../models/schemas.js';
import { emptyCounts, type JobRepository, type StatusCounts } from '../services/jobQueue.js';
import type { Job, JobKind, JobRequest, JobResult, NewNotification } from '../models/types.js';

const JOB_COLUMNS = 'id, kind, payload, status, created_at, started_at, ended_at, result, error, worker';

const statusSchema = z.enum(['queued', 'started', 'finished', 'failed', 'canceled']);

const rowSchema = z.object({
  id: z.string(),
  kind: z.string(),
  payload: z.unknown(),
  status: statusSchema,
  created_at: z.date(),
  started_at: z.date().nullable(),
  ended_at: z.date().nullable(),
  result: z.record(z.unknown()).nullable(),
  error: z.string().nullable(),
  worker: z.string().nullable(),
});

export function toJob(row: unknown): Job {
  const { kind, payload, ...rest } = rowSchema.parse(row);
  const request: JobRequest = jobRequestSchema.parse({ kind, payload });
  return { ...request, ...rest };
}

export class PgJobRepository implements JobRepository {
  constructor(private readonly pool: Pool) {}

  async insert(request: JobRequest): Promise<Job> {
    const res = await this.pool.query(
      `INSERT INTO jobs (id, kind, payload) VALUES ($1, $2, $3::jsonb) RETURNING ${JOB_COLUMNS}`,
      [uuidv4(), request.kind, JSON.stringify(request.payload)],
    );
    return toJob(res.rows[0]);
  }

  async get(id: string): Promise<Job | null> {
    if (!isUuid(id)) return null;
    const res = await this.pool.query(`SELECT ${JOB_COLUMNS} FROM jobs WHERE id = $1`, [id]);
    return res.rows.length > 0 ? toJob(res.rows[0]) : null;
  }

  async cancelQueued(id: string): Promise<boolean> {
    if (!isUuid(id)) return false;
    const res = await this.pool.query(
      `UPDATE jobs SET status = 'canceled', ended_at = NOW() WHERE id = $1 AND status = 'queued'`,
      [id],
    );
    return (res.rowCount ?? 0) > 0;
  }

  async countByKind(): Promise<Record<JobKind, StatusCounts>> {
    const res = await this.pool.query<{ kind: string; status: string; count: number }>(
      'SELECT kind, status, COUNT(*)::int AS count FROM jobs GROUP BY kind, status',
    );
    const out: Record<JobKind, StatusCounts> = { ingest: emptyCounts(), 'generate-quiz': emptyCounts() };
    for (const row of res.rows) {
      const status = statusSchema.safeParse(row.status);
      if (!status.success) continue;
      if (row.kind === 'ingest' || row.kind === 'generate-quiz') {
        out[row.kind][status.data] = row.count;
      }
    }
    return out;
  }

  async claimNext(kinds: JobKind[], worker: string): Promise<Job | null> {
    if (kinds.length === 0) return null;
    const res = await this.pool.query(
      `UPDATE jobs SET status = 'started', started_at = NOW(), worker = $2
       WHERE id = (
         SELECT id FROM jobs
         WHERE status = 'queued' AND kind = ANY($1::text[])
         ORDER BY created_at, id
         LIMIT 1
         FOR UPDATE SKIP LOCKED
       )
       RETURNING ${JOB_COLUMNS}`,
      [kinds, worker],
    );
    return res.rows.length > 0 ? toJob(res.rows[0]) : null;
  }

  finish(id: string, result: JobResult, notification: NewNotification | null): Promise<boolean> {
    return withTransaction(this.pool, async (client) => {
      const res = await client.query(
        `UPDATE jobs SET status = 'finished', ended_at = NOW(), result = $2::jsonb
         WHERE id = $1 AND status = 'started'`,
        [id, JSON.stringify(result)],
      );
      if ((res.rowCount ?? 0) === 0) return false;
      if (notification) await appendNotification(client, notification);
      return true;
    });
  }

  fail(id: string, error: string, notification: NewNotification | null): Promise<boolean> {
    return withTransaction(this.pool, async (client) => {
      const res = await client.query(
        `UPDATE jobs SET status = 'failed', ended_at = NOW(), error = $2
         WHERE id = $1 AND status = 'started'`,
        [id, error],
      );
      if ((res.rowCount ?? 0) === 0) return false;
      if (notification) await appendNotification(client, notification);
      return true;
    });
  }

  async listStale(startedBefore: Date): Promise<Job[]> {
    const res = await this.pool.query(
      `SELECT ${JOB_COLUMNS} FROM jobs WHERE status = 'started' AND started_at < $1 ORDER BY started_at`,
      [startedBefore],
    );
    return res.rows.map(toJob);
  }
}
