// src/services/jobQueue.ts
// What: Durable background job queue: enqueue, status, cancel, per-queue statistics.
// How: Thin service over a JobRepository. Jobs move queued → started → finished|failed, driven by the
//      worker; canceled is reachable only from queued. Two named queues map onto job kinds.

import logger from '../logging.js';
import { NotFoundError } from '../errors.js';
import type { Job, JobKind, JobRequest, JobResult, JobStatus, NewNotification } from '../models/types.js';

export const QUEUE_NAMES = {
  ingest: 'pdf_processing',
  'generate-quiz': 'quiz_processing',
} as const satisfies Record<JobKind, string>;

export type QueueName = (typeof QUEUE_NAMES)[JobKind];

export type StatusCounts = Record<JobStatus, number>;

export const emptyCounts = (): StatusCounts => ({ queued: 0, started: 0, finished: 0, failed: 0, canceled: 0 });

export interface JobRepository {
  insert(request: JobRequest): Promise<Job>;
  get(id: string): Promise<Job | null>;
  /** Flip queued → canceled; false when the job is missing or not queued. */
  cancelQueued(id: string): Promise<boolean>;
  countByKind(): Promise<Record<JobKind, StatusCounts>>;
  /** Atomically take the oldest queued job of the given kinds and mark it started. */
  claimNext(kinds: JobKind[], worker: string): Promise<Job | null>;
  /**
   * Record success and append its notification in one unit of work. False when the job was no longer
   * `started` (force-failed meanwhile); nothing is written then.
   */
  finish(id: string, result: JobResult, notification: NewNotification | null): Promise<boolean>;
  /** Record failure and append its notification in one unit of work. */
  fail(id: string, error: string, notification: NewNotification | null): Promise<boolean>;
  /** Jobs still `started` whose start is older than the cutoff. */
  listStale(startedBefore: Date): Promise<Job[]>;
}

export type QueueInfo = Record<QueueName, StatusCounts & { name: QueueName }>;

export class JobQueue {
  constructor(private readonly repo: JobRepository) {}

  async enqueue(request: JobRequest): Promise<Job> {
    const job = await this.repo.insert(request);
    logger.info({ jobId: job.id, kind: job.kind, queue: QUEUE_NAMES[job.kind] }, 'Enqueued job');
    return job;
  }

  async status(jobId: string): Promise<Job> {
    const job = await this.repo.get(jobId);
    if (!job) throw new NotFoundError(`Job ${jobId} not found`, 'JOB_NOT_FOUND');
    return job;
  }

  /** Not an error for started or finished jobs; reports false and leaves the job untouched. */
  async cancel(jobId: string): Promise<boolean> {
    const canceled = await this.repo.cancelQueued(jobId);
    if (canceled) {
      logger.info({ jobId }, 'Canceled job');
    } else {
      logger.warn({ jobId }, 'Cannot cancel job; it is missing or no longer queued');
    }
    return canceled;
  }

  async info(): Promise<QueueInfo> {
    const counts = await this.repo.countByKind();
    return {
      pdf_processing: { name: 'pdf_processing', ...counts.ingest },
      quiz_processing: { name: 'quiz_processing', ...counts['generate-quiz'] },
    };
  }
}
