// src/services/worker.ts
// What: Background job worker that runs ingestion and quiz jobs pulled from the queue.
// How: Each tick first force-fails `started` jobs older than the execution ceiling (their worker died), then
//      opens up to `concurrency` lanes; each lane claims one job, runs it under the ceiling and records the
//      outcome with its webhook notification in one transaction. A tick never throws.

import logger from '../logging.js';
import { JobTimeoutError, errorMessage } from '../errors.js';
import { buildNotification, type Outcome } from './notifier.js';
import type { JobRepository } from './jobQueue.js';
import type { Indexer } from './indexer.js';
import type { RagService } from './rag.js';
import type { Job, JobKind, JobResult, QuizPayload, QuizQuestion, QuizType, Difficulty } from '../models/types.js';

export type QuizResult = {
  quiz_id: string;
  questions: QuizQuestion[];
  metadata: {
    quiz_type: QuizType;
    num_questions: number;
    difficulty: Difficulty;
    topic: string | null;
    pdf_count: number;
  };
  exam_id: number;
  status: 'success';
  message: string;
};

export interface WorkerOptions {
  name: string;
  kinds: JobKind[];
  concurrency: number;
  pollIntervalMs: number;
  jobTimeoutMs: number;
  webhookBaseUrl: string;
  sleep?: (ms: number) => Promise<void>;
}

/** Run work under a wall-clock ceiling; on expiry the signal aborts and the race rejects with JobTimeoutError. */
export async function withTimeout<T>(work: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new JobTimeoutError(timeoutMs);
      // settle the race before abort listeners reject the work
      reject(err);
      controller.abort(err);
    }, timeoutMs);
  });
  try {
    return await Promise.race([work(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class JobWorker {
  private stopped = false;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly repo: JobRepository,
    private readonly indexer: Indexer,
    private readonly rag: RagService,
    private readonly opts: WorkerOptions,
  ) {
    this.sleep = opts.sleep ?? defaultSleep;
  }

  async generateQuiz(payload: QuizPayload): Promise<QuizResult> {
    logger.info(
      { examId: payload.exam_id, quiz_type: payload.quiz_type, num_questions: payload.num_questions },
      'Generating quiz',
    );
    const questions = await this.rag.generateQuiz(payload.pdf_ids, payload);
    return {
      quiz_id: payload.quiz_id,
      questions,
      metadata: {
        quiz_type: payload.quiz_type,
        num_questions: questions.length,
        difficulty: payload.difficulty,
        topic: payload.topic ?? null,
        pdf_count: payload.pdf_ids.length,
      },
      exam_id: payload.exam_id,
      status: 'success',
      message: 'Quiz generated successfully',
    };
  }

  private execute(job: Job, signal: AbortSignal): Promise<JobResult> {
    switch (job.kind) {
      case 'ingest':
        return this.indexer.ingest(job.payload, signal);
      case 'generate-quiz':
        return this.generateQuiz(job.payload);
    }
  }

  private async record(job: Job, outcome: Outcome): Promise<void> {
    const notification = buildNotification(this.opts.webhookBaseUrl, job, outcome);
    const applied = outcome.ok
      ? await this.repo.finish(job.id, outcome.result, notification)
      : await this.repo.fail(job.id, outcome.error, notification);
    if (!applied) {
      logger.warn({ jobId: job.id }, 'Job was no longer started; outcome discarded');
    }
  }

  async processJob(job: Job): Promise<void> {
    const start = Date.now();
    logger.info({ jobId: job.id, kind: job.kind, worker: this.opts.name }, 'Job started');
    let outcome: Outcome;
    try {
      const result = await withTimeout((signal) => this.execute(job, signal), this.opts.jobTimeoutMs);
      outcome = { ok: true, result };
      logger.info({ jobId: job.id, duration_ms: Date.now() - start }, 'Job finished');
    } catch (err) {
      outcome = { ok: false, error: errorMessage(err) };
      logger.error({ err, jobId: job.id, kind: job.kind }, 'Job failed');
    }
    await this.record(job, outcome);
  }

  /** Fail jobs stuck in `started` beyond the ceiling. */
  async sweepStale(now = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - this.opts.jobTimeoutMs);
    const stale = await this.repo.listStale(cutoff);
    for (const job of stale) {
      logger.warn({ jobId: job.id, worker: job.worker, started_at: job.started_at }, 'Force-failing stale job');
      await this.record(job, { ok: false, error: new JobTimeoutError(this.opts.jobTimeoutMs).message });
    }
    return stale.length;
  }

  private async lane(): Promise<boolean> {
    const job = await this.repo.claimNext(this.opts.kinds, this.opts.name);
    if (!job) return false;
    await this.processJob(job);
    return true;
  }

  /** Returns how many jobs were processed. */
  async tick(): Promise<number> {
    try {
      await this.sweepStale();
    } catch (err) {
      logger.error({ err }, 'Stale job sweep failed');
    }

    const lanes = Array.from({ length: this.opts.concurrency }, () =>
      this.lane().catch((err: unknown) => {
        logger.error({ err }, 'Worker lane failed');
        return false;
      }),
    );
    const ran = await Promise.all(lanes);
    return ran.filter(Boolean).length;
  }

  /** Poll until stopped; in burst mode return once a tick finds nothing to do. */
  async run(burst = false): Promise<void> {
    logger.info({ worker: this.opts.name, kinds: this.opts.kinds, concurrency: this.opts.concurrency, burst }, 'Worker started');
    while (!this.stopped) {
      const processed = await this.tick();
      if (processed > 0) continue;
      if (burst) break;
      await this.sleep(this.opts.pollIntervalMs);
    }
    logger.info({ worker: this.opts.name }, 'Worker stopped');
  }

  stop(): void {
    this.stopped = true;
  }
}
