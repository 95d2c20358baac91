// test/support/fakes.ts
// Deterministic stand-ins for the embedding model, the completion model, the PDF parser and the job store.

import type { Embedder } from '../../src/services/embeddings.js';
import type { CompletionService } from '../../src/services/completions.js';
import type { PdfLoader } from '../../src/services/pdf.js';
import type { NotificationOutbox } from '../../src/db/notificationOutbox.js';
import { emptyCounts, type JobRepository, type StatusCounts } from '../../src/services/jobQueue.js';
import type {
  Job,
  JobKind,
  JobRequest,
  JobResult,
  NewNotification,
  Notification,
} from '../../src/models/types.js';

const DIMS = 16;

function hashWord(word: string): number {
  let h = 0;
  for (const ch of word) h = (h * 31 + ch.charCodeAt(0)) % 9973;
  return h % (DIMS - 1);
}

/** Bag-of-words vectors: texts sharing words end up close. */
export class FakeEmbedder implements Embedder {
  calls: string[][] = [];

  async embedText(text: string): Promise<number[]> {
    const v = new Array<number>(DIMS).fill(0);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) v[hashWord(word)] += 1;
    v[DIMS - 1] = 0.01;
    return v;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    return Promise.all(texts.map((t) => this.embedText(t)));
  }
}

export class ScriptedCompletion implements CompletionService {
  prompts: string[] = [];

  constructor(
    private readonly reply: string,
    private readonly parts: string[] = [],
    private readonly streamError?: Error,
  ) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.reply;
  }

  async *completeStream(prompt: string): AsyncIterable<string> {
    this.prompts.push(prompt);
    for (const part of this.parts) yield part;
    if (this.streamError) throw this.streamError;
  }
}

/** Each entry is a page's text, or an Error thrown while reading that page. */
export function fakePdf(pages: (string | Error)[]): PdfLoader {
  return async () => ({
    numPages: pages.length,
    async getPage(n: number) {
      const page = pages[n - 1];
      if (page instanceof Error) throw page;
      return { getTextContent: async () => ({ items: page ? [{ str: page, hasEOL: false }] : [] }) };
    },
  });
}

export class MemoryJobRepository implements JobRepository {
  readonly jobs = new Map<string, Job>();
  readonly notifications: Notification[] = [];
  private seq = 0;

  async insert(request: JobRequest): Promise<Job> {
    const job: Job = {
      ...request,
      id: `job-${++this.seq}`,
      status: 'queued',
      created_at: new Date(),
      started_at: null,
      ended_at: null,
      result: null,
      error: null,
      worker: null,
    };
    this.jobs.set(job.id, job);
    return job;
  }

  async get(id: string): Promise<Job | null> {
    return this.jobs.get(id) ?? null;
  }

  async cancelQueued(id: string): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job || job.status !== 'queued') return false;
    this.jobs.set(id, { ...job, status: 'canceled', ended_at: new Date() });
    return true;
  }

  async countByKind(): Promise<Record<JobKind, StatusCounts>> {
    const out: Record<JobKind, StatusCounts> = { ingest: emptyCounts(), 'generate-quiz': emptyCounts() };
    for (const job of this.jobs.values()) out[job.kind][job.status]++;
    return out;
  }

  async claimNext(kinds: JobKind[], worker: string): Promise<Job | null> {
    for (const job of this.jobs.values()) {
      if (job.status === 'queued' && kinds.includes(job.kind)) {
        const started: Job = { ...job, status: 'started', started_at: new Date(), worker };
        this.jobs.set(job.id, started);
        return started;
      }
    }
    return null;
  }

  private append(n: NewNotification): void {
    this.notifications.push({
      ...n,
      id: `n-${this.notifications.length + 1}`,
      status: 'pending',
      attempts: 0,
      last_error: null,
      created_at: new Date(),
      delivered_at: null,
    });
  }

  async finish(id: string, result: JobResult, notification: NewNotification | null): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job || job.status !== 'started') return false;
    this.jobs.set(id, { ...job, status: 'finished', result, ended_at: new Date() });
    if (notification) this.append(notification);
    return true;
  }

  async fail(id: string, error: string, notification: NewNotification | null): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job || job.status !== 'started') return false;
    this.jobs.set(id, { ...job, status: 'failed', error, ended_at: new Date() });
    if (notification) this.append(notification);
    return true;
  }

  async listStale(startedBefore: Date): Promise<Job[]> {
    return [...this.jobs.values()].filter(
      (j) => j.status === 'started' && j.started_at !== null && j.started_at < startedBefore,
    );
  }

  /** Move a job's start time into the past. */
  backdate(id: string, startedAt: Date): void {
    const job = this.jobs.get(id);
    if (job) this.jobs.set(id, { ...job, started_at: startedAt });
  }
}

export class MemoryOutbox implements NotificationOutbox {
  constructor(readonly rows: Notification[]) {}

  async claimPending(limit: number): Promise<Notification[]> {
    return this.rows.filter((n) => n.status === 'pending').slice(0, limit);
  }

  async markDelivered(id: string, attempts: number): Promise<void> {
    const row = this.rows.find((n) => n.id === id);
    if (!row) return;
    row.status = 'delivered';
    row.attempts += attempts;
    row.delivered_at = new Date();
  }

  async markDropped(id: string, attempts: number, error: string): Promise<void> {
    const row = this.rows.find((n) => n.id === id);
    if (!row) return;
    row.status = 'dropped';
    row.attempts += attempts;
    row.last_error = error;
  }
}
