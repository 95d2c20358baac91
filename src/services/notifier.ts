// src/services/notifier.ts
// What: Completion webhooks: building the event for a finished or failed job and posting it.
// How: notify() POSTs JSON with a per-attempt timeout and retries on timeout, connection failure or a non-2xx
//      status, sleeping 1s then 2s between its 3 attempts. It never throws; callers get a DeliveryReport.

import logger from '../logging.js';
import { DeliveryError, errorMessage, type DeliveryFailure } from '../errors.js';
import type { FetchLike } from './pdf.js';
import type { Job, JobResult, NewNotification } from '../models/types.js';

export type Outcome = { ok: true; result: JobResult } | { ok: false; error: string };

export function buildNotification(baseUrl: string, job: Job, outcome: Outcome, now = new Date()): NewNotification {
  const timestamp = now.toISOString();
  const base = baseUrl.replace(/\/+$/, '');

  if (job.kind === 'ingest') {
    const uploadId = job.payload.upload_id;
    const payload: Record<string, unknown> = outcome.ok
      ? {
          upload_id: uploadId,
          success: true,
          timestamp,
          pdf_id: outcome.result.pdf_id,
          total_pages: outcome.result.total_pages,
          pdf_name: outcome.result.pdf_name,
          message: outcome.result.message,
        }
      : { upload_id: uploadId, success: false, timestamp, error: outcome.error };
    return {
      event: 'upload-processed',
      correlation_id: String(uploadId),
      url: `${base}/upload-processed/${uploadId}`,
      payload,
    };
  }

  const examId = job.payload.exam_id;
  const payload: Record<string, unknown> = outcome.ok
    ? { exam_id: examId, success: true, timestamp, ...outcome.result }
    : { exam_id: examId, success: false, timestamp, error: outcome.error };
  return {
    event: 'quiz-generated',
    correlation_id: String(examId),
    url: `${base}/quiz-generated/${examId}`,
    payload,
  };
}

export interface DeliveryReport {
  delivered: boolean;
  attempts: number;
  status?: number;
  reason?: DeliveryFailure;
  error?: string;
}

export interface NotifierOptions {
  maxAttempts?: number;
  backoffMs?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class Notifier {
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly timeoutMs: number;
  private readonly fetch: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: NotifierOptions = {}) {
    this.maxAttempts = opts.maxAttempts ?? 3;
    this.backoffMs = opts.backoffMs ?? 1_000;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.fetch = opts.fetch ?? fetch;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  private async attempt(url: string, body: string): Promise<number> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      const res = await this.fetch(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body,
        signal: controller.signal,
      });
      await res.text();
      if (!res.ok) throw new DeliveryError('status', `Webhook returned status ${res.status}`);
      return res.status;
    } catch (err) {
      if (err instanceof DeliveryError) throw err;
      if (timedOut) throw new DeliveryError('timeout', `Webhook timed out after ${this.timeoutMs}ms`);
      // fetch rejects with a TypeError when the connection cannot be made
      if (err instanceof TypeError) throw new DeliveryError('connection', `Webhook connection error: ${err.message}`);
      throw new DeliveryError('unknown', errorMessage(err));
    } finally {
      clearTimeout(timer);
    }
  }

  async notify(notification: Pick<NewNotification, 'url' | 'payload' | 'correlation_id'>): Promise<DeliveryReport> {
    const { url, correlation_id: correlationId } = notification;
    const body = JSON.stringify(notification.payload);
    let last: DeliveryError | null = null;

    logger.info({ url, correlationId }, 'Sending webhook notification');
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const status = await this.attempt(url, body);
        logger.info({ url, correlationId, attempt }, 'Webhook delivered');
        return { delivered: true, attempts: attempt, status };
      } catch (err) {
        last = err instanceof DeliveryError ? err : new DeliveryError('unknown', errorMessage(err));
        logger.warn({ url, correlationId, attempt, reason: last.reason, error: last.message }, 'Webhook attempt failed');
      }
      if (attempt < this.maxAttempts) {
        await this.sleep(this.backoffMs * 2 ** (attempt - 1));
      }
    }

    logger.error({ url, correlationId, attempts: this.maxAttempts }, 'Failed to send webhook after all attempts');
    return {
      delivered: false,
      attempts: this.maxAttempts,
      reason: last?.reason ?? 'unknown',
      error: last?.message ?? 'Webhook delivery failed',
    };
  }
}
