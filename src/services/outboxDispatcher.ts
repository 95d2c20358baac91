// src/services/outboxDispatcher.ts
// What: Background loop that delivers pending outbox notifications.
// How: Every interval, if no pass is running, lease a batch of pending rows, post each through the Notifier and
//      mark it delivered or dropped. A pass that throws is logged and the next tick tries again.

import logger from '../logging.js';
import { errorMessage } from '../errors.js';
import type { NotificationOutbox } from '../db/notificationOutbox.js';
import type { Notifier } from './notifier.js';

export interface DispatchResult {
  claimed: number;
  delivered: number;
  dropped: number;
}

export interface DispatcherStatus {
  started: boolean;
  interval_ms: number;
  is_running: boolean;
  runs_completed: number;
  last_run_end?: string; // ISO
  last_error?: string;
  last_result?: DispatchResult;
}

export class OutboxDispatcher {
  private timer: NodeJS.Timeout | null = null;
  private isRunning = false;
  private runsCompleted = 0;
  private lastRunEnd: number | undefined;
  private lastError: string | undefined;
  private lastResult: DispatchResult | undefined;

  constructor(
    private readonly outbox: NotificationOutbox,
    private readonly notifier: Notifier,
    private readonly opts: { intervalMs: number; batchSize: number },
  ) {}

  /** One delivery pass over at most batchSize rows. */
  async dispatchOnce(): Promise<DispatchResult> {
    const batch = await this.outbox.claimPending(this.opts.batchSize);
    const result: DispatchResult = { claimed: batch.length, delivered: 0, dropped: 0 };

    for (const n of batch) {
      const report = await this.notifier.notify(n);
      if (report.delivered) {
        await this.outbox.markDelivered(n.id, report.attempts);
        result.delivered++;
      } else {
        await this.outbox.markDropped(n.id, report.attempts, report.error ?? 'Webhook delivery failed');
        logger.error(
          { notificationId: n.id, event: n.event, correlationId: n.correlation_id, reason: report.reason },
          'Dropped webhook notification',
        );
        result.dropped++;
      }
    }
    return result;
  }

  /** Skipped while a previous pass is still running. */
  async tick(): Promise<void> {
    if (this.isRunning) return;
    this.isRunning = true;
    try {
      this.lastResult = await this.dispatchOnce();
      this.lastError = undefined;
      if (this.lastResult.claimed > 0) {
        logger.info({ result: this.lastResult }, 'Outbox pass finished');
      }
    } catch (err) {
      this.lastError = errorMessage(err);
      logger.error({ err }, 'Outbox pass failed');
    } finally {
      this.lastRunEnd = Date.now();
      this.runsCompleted += 1;
      this.isRunning = false;
    }
  }

  start(): void {
    if (this.timer) return;
    void this.tick();
    this.timer = setInterval(() => {
      void this.tick();
    }, this.opts.intervalMs);
    logger.info({ interval_ms: this.opts.intervalMs }, 'Outbox dispatcher started');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  status(): DispatcherStatus {
    return {
      started: this.timer !== null,
      interval_ms: this.opts.intervalMs,
      is_running: this.isRunning,
      runs_completed: this.runsCompleted,
      last_run_end: this.lastRunEnd ? new Date(this.lastRunEnd).toISOString() : undefined,
      last_error: this.lastError,
      last_result: this.lastResult,
    };
  }
}
