// src/worker.ts
// What: Background worker entrypoint.
// How: Parses --queue pdf_processing|quiz_processing|both, --burst and --name, builds the container, starts the
//      outbox dispatcher and runs the job loop. Burst mode drains the queue and flushes the outbox once, then exits.

import { hostname } from 'os';
import { parseArgs } from 'util';
import { loadConfig } from './config/env.js';
import { createContainer } from './container.js';
import logger from './logging.js';
import { JobWorker } from './services/worker.js';
import type { JobKind } from './models/types.js';

const QUEUE_KINDS: Record<string, JobKind[]> = {
  pdf_processing: ['ingest'],
  quiz_processing: ['generate-quiz'],
  both: ['ingest', 'generate-quiz'],
};

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      queue: { type: 'string', default: 'both' },
      burst: { type: 'boolean', default: false },
      name: { type: 'string' },
    },
  });

  const queue = values.queue ?? 'both';
  const kinds = QUEUE_KINDS[queue];
  if (!kinds) {
    throw new Error(`Unknown queue "${queue}"; expected pdf_processing, quiz_processing or both`);
  }

  const config = loadConfig();
  const container = createContainer(config);
  const worker = new JobWorker(container.jobs, container.indexer, container.rag, {
    name: values.name ?? `worker-${hostname()}-${process.pid}`,
    kinds,
    concurrency: config.WORKER_CONCURRENCY,
    pollIntervalMs: config.WORKER_POLL_INTERVAL_MS,
    jobTimeoutMs: config.JOB_TIMEOUT_MS,
    webhookBaseUrl: config.WEBHOOK_BASE_URL,
  });

  const burst = values.burst ?? false;
  if (!burst) container.dispatcher.start();

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Worker shutting down after current jobs');
    worker.stop();
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  try {
    await worker.run(burst);
    if (burst) await container.dispatcher.tick();
  } finally {
    container.dispatcher.stop();
    logger.info({ dispatcher: container.dispatcher.status() }, 'Outbox dispatcher stopped');
    await container.pool.end();
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Worker crashed');
  process.exit(1);
});
