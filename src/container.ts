// src/container.ts
// What: Builds the service graph once per process from AppConfig.
// How: One pg Pool and one OpenAI client are shared by every service; entrypoints take what they need and
//      close the pool on shutdown.

import OpenAI from 'openai';
import type { AppConfig } from './config/env.js';
import { createPool, type Pool } from './db/pool.js';
import { PgVectorIndex } from './db/vectorIndex.js';
import { PgJobRepository } from './db/jobRepository.js';
import { PgNotificationOutbox } from './db/notificationOutbox.js';
import { OpenAIEmbedder } from './services/embeddings.js';
import { OpenAICompletionService } from './services/completions.js';
import { DocumentStore } from './services/documentStore.js';
import { Retriever } from './services/retriever.js';
import { Generator } from './services/generator.js';
import { RagService } from './services/rag.js';
import { JobQueue } from './services/jobQueue.js';
import { Indexer } from './services/indexer.js';
import { Notifier } from './services/notifier.js';
import { OutboxDispatcher } from './services/outboxDispatcher.js';

export interface Container {
  config: AppConfig;
  pool: Pool;
  store: DocumentStore;
  retriever: Retriever;
  rag: RagService;
  queue: JobQueue;
  jobs: PgJobRepository;
  indexer: Indexer;
  dispatcher: OutboxDispatcher;
}

export function createContainer(config: AppConfig): Container {
  const pool = createPool(config.DATABASE_URL);
  const openai = new OpenAI({ apiKey: config.OPENAI_API_KEY });

  const embedder = new OpenAIEmbedder(openai, config.OPENAI_EMBED_MODEL, config.EMBED_DIMS);
  const store = new DocumentStore(new PgVectorIndex(pool), embedder, config.EMBED_BATCH_SIZE);
  const retriever = new Retriever(store, config.SEARCH_CONCURRENCY);
  const generator = new Generator(
    new OpenAICompletionService(openai, { model: config.OPENAI_CHAT_MODEL, temperature: config.CHAT_TEMPERATURE }),
    new OpenAICompletionService(openai, { model: config.OPENAI_CHAT_MODEL, temperature: config.QUIZ_TEMPERATURE }),
  );
  const jobs = new PgJobRepository(pool);

  const notifier = new Notifier({
    maxAttempts: config.WEBHOOK_MAX_ATTEMPTS,
    backoffMs: config.WEBHOOK_BACKOFF_MS,
    timeoutMs: config.WEBHOOK_TIMEOUT_MS,
  });

  return {
    config,
    pool,
    store,
    retriever,
    rag: new RagService(retriever, generator),
    queue: new JobQueue(jobs),
    jobs,
    indexer: new Indexer(store, {
      downloadTimeoutMs: config.DOWNLOAD_TIMEOUT_MS,
      chunking: { chunkSize: config.CHUNK_SIZE, chunkOverlap: config.CHUNK_OVERLAP },
    }),
    dispatcher: new OutboxDispatcher(new PgNotificationOutbox(pool), notifier, {
      intervalMs: config.OUTBOX_INTERVAL_MS,
      batchSize: config.OUTBOX_BATCH_SIZE,
    }),
  };
}
