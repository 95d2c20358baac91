/**
 * src/config/env.ts
 * What: Environment configuration loader/validator for the API server and the worker.
 * How: Loads .env via dotenv, validates with zod and returns a typed AppConfig. Entrypoints call
 *      loadConfig() once and hand the result to the service container; nothing else reads process.env.
 */

import 'dotenv/config';
import { z } from 'zod';

const intWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? parseInt(v, 10) : v),
    z.number().int().positive().default(def),
  );

const floatWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? parseFloat(v) : v),
    z.number().min(0).max(2).default(def),
  );

const schema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_EMBED_MODEL: z.string().default('text-embedding-3-small'),
  EMBED_DIMS: intWithDefault(1536),
  OPENAI_CHAT_MODEL: z.string().default('gpt-4o-mini'),
  CHAT_TEMPERATURE: floatWithDefault(0.7),
  // Lower temperature keeps quiz output closer to the requested JSON shape
  QUIZ_TEMPERATURE: floatWithDefault(0.3),
  CHUNK_SIZE: intWithDefault(1000),
  CHUNK_OVERLAP: intWithDefault(200),
  EMBED_BATCH_SIZE: intWithDefault(10),
  SEARCH_CONCURRENCY: intWithDefault(4),
  PORT: intWithDefault(8001),
  WEBHOOK_BASE_URL: z.string().url().default('http://localhost:8000/webhook'),
  WEBHOOK_TIMEOUT_MS: intWithDefault(30_000),
  WEBHOOK_MAX_ATTEMPTS: intWithDefault(3),
  WEBHOOK_BACKOFF_MS: intWithDefault(1_000),
  DOWNLOAD_TIMEOUT_MS: intWithDefault(30_000),
  JOB_TIMEOUT_MS: intWithDefault(30 * 60 * 1000),
  WORKER_POLL_INTERVAL_MS: intWithDefault(2_000),
  WORKER_CONCURRENCY: intWithDefault(1),
  OUTBOX_INTERVAL_MS: intWithDefault(5_000),
  OUTBOX_BATCH_SIZE: intWithDefault(20),
  NODE_ENV: z.enum(['production', 'development', 'test']).optional().default('development'),
});

export type AppConfig = z.infer<typeof schema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  if (parsed.data.CHUNK_OVERLAP >= parsed.data.CHUNK_SIZE) {
    throw new Error('Invalid environment configuration: CHUNK_OVERLAP must be smaller than CHUNK_SIZE');
  }
  return parsed.data;
}
