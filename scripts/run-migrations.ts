// scripts/run-migrations.ts
// What: Applies the SQL files in src/db/migrations in filename order.
// How: Loads .env, records applied files in schema_migrations and runs each new file on one connection.
//      Every migration file carries its own BEGIN/COMMIT. Exits non-zero on the first failure.

import 'dotenv/config';
import { promises as fs } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import logger from '../src/logging.js';
import { createPool } from '../src/db/pool.js';

const migrationsDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../src/db/migrations');

async function main(): Promise<void> {
  const entries = await fs.readdir(migrationsDir, { withFileTypes: true });
  const files = entries
    .filter((e) => e.isFile() && e.name.endsWith('.sql'))
    .map((e) => e.name)
    .sort((a, b) => a.localeCompare(b));

  if (files.length === 0) {
    logger.info({ dir: migrationsDir }, 'No migrations found');
    return;
  }

  const connStr = process.env.DATABASE_URL;
  if (!connStr) {
    throw new Error('DATABASE_URL is not set');
  }

  const u = new URL(connStr);
  logger.info({ host: u.hostname, port: u.port || '5432', database: u.pathname.replace(/^\//, '') }, 'Migrating database');

  const pool = createPool(connStr, 1);
  const client = await pool.connect();
  try {
    await client.query(
      'CREATE TABLE IF NOT EXISTS schema_migrations (name TEXT PRIMARY KEY, applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW())',
    );
    const applied = await client.query<{ name: string }>('SELECT name FROM schema_migrations');
    const done = new Set(applied.rows.map((r) => r.name));

    for (const file of files) {
      if (done.has(file)) {
        logger.debug({ file }, 'Migration already applied');
        continue;
      }
      const sql = await fs.readFile(path.join(migrationsDir, file), 'utf8');
      logger.info({ file }, 'Applying migration');
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
    }
  } finally {
    client.release();
    await pool.end();
  }
  logger.info('Migrations complete');
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Migration failed');
  process.exit(1);
});
