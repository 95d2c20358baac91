// src/db/pool.ts
// What: Postgres connection pool factory and a transaction helper.
// How: Creates a pg Pool for DATABASE_URL with a small pool size; withTransaction runs work on one client
//      between BEGIN/COMMIT, rolls back only when a transaction is open, and always releases the client.

import { Pool, type PoolClient } from 'pg';

export type { Pool, PoolClient };

export function createPool(connectionString: string, max = 5): Pool {
  return new Pool({
    connectionString,
    max,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });
}

export async function withTransaction<T>(pool: Pool, work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  let inTx = false;
  try {
    await client.query('BEGIN');
    inTx = true;
    const out = await work(client);
    await client.query('COMMIT');
    inTx = false;
    return out;
  } catch (err) {
    if (inTx) {
      try {
        await client.query('ROLLBACK');
      } catch {
        // the original error is the one worth reporting
      }
    }
    throw err;
  } finally {
    client.release();
  }
}
