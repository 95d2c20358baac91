// src/db/vectorIndex.ts
// What: Vector index contract (named collections of embedded chunks) and its pgvector implementation.
// How: A collection is a row in `collections`; its chunks live in `collection_entries` with a vector(1536)
//      embedding and JSONB metadata. Deleting the collection row cascades to its entries. Similarity
//      queries rank a single collection exactly; there is no shared approximate index to filter.

import type { Pool } from './pool.js';
import { withTransaction } from './pool.js';
import { toStoredMetadata, vectorToParam } from '../util/sql.js';
import type { StoredChunk, StoredMetadata } from '../models/types.js';

export interface VectorRecord {
  id: string;
  chunkId: string;
  content: string;
  metadata: StoredMetadata;
  embedding: number[];
}

export interface VectorMatch {
  chunk: StoredChunk;
  distance: number; // cosine distance
}

export interface VectorIndex {
  listCollections(): Promise<string[]>;
  hasCollection(name: string): Promise<boolean>;
  ensureCollection(name: string): Promise<void>;
  insert(name: string, records: VectorRecord[]): Promise<void>;
  query(name: string, vector: number[], k: number): Promise<VectorMatch[]>;
  /** Every entry of the collection in insertion order. */
  getAll(name: string): Promise<StoredChunk[]>;
  count(name: string): Promise<number>;
  peek(name: string, limit: number): Promise<StoredChunk[]>;
  dropCollection(name: string): Promise<boolean>;
}

type EntryRow = {
  id: string;
  content: string;
  metadata: unknown;
};

type MatchRow = EntryRow & { distance: number };

export const QUERY_SQL = `WITH q AS (SELECT $1::vector AS qv)
SELECT e.id, e.content, e.metadata, (e.embedding <=> q.qv) AS distance
FROM collection_entries e, q
WHERE e.collection = $2
ORDER BY e.embedding <=> q.qv
LIMIT $3`;

const toChunk = (row: EntryRow): StoredChunk => ({
  id: row.id,
  content: row.content,
  metadata: toStoredMetadata(row.metadata),
});

export class PgVectorIndex implements VectorIndex {
  constructor(private readonly pool: Pool) {}

  async listCollections(): Promise<string[]> {
    const res = await this.pool.query<{ name: string }>('SELECT name FROM collections ORDER BY created_at, name');
    return res.rows.map((r) => r.name);
  }

  async hasCollection(name: string): Promise<boolean> {
    const res = await this.pool.query('SELECT 1 FROM collections WHERE name = $1', [name]);
    return (res.rowCount ?? 0) > 0;
  }

  async ensureCollection(name: string): Promise<void> {
    await this.pool.query('INSERT INTO collections (name) VALUES ($1) ON CONFLICT (name) DO NOTHING', [name]);
  }

  async insert(name: string, records: VectorRecord[]): Promise<void> {
    if (records.length === 0) return;
    await withTransaction(this.pool, async (client) => {
      for (const r of records) {
        await client.query(
          `INSERT INTO collection_entries (id, collection, chunk_id, content, metadata, embedding)
           VALUES ($1, $2, $3, $4, $5::jsonb, $6::vector)`,
          [r.id, name, r.chunkId, r.content, JSON.stringify(r.metadata), vectorToParam(r.embedding)],
        );
      }
    });
  }

  /** Exact cosine ranking over one collection's rows. */
  async query(name: string, vector: number[], k: number): Promise<VectorMatch[]> {
    const res = await this.pool.query<MatchRow>(QUERY_SQL, [vectorToParam(vector), name, k]);
    return res.rows.map((row) => ({ chunk: toChunk(row), distance: Number(row.distance) }));
  }

  async getAll(name: string): Promise<StoredChunk[]> {
    const res = await this.pool.query<EntryRow>(
      'SELECT id, content, metadata FROM collection_entries WHERE collection = $1 ORDER BY seq',
      [name],
    );
    return res.rows.map(toChunk);
  }

  async count(name: string): Promise<number> {
    const res = await this.pool.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM collection_entries WHERE collection = $1',
      [name],
    );
    return res.rows[0]?.count ?? 0;
  }

  async peek(name: string, limit: number): Promise<StoredChunk[]> {
    const res = await this.pool.query<EntryRow>(
      'SELECT id, content, metadata FROM collection_entries WHERE collection = $1 ORDER BY seq LIMIT $2',
      [name, limit],
    );
    return res.rows.map(toChunk);
  }

  async dropCollection(name: string): Promise<boolean> {
    const res = await this.pool.query('DELETE FROM collections WHERE name = $1', [name]);
    return (res.rowCount ?? 0) > 0;
  }
}
