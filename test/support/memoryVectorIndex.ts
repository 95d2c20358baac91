// test/support/memoryVectorIndex.ts
// In-process VectorIndex with cosine distance, standing in for pgvector.

import type { VectorIndex, VectorMatch, VectorRecord } from '../../src/db/vectorIndex.js';
import type { StoredChunk, StoredMetadata } from '../../src/models/types.js';

export function cosineDistance(a: number[], b: number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 1;
  return 1 - dot / (Math.sqrt(na) * Math.sqrt(nb));
}

const toChunk = (r: VectorRecord): StoredChunk => ({ id: r.id, content: r.content, metadata: { ...r.metadata } });

export class MemoryVectorIndex implements VectorIndex {
  readonly collections = new Map<string, VectorRecord[]>();

  async listCollections(): Promise<string[]> {
    return [...this.collections.keys()];
  }

  async hasCollection(name: string): Promise<boolean> {
    return this.collections.has(name);
  }

  async ensureCollection(name: string): Promise<void> {
    if (!this.collections.has(name)) this.collections.set(name, []);
  }

  async insert(name: string, records: VectorRecord[]): Promise<void> {
    const existing = this.collections.get(name);
    if (!existing) throw new Error(`collection ${name} missing`);
    existing.push(...records);
  }

  async query(name: string, vector: number[], k: number): Promise<VectorMatch[]> {
    return (this.collections.get(name) ?? [])
      .map((r) => ({ chunk: toChunk(r), distance: cosineDistance(vector, r.embedding) }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, k);
  }

  async getAll(name: string): Promise<StoredChunk[]> {
    return (this.collections.get(name) ?? []).map(toChunk);
  }

  async count(name: string): Promise<number> {
    return this.collections.get(name)?.length ?? 0;
  }

  async peek(name: string, limit: number): Promise<StoredChunk[]> {
    return (await this.getAll(name)).slice(0, limit);
  }

  async dropCollection(name: string): Promise<boolean> {
    return this.collections.delete(name);
  }

  /** Write rows directly, e.g. chunks stored under the older `pages` metadata. */
  seed(name: string, rows: { content: string; metadata: StoredMetadata }[]): void {
    const list = this.collections.get(name) ?? [];
    rows.forEach((row, i) => {
      list.push({ id: `${name}-seed-${list.length + i}`, chunkId: String(i), embedding: [1], ...row });
    });
    this.collections.set(name, list);
  }
}
