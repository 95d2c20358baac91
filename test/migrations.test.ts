import { describe, expect, it } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { QUERY_SQL } from '../src/db/vectorIndex.js';

const migrationsDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../src/db/migrations');

async function schemaSql(): Promise<string> {
  const files = (await fs.readdir(migrationsDir)).filter((f) => f.endsWith('.sql')).sort();
  const parts = await Promise.all(files.map((f) => fs.readFile(path.join(migrationsDir, f), 'utf8')));
  return parts.join('\n');
}

describe('vector search schema', () => {
  it('has no shared approximate index over every collection', async () => {
    const sql = await schemaSql();
    expect(sql).not.toMatch(/USING\s+(hnsw|ivfflat)/i);
    expect(sql).toContain('ON collection_entries (collection, seq)');
  });

  it('ranks within one collection by exact cosine distance', () => {
    expect(QUERY_SQL).toContain('WHERE e.collection = $2');
    expect(QUERY_SQL).toContain('ORDER BY e.embedding <=> q.qv');
    expect(QUERY_SQL).not.toMatch(/ef_search/);
  });
});
