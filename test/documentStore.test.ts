import { describe, expect, it } from 'vitest';
import { DocumentStore, collectionName } from '../src/services/documentStore.js';
import { chunkPages } from '../src/services/chunking.js';
import { CollectionNotFoundError, NotFoundError, StorageError } from '../src/errors.js';
import { MemoryVectorIndex } from './support/memoryVectorIndex.js';
import { FakeEmbedder } from './support/fakes.js';
import type { Chunk } from '../src/models/types.js';

function makeStore(batchSize = 10) {
  const index = new MemoryVectorIndex();
  const embedder = new FakeEmbedder();
  return { index, embedder, store: new DocumentStore(index, embedder, batchSize) };
}

async function sampleChunks(documentId: string, pageCount: number, name?: string): Promise<Chunk[]> {
  const pages = new Map(Array.from({ length: pageCount }, (_, i) => [i + 1, `page ${i + 1} about topic${i + 1}`]));
  return chunkPages(pages, documentId, name);
}

describe('DocumentStore', () => {
  it('returns no results for a document that was never added', async () => {
    const { store } = makeStore();
    await expect(store.search('anything', 'missing')).resolves.toEqual([]);
  });

  it('embeds and writes chunks in batches', async () => {
    const { store, index, embedder } = makeStore(10);
    const chunks = await sampleChunks('d1', 25);

    await expect(store.add(chunks, 'd1')).resolves.toBe(25);

    expect(embedder.calls.map((batch) => batch.length)).toEqual([10, 10, 5]);
    expect(await index.count('pdf_d1')).toBe(25);
  });

  it('stops writing batches once the signal is aborted', async () => {
    const { store, index, embedder } = makeStore(10);
    const controller = new AbortController();
    const reason = new Error('job timed out');
    const embedMany = embedder.embedMany.bind(embedder);
    embedder.embedMany = async (texts) => {
      const vectors = await embedMany(texts);
      controller.abort(reason);
      return vectors;
    };

    await expect(store.add(await sampleChunks('d1', 25), 'd1', controller.signal)).rejects.toBe(reason);

    expect(embedder.calls).toHaveLength(1);
    expect(await index.count('pdf_d1')).toBe(10);
  });

  it('finds the closest chunk first and scores within [0, 1]', async () => {
    const { store } = makeStore();
    await store.add(await sampleChunks('d1', 5), 'd1');

    const results = await store.search('topic3', 'd1', 2);

    expect(results).toHaveLength(2);
    expect(results[0].metadata.page_number).toBe(3);
    expect(results.every((r) => r.score >= 0 && r.score <= 1)).toBe(true);
  });

  it('describes a document from its stored metadata', async () => {
    const { store } = makeStore();
    await store.add(await sampleChunks('d1', 3, 'Genetics'), 'd1');

    await expect(store.describe('d1')).resolves.toEqual({
      pdf_id: 'd1',
      document_count: 3,
      pdf_name: 'Genetics',
      total_pages: 3,
    });
  });

  it('falls back to defaults when older rows lack name and page count', async () => {
    const { store, index } = makeStore();
    index.seed(collectionName('old'), [{ content: 'legacy text', metadata: { pages: '1,2' } }]);

    await expect(store.describe('old')).resolves.toEqual({
      pdf_id: 'old',
      document_count: 1,
      pdf_name: 'document_old',
      total_pages: 'unknown',
    });
  });

  it('reports a missing document as not found', async () => {
    const { store } = makeStore();
    await expect(store.describe('nope')).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.getAll('nope')).rejects.toBeInstanceOf(CollectionNotFoundError);
  });

  it('lists only document collections', async () => {
    const { store, index } = makeStore();
    await store.add(await sampleChunks('a', 1), 'a');
    await store.add(await sampleChunks('b', 2), 'b');
    await index.ensureCollection('scratch');

    const listed = await store.listAll();

    expect(listed.map((d) => d.pdf_id)).toEqual(['a', 'b']);
  });

  it('deletes a collection once', async () => {
    const { store } = makeStore();
    await store.add(await sampleChunks('d1', 1), 'd1');

    await expect(store.delete('d1')).resolves.toBe(true);
    await expect(store.delete('d1')).resolves.toBe(false);
    await expect(store.search('page', 'd1')).resolves.toEqual([]);
  });

  it('returns every chunk in insertion order', async () => {
    const { store } = makeStore();
    await store.add(await sampleChunks('d1', 3), 'd1');
    const all = await store.getAll('d1');
    expect(all.map((c) => c.metadata.chunk_id)).toEqual(['1_0', '2_0', '3_0']);
  });

  it('wraps backend failures in StorageError', async () => {
    const { store, index } = makeStore();
    await store.add(await sampleChunks('d1', 1), 'd1');
    index.query = async () => {
      throw new Error('connection reset');
    };

    const err = await store.search('page', 'd1').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StorageError);
    expect(err).toHaveProperty('message', 'Failed to search documents for PDF d1: connection reset');
  });
});
