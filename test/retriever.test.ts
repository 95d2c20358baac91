import { describe, expect, it, vi } from 'vitest';
import { Retriever, resolvePage } from '../src/services/retriever.js';
import { DocumentStore, collectionName } from '../src/services/documentStore.js';
import { chunkPages } from '../src/services/chunking.js';
import { CollectionNotFoundError, InvalidRangeError, NoContentInRangeError } from '../src/errors.js';
import { MemoryVectorIndex } from './support/memoryVectorIndex.js';
import { FakeEmbedder } from './support/fakes.js';

function setup() {
  const index = new MemoryVectorIndex();
  const store = new DocumentStore(index, new FakeEmbedder());
  return { index, store, retriever: new Retriever(store, 2) };
}

async function addPages(store: DocumentStore, id: string, texts: string[], name?: string) {
  const pages = new Map(texts.map((t, i) => [i + 1, t]));
  await store.add(await chunkPages(pages, id, name), id);
}

describe('resolvePage', () => {
  it('prefers the current page_number field', () => {
    expect(resolvePage({ page_number: 3, pages: '9' })).toEqual({ kind: 'current', page: 3 });
    expect(resolvePage({ page_number: '4' })).toEqual({ kind: 'current', page: 4 });
  });

  it('falls back to the first numeric entry of the legacy pages list', () => {
    expect(resolvePage({ pages: '4,5' })).toEqual({ kind: 'legacy', page: 4 });
    expect(resolvePage({ pages: ' 7 ' })).toEqual({ kind: 'legacy', page: 7 });
    expect(resolvePage({ pages: 'x, 9' })).toEqual({ kind: 'legacy', page: 9 });
    expect(resolvePage({ page_number: 'n/a', pages: '5' })).toEqual({ kind: 'legacy', page: 5 });
  });

  it('gives up when neither field yields a page', () => {
    expect(resolvePage({})).toEqual({ kind: 'unresolved' });
    expect(resolvePage({ pages: 'intro' })).toEqual({ kind: 'unresolved' });
  });
});

describe('Retriever.pageRange', () => {
  it('returns chunks created for the requested pages, in page order', async () => {
    const { store, retriever } = setup();
    await addPages(store, 'cur', ['one', 'two', 'three', 'four']);

    const chunks = await retriever.pageRange('cur', 2, 3);

    expect(chunks.map((c) => c.metadata.page_number)).toEqual([2, 3]);
    expect(chunks.map((c) => c.content)).toEqual(['two', 'three']);
  });

  it('reads rows stored with the legacy pages field', async () => {
    const { index, retriever } = setup();
    index.seed(collectionName('old'), [
      { content: 'p3', metadata: { pages: '3,4' } },
      { content: 'p1', metadata: { pages: '1' } },
      { content: 'p2', metadata: { pages: '2' } },
      { content: 'orphan', metadata: { source: 'pdf' } },
    ]);

    const chunks = await retriever.pageRange('old', 1, 3);

    expect(chunks.map((c) => c.content)).toEqual(['p1', 'p2', 'p3']);
  });

  it('keeps insertion order for chunks on the same page across both schemas', async () => {
    const { index, retriever } = setup();
    index.seed(collectionName('mixed'), [
      { content: 'b-first', metadata: { page_number: 2 } },
      { content: 'a', metadata: { pages: '1' } },
      { content: 'b-second', metadata: { pages: '2,3' } },
    ]);

    const chunks = await retriever.pageRange('mixed', 1, 2);

    expect(chunks.map((c) => c.content)).toEqual(['a', 'b-first', 'b-second']);
  });

  it('fails for a range past the end of the document', async () => {
    const { store, retriever } = setup();
    await addPages(store, 'short', ['one', 'two', 'three', 'four']);

    await expect(retriever.pageRange('short', 5, 10)).rejects.toThrow(new NoContentInRangeError(5, 10).message);
  });

  it('fails for a document without a collection', async () => {
    const { retriever } = setup();
    await expect(retriever.pageRange('ghost', 1, 2)).rejects.toBeInstanceOf(CollectionNotFoundError);
  });

  it('rejects malformed ranges before touching storage', async () => {
    const { store, retriever } = setup();
    const getAll = vi.spyOn(store, 'getAll');

    await expect(retriever.pageRange('cur', 3, 1)).rejects.toBeInstanceOf(InvalidRangeError);
    await expect(retriever.pageRange('cur', 0, 1)).rejects.toBeInstanceOf(InvalidRangeError);
    expect(getAll).not.toHaveBeenCalled();
  });
});

describe('Retriever.searchMany', () => {
  const texts = (prefix: string) => [1, 2, 3, 4, 5].map((i) => `${prefix} cell biology part ${i}`);

  it('draws from every document and caps the total at k', async () => {
    const { store, retriever } = setup();
    await addPages(store, 'a', texts('alpha'));
    await addPages(store, 'b', texts('beta'));

    const results = await retriever.searchMany('cell biology', ['a', 'b'], 8);

    expect(results).toHaveLength(8);
    expect(results.slice(0, 5).every((r) => r.metadata.pdf_id === 'a')).toBe(true);
    expect(results.slice(5).every((r) => r.metadata.pdf_id === 'b')).toBe(true);
  });

  it('asks each document for its share plus one', async () => {
    const { store, retriever } = setup();
    const search = vi.spyOn(store, 'search');

    await retriever.searchMany('q', ['a', 'b', 'c'], 8);

    expect(search.mock.calls.map((call) => call[2])).toEqual([3, 3, 3]);
  });

  it('skips a document whose search fails', async () => {
    const { store, retriever } = setup();
    await addPages(store, 'a', texts('alpha'));
    await addPages(store, 'b', texts('beta'));
    const original = store.search.bind(store);
    vi.spyOn(store, 'search').mockImplementation(async (query, id, k) => {
      if (id === 'a') throw new Error('backend down');
      return original(query, id, k);
    });

    const results = await retriever.searchMany('cell biology', ['a', 'b'], 8);

    expect(results).toHaveLength(5);
    expect(results.every((r) => r.metadata.pdf_id === 'b')).toBe(true);
  });

  it('returns nothing for an empty document list', async () => {
    const { retriever } = setup();
    await expect(retriever.searchMany('q', [], 8)).resolves.toEqual([]);
  });
});

describe('Retriever.pageDistribution', () => {
  it('counts chunks per page and per metadata schema', async () => {
    const { index, retriever } = setup();
    index.seed(collectionName('d'), [
      { content: 'a', metadata: { page_number: 2 } },
      { content: 'b', metadata: { pages: '2,3' } },
      { content: 'c', metadata: { pages: '5' } },
      { content: 'd', metadata: {} },
    ]);

    await expect(retriever.pageDistribution('d')).resolves.toEqual({
      pdf_id: 'd',
      total_chunks: 4,
      chunks_per_page: { 2: 2, 5: 1 },
      current_schema: 1,
      legacy_schema: 2,
      unresolved: 1,
      min_page: 2,
      max_page: 5,
    });
  });
});
