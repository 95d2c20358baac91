// src/services/retriever.ts
// What: Similarity search over one or many documents, and structural page-range selection.
// How: Multi-document search asks each collection for an equal share (+1) with bounded parallelism via p-limit
//      and keeps document order. Page-range selection reads every stored chunk, resolves its page from either
//      metadata schema and keeps the ones inside [start, end], sorted by page.

import pLimit from 'p-limit';
import logger from '../logging.js';
import { NoContentInRangeError } from '../errors.js';
import type { DocumentStore } from './documentStore.js';
import { assertPageRange } from './chunking.js';
import type { ScoredChunk, StoredChunk, StoredMetadata } from '../models/types.js';

export type ResolvedPage =
  | { kind: 'current'; page: number }
  | { kind: 'legacy'; page: number }
  | { kind: 'unresolved' };

function asPageNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) return parseInt(value, 10);
  return null;
}

/**
 * Current rows carry `page_number`; older rows only have `pages`, a comma-separated list
 * whose first numeric entry is taken.
 */
export function resolvePage(metadata: StoredMetadata): ResolvedPage {
  const current = asPageNumber(metadata.page_number);
  if (current !== null) return { kind: 'current', page: current };

  const pages = metadata.pages;
  if (typeof pages === 'string' && pages.trim()) {
    const first = pages
      .split(',')
      .map((p) => p.trim())
      .find((p) => /^\d+$/.test(p));
    if (first !== undefined) return { kind: 'legacy', page: parseInt(first, 10) };
  }
  if (typeof pages === 'number' && Number.isInteger(pages)) return { kind: 'legacy', page: pages };

  return { kind: 'unresolved' };
}

export interface PageDistribution {
  pdf_id: string;
  total_chunks: number;
  chunks_per_page: Record<number, number>;
  current_schema: number;
  legacy_schema: number;
  unresolved: number;
  min_page: number | null;
  max_page: number | null;
}

export class Retriever {
  constructor(
    private readonly store: DocumentStore,
    private readonly concurrency = 4,
  ) {}

  search(query: string, documentId: string, k = 4): Promise<ScoredChunk[]> {
    return this.store.search(query, documentId, k);
  }

  /** No cross-document re-ranking: results stay grouped by document in the order given. */
  async searchMany(query: string, documentIds: string[], k = 8): Promise<ScoredChunk[]> {
    if (documentIds.length === 0) return [];
    const perDoc = Math.max(1, Math.floor(k / documentIds.length)) + 1;
    const limit = pLimit(this.concurrency);

    const groups = await Promise.all(
      documentIds.map((id) =>
        limit(async () => {
          try {
            return await this.store.search(query, id, perDoc);
          } catch (err) {
            logger.warn({ err, documentId: id }, 'Search failed for document; skipping');
            return [];
          }
        }),
      ),
    );

    const merged = groups.flat().slice(0, k);
    logger.info({ documents: documentIds.length, perDoc, found: merged.length }, 'Multi-document search finished');
    return merged;
  }

  async pageRange(documentId: string, start: number, end: number): Promise<StoredChunk[]> {
    assertPageRange(start, end);
    const all = await this.store.getAll(documentId);

    const selected: { page: number; chunk: StoredChunk }[] = [];
    for (const chunk of all) {
      const resolved = resolvePage(chunk.metadata);
      if (resolved.kind === 'unresolved') continue;
      if (resolved.page >= start && resolved.page <= end) {
        selected.push({ page: resolved.page, chunk });
      }
    }

    if (selected.length === 0) {
      logger.warn({ documentId, start, end }, 'No chunks found in page range');
      throw new NoContentInRangeError(start, end);
    }

    // Array.prototype.sort is stable, so chunks on the same page keep insertion order
    selected.sort((a, b) => a.page - b.page);
    logger.info({ documentId, start, end, found: selected.length }, 'Collected chunks in page range');
    return selected.map((s) => s.chunk);
  }

  async pageDistribution(documentId: string): Promise<PageDistribution> {
    const all = await this.store.getAll(documentId);
    const out: PageDistribution = {
      pdf_id: documentId,
      total_chunks: all.length,
      chunks_per_page: {},
      current_schema: 0,
      legacy_schema: 0,
      unresolved: 0,
      min_page: null,
      max_page: null,
    };

    for (const chunk of all) {
      const resolved = resolvePage(chunk.metadata);
      switch (resolved.kind) {
        case 'unresolved':
          out.unresolved++;
          continue;
        case 'current':
          out.current_schema++;
          break;
        case 'legacy':
          out.legacy_schema++;
          break;
      }
      const page = resolved.page;
      out.chunks_per_page[page] = (out.chunks_per_page[page] ?? 0) + 1;
      out.min_page = out.min_page === null ? page : Math.min(out.min_page, page);
      out.max_page = out.max_page === null ? page : Math.max(out.max_page, page);
    }
    return out;
  }
}
