// src/services/documentStore.ts
// What: One retrieval collection per document: add, search, describe, delete, list.
// How: Embeds chunks in small batches (default 10) and writes each batch to the vector index under
//      `pdf_<documentId>`. Searching a missing collection yields []. Backend failures surface as
//      StorageError and are not retried here.
//      Re-adding a document id without deleting it first duplicates its chunks.

import { v4 as uuidv4 } from 'uuid';
import logger from '../logging.js';
import { AppError, CollectionNotFoundError, NotFoundError, StorageError, errorMessage } from '../errors.js';
import { clampSimilarity } from '../util/sql.js';
import type { VectorIndex, VectorRecord } from '../db/vectorIndex.js';
import type { Embedder } from './embeddings.js';
import type { Chunk, DocumentInfo, ScoredChunk, StoredChunk } from '../models/types.js';
import { defaultPdfName } from './chunking.js';

const COLLECTION_PREFIX = 'pdf_';

export const collectionName = (documentId: string) => `${COLLECTION_PREFIX}${documentId}`;

function storageFailure(action: string, documentId: string, err: unknown): AppError {
  if (err instanceof AppError) return err;
  return new StorageError(`Failed to ${action} for PDF ${documentId}: ${errorMessage(err)}`, { cause: err });
}

export class DocumentStore {
  constructor(
    private readonly index: VectorIndex,
    private readonly embedder: Embedder,
    private readonly batchSize = 10,
  ) {}

  /** Embed and insert chunks; returns how many were written. An aborted signal stops before the next batch. */
  async add(chunks: Chunk[], documentId: string, signal?: AbortSignal): Promise<number> {
    const name = collectionName(documentId);
    logger.info({ collection: name, chunks: chunks.length }, 'Adding chunks to collection');
    try {
      await this.index.ensureCollection(name);
      for (let offset = 0; offset < chunks.length; offset += this.batchSize) {
        signal?.throwIfAborted();
        const batch = chunks.slice(offset, offset + this.batchSize);
        const vectors = await this.embedder.embedMany(batch.map((c) => c.content));
        const records: VectorRecord[] = batch.map((c, i) => ({
          id: uuidv4(),
          chunkId: c.metadata.chunk_id,
          content: c.content,
          metadata: { ...c.metadata },
          embedding: vectors[i],
        }));
        await this.index.insert(name, records);
      }
    } catch (err) {
      if (signal?.aborted && err === signal.reason) throw err;
      throw storageFailure('store documents', documentId, err);
    }
    return chunks.length;
  }

  async search(query: string, documentId: string, k = 4): Promise<ScoredChunk[]> {
    const name = collectionName(documentId);
    try {
      if (!(await this.index.hasCollection(name))) {
        logger.warn({ collection: name }, 'Collection does not exist');
        return [];
      }
      const vector = await this.embedder.embedText(query);
      const matches = await this.index.query(name, vector, k);
      logger.debug({ documentId, found: matches.length }, 'Similarity search finished');
      return matches.map((m) => ({ ...m.chunk, score: clampSimilarity(m.distance) }));
    } catch (err) {
      throw storageFailure('search documents', documentId, err);
    }
  }

  async getAll(documentId: string): Promise<StoredChunk[]> {
    const name = collectionName(documentId);
    try {
      if (!(await this.index.hasCollection(name))) {
        throw new CollectionNotFoundError(documentId);
      }
      return await this.index.getAll(name);
    } catch (err) {
      throw storageFailure('read documents', documentId, err);
    }
  }

  async describe(documentId: string): Promise<DocumentInfo> {
    const name = collectionName(documentId);
    try {
      if (!(await this.index.hasCollection(name))) {
        throw new NotFoundError(`PDF ${documentId} not found`);
      }
      const count = await this.index.count(name);
      const [sample] = await this.index.peek(name, 1);
      const pdfName = sample?.metadata.pdf_name;
      const totalPages = sample?.metadata.total_pages;
      return {
        pdf_id: documentId,
        document_count: count,
        pdf_name: typeof pdfName === 'string' && pdfName ? pdfName : defaultPdfName(documentId),
        total_pages: typeof totalPages === 'number' ? totalPages : 'unknown',
      };
    } catch (err) {
      throw storageFailure('describe', documentId, err);
    }
  }

  /** Drop the whole collection; false when there was nothing to drop. */
  async delete(documentId: string): Promise<boolean> {
    const name = collectionName(documentId);
    try {
      const existed = await this.index.dropCollection(name);
      if (existed) {
        logger.info({ collection: name }, 'Deleted collection');
      } else {
        logger.warn({ collection: name }, 'Collection does not exist');
      }
      return existed;
    } catch (err) {
      throw storageFailure('delete', documentId, err);
    }
  }

  async listAll(): Promise<DocumentInfo[]> {
    let names: string[];
    try {
      names = await this.index.listCollections();
    } catch (err) {
      throw storageFailure('list collections', '*', err);
    }

    const out: DocumentInfo[] = [];
    for (const name of names) {
      if (!name.startsWith(COLLECTION_PREFIX)) continue;
      try {
        out.push(await this.describe(name.slice(COLLECTION_PREFIX.length)));
      } catch (err) {
        // dropped between listing and describing
        if (err instanceof NotFoundError) continue;
        throw err;
      }
    }
    return out;
  }
}
