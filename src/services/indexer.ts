// src/services/indexer.ts
// What: Orchestrates download → extract → chunk → embed → store for one uploaded PDF.
// How: Downloads with a bounded timeout, extracts page text with unpdf, splits each page on its own and hands
//      the chunks to the DocumentStore, which embeds and inserts them in small batches. No DB connection is
//      held while downloading or extracting. Failures propagate so the worker can fail the job.

import logger from '../logging.js';
import { downloadPdf, extractPageText, pageStats, type FetchLike, type PdfLoader } from './pdf.js';
import { chunkPages, defaultPdfName, type ChunkingOptions } from './chunking.js';
import type { DocumentStore } from './documentStore.js';
import type { IngestPayload } from '../models/types.js';

export type IngestResult = {
  pdf_id: string;
  upload_id: number;
  total_pages: number;
  pdf_name: string;
  chunks_count: number;
  status: 'success';
  message: string;
};

export interface IndexerOptions {
  downloadTimeoutMs?: number;
  chunking?: ChunkingOptions;
  fetch?: FetchLike;
  loadPdf?: PdfLoader;
}

export class Indexer {
  constructor(
    private readonly store: DocumentStore,
    private readonly opts: IndexerOptions = {},
  ) {}

  async ingest(payload: IngestPayload, signal?: AbortSignal): Promise<IngestResult> {
    const { source_url: url, upload_id: uploadId, pdf_id: pdfId } = payload;
    const pdfName = payload.pdf_name || defaultPdfName(pdfId);
    const start = Date.now();

    const bytes = await downloadPdf(url, { timeoutMs: this.opts.downloadTimeoutMs, fetch: this.opts.fetch, signal });
    signal?.throwIfAborted();

    logger.info({ pdfId, bytes: bytes.length }, 'Extracting text from PDF');
    const pages = await extractPageText(bytes, this.opts.loadPdf);
    const stats = pageStats(pages);
    logger.debug({ pdfId, total_pages: stats.total_pages, total_characters: stats.total_characters }, 'Extracted pages');
    signal?.throwIfAborted();

    const chunks = await chunkPages(pages, pdfId, pdfName, this.opts.chunking);
    logger.info({ pdfId, chunks: chunks.length }, 'Chunked PDF pages');
    signal?.throwIfAborted();

    const written = await this.store.add(chunks, pdfId, signal);

    logger.info({ pdfId, uploadId, duration_ms: Date.now() - start }, 'PDF ingested');
    return {
      pdf_id: pdfId,
      upload_id: uploadId,
      total_pages: pages.size,
      pdf_name: pdfName,
      chunks_count: written,
      status: 'success',
      message: 'PDF processed successfully',
    };
  }
}
