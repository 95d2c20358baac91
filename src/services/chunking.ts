// src/services/chunking.ts
// What: Page-bounded chunking of extracted PDF text.
// How: Each page is split on its own with LangChain's RecursiveCharacterTextSplitter (~1000 chars,
//      200 overlap), so a chunk never spans two pages and its metadata names exactly one page.
//      Placeholder pages still yield a chunk; whitespace-only pages yield none.

import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { EmptyRangeError, InvalidRangeError } from '../errors.js';
import type { Chunk, PageText } from '../models/types.js';

export interface ChunkingOptions {
  chunkSize?: number;
  chunkOverlap?: number;
}

const CHUNK_SIZE = 1000;
const CHUNK_OVERLAP = 200;

export const defaultPdfName = (documentId: string) => `document_${documentId}`;

export async function chunkPages(
  pages: PageText,
  documentId: string,
  pdfName?: string | null,
  opts: ChunkingOptions = {},
): Promise<Chunk[]> {
  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize: opts.chunkSize ?? CHUNK_SIZE,
    chunkOverlap: opts.chunkOverlap ?? CHUNK_OVERLAP,
  });
  const name = pdfName || defaultPdfName(documentId);
  const totalPages = pages.size;

  const chunks: Chunk[] = [];
  for (const [pageNum, text] of pages) {
    if (!text.trim()) continue;

    const pieces = await splitter.splitText(text);
    pieces.forEach((content, i) => {
      chunks.push({
        content,
        metadata: {
          pdf_id: documentId,
          chunk_id: `${pageNum}_${i}`,
          source: 'pdf',
          pdf_name: name,
          pages: String(pageNum),
          page_number: pageNum,
          total_pages: totalPages,
          chunk_index_on_page: i,
        },
      });
    });
  }
  return chunks;
}

export function assertPageRange(start: number, end: number): void {
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 1 || end < start) {
    throw new InvalidRangeError(start, end);
  }
}

/** Keep pages in [start, end] (inclusive) and chunk only those. */
export async function chunkPageRange(
  pages: PageText,
  documentId: string,
  start: number,
  end: number,
  pdfName?: string | null,
  opts: ChunkingOptions = {},
): Promise<Chunk[]> {
  assertPageRange(start, end);

  const filtered: PageText = new Map();
  for (const [pageNum, text] of pages) {
    if (pageNum >= start && pageNum <= end) filtered.set(pageNum, text);
  }
  if (filtered.size === 0) {
    throw new EmptyRangeError(start, end);
  }
  return chunkPages(filtered, documentId, pdfName, opts);
}
