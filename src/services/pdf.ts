// src/services/pdf.ts
// What: Fetches a PDF from a URL and extracts its text page by page.
// How: Uses Node built-in fetch behind a bounded timeout, accepts the body when the content-type says PDF
//      or the bytes start with %PDF, then walks pages with unpdf. A page that is empty or throws gets a
//      placeholder so the page still exists downstream.

import { getDocumentProxy } from 'unpdf';
import logger from '../logging.js';
import { DownloadError, ExtractionError, NotAPdfError, errorMessage } from '../errors.js';
import type { PageText } from '../models/types.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface PdfPageLike {
  getTextContent(): Promise<{ items: unknown[] }>;
}

export interface PdfDocumentLike {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfPageLike>;
}

export type PdfLoader = (bytes: Uint8Array) => Promise<PdfDocumentLike>;

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46]; // %PDF

export const emptyPagePlaceholder = (page: number) => `[Page ${page} - No extractable text]`;
export const failedPagePlaceholder = (page: number) => `[Page ${page} - Text extraction failed]`;

export function isPlaceholder(text: string): boolean {
  return /^\[Page \d+ - (No extractable text|Text extraction failed)\]$/.test(text);
}

export function hasPdfMagic(bytes: Uint8Array): boolean {
  return PDF_MAGIC.every((b, i) => bytes[i] === b);
}

interface DownloadOptions {
  timeoutMs?: number; // default 30_000
  fetch?: FetchLike;
  signal?: AbortSignal;
}

export async function downloadPdf(url: string, opts: DownloadOptions = {}): Promise<Uint8Array> {
  const timeoutMs = opts.timeoutMs ?? 30_000;
  const doFetch = opts.fetch ?? fetch;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`download timed out after ${timeoutMs}ms`)), timeoutMs);
  const onOuterAbort = () => controller.abort(opts.signal?.reason);
  opts.signal?.addEventListener('abort', onOuterAbort, { once: true });

  logger.info({ url }, 'Downloading PDF');
  let res: Response;
  let bytes: Uint8Array;
  try {
    res = await doFetch(url, { signal: controller.signal });
    bytes = res.ok ? new Uint8Array(await res.arrayBuffer()) : new Uint8Array();
  } catch (err) {
    throw new DownloadError(`Failed to download PDF from URL: ${errorMessage(err)}`);
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener('abort', onOuterAbort);
  }
  if (!res.ok) {
    throw new DownloadError(`Failed to download PDF from URL: HTTP ${res.status}`);
  }

  const contentType = res.headers.get('content-type') ?? '';
  if (!contentType.includes('application/pdf') && !hasPdfMagic(bytes)) {
    throw new NotAPdfError(url);
  }
  return bytes;
}

function textFromItems(items: unknown[]): string {
  let out = '';
  for (const item of items) {
    if (typeof item !== 'object' || item === null || !('str' in item) || typeof item.str !== 'string') continue;
    out += item.str;
    out += 'hasEOL' in item && item.hasEOL === true ? '\n' : ' ';
  }
  return out;
}

const loadWithUnpdf: PdfLoader = (bytes) => getDocumentProxy(bytes);

/**
 * Extract page-wise text. Throws ExtractionError when the file cannot be opened, has no pages,
 * or not a single page yields real text.
 */
export async function extractPageText(bytes: Uint8Array, load: PdfLoader = loadWithUnpdf): Promise<PageText> {
  let doc: PdfDocumentLike;
  try {
    doc = await load(bytes);
  } catch (err) {
    throw new ExtractionError(`Failed to process PDF: ${errorMessage(err)}`);
  }

  const pages: PageText = new Map();
  let withText = 0;
  for (let pageNum = 1; pageNum <= doc.numPages; pageNum++) {
    try {
      const page = await doc.getPage(pageNum);
      const content = await page.getTextContent();
      const text = textFromItems(content.items);
      if (text.trim()) {
        pages.set(pageNum, text);
        withText++;
      } else {
        pages.set(pageNum, emptyPagePlaceholder(pageNum));
      }
    } catch (err) {
      logger.warn({ err, page: pageNum }, 'Failed to extract text from page');
      pages.set(pageNum, failedPagePlaceholder(pageNum));
    }
  }

  if (withText === 0) {
    throw new ExtractionError('No text could be extracted from the PDF');
  }
  return pages;
}

/** Per-page debugging summary. */
export function pageStats(pages: PageText) {
  let totalChars = 0;
  const perPage: Record<number, { char_count: number; word_count: number; has_content: boolean; preview: string }> = {};
  for (const [pageNum, text] of pages) {
    totalChars += text.length;
    perPage[pageNum] = {
      char_count: text.length,
      word_count: text.split(/\s+/).filter(Boolean).length,
      has_content: text.trim().length > 0 && !isPlaceholder(text),
      preview: text.length > 100 ? `${text.slice(0, 100)}...` : text,
    };
  }
  return { total_pages: pages.size, total_characters: totalChars, pages: perPage };
}
