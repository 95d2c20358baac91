// src/errors.ts
// What: Error taxonomy shared by the pipeline, the job worker and the HTTP layer.
// How: Every error carries an HTTP-ish status and a stable code; the centralized Express handler
//      renders { error: { message, code } } from them, the worker stores the message on the job.

export class AppError extends Error {
  status: number;
  code: string;
  constructor(message: string, status = 500, code = 'INTERNAL') {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, code = 'VALIDATION') {
    super(message, 400, code);
  }
}

export class InvalidRangeError extends ValidationError {
  constructor(start: number, end: number) {
    super(`Invalid page range ${start}-${end}`, 'INVALID_RANGE');
  }
}

export class EmptyRangeError extends AppError {
  constructor(start: number, end: number) {
    super(`No content found in page range ${start}-${end}`, 422, 'EMPTY_RANGE');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, code = 'NOT_FOUND') {
    super(message, 404, code);
  }
}

export class CollectionNotFoundError extends NotFoundError {
  constructor(documentId: string) {
    super(`No collection for document ${documentId}`, 'COLLECTION_NOT_FOUND');
  }
}

export class NoContentInRangeError extends AppError {
  constructor(start: number, end: number) {
    super(`No content found in pages ${start}-${end}`, 422, 'NO_CONTENT_IN_RANGE');
  }
}

export class StorageError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, 'STORAGE');
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class ExtractionError extends AppError {
  constructor(message: string) {
    super(message, 422, 'EXTRACTION');
  }
}

export class NotAPdfError extends AppError {
  constructor(url: string) {
    super(`URL does not point to a valid PDF file: ${url}`, 422, 'NOT_A_PDF');
  }
}

export class DownloadError extends AppError {
  constructor(message: string) {
    super(message, 502, 'DOWNLOAD');
  }
}

export type DeliveryFailure = 'timeout' | 'connection' | 'status' | 'unknown';

export class DeliveryError extends AppError {
  reason: DeliveryFailure;
  constructor(reason: DeliveryFailure, message: string) {
    super(message, 502, 'DELIVERY');
    this.reason = reason;
  }
}

export class JobTimeoutError extends AppError {
  constructor(timeoutMs: number) {
    super(`Job exceeded the ${timeoutMs}ms execution ceiling`, 500, 'JOB_TIMEOUT');
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : 'Unknown error';
}
