// src/models/types.ts
// What: Shared TypeScript types for chunks, collections, jobs, quizzes and notifications.
// How: Interfaces mirror the stored rows and the JSON shapes sent over HTTP and webhooks (snake_case).

/** 1-based page number → extracted text (or a placeholder). */
export type PageText = Map<number, string>;

export type MetadataValue = string | number | boolean | null;
export type StoredMetadata = Record<string, MetadataValue>;

/** Metadata written for every chunk today. `pages` is kept so older readers still work. */
export interface ChunkMetadata {
  pdf_id: string;
  chunk_id: string; // "<page>_<index on page>"
  source: 'pdf';
  pdf_name: string;
  pages: string;
  page_number: number;
  total_pages: number;
  chunk_index_on_page: number;
}

export interface Chunk {
  content: string;
  metadata: ChunkMetadata;
}

/** A chunk as read back from a collection; metadata may follow either schema. */
export interface StoredChunk {
  id: string;
  content: string;
  metadata: StoredMetadata;
}

export interface ScoredChunk extends StoredChunk {
  score: number; // [0,1]
}

export interface DocumentInfo {
  pdf_id: string;
  document_count: number;
  pdf_name: string;
  total_pages: number | 'unknown';
}

export type Difficulty = 'easy' | 'medium' | 'hard';
export type QuizType = 'topic' | 'page_range' | 'multi_pdf_topic';

export interface QuizQuestion {
  question: string;
  options: string[];
  correct_answer: string;
  explanation?: string;
}

export interface ChatTurn {
  role: string;
  content: string;
}

export type ChatEvent =
  | { type: 'status'; data: string }
  | { type: 'sources'; data: string[] }
  | { type: 'content'; data: string }
  | { type: 'done'; data: string }
  | { type: 'error'; data: string };

export interface ChatAnswer {
  response: string;
  sources: string[];
}

// --- jobs ---

export type JobKind = 'ingest' | 'generate-quiz';
export type JobStatus = 'queued' | 'started' | 'finished' | 'failed' | 'canceled';

export interface IngestPayload {
  source_url: string;
  upload_id: number;
  pdf_id: string;
  pdf_name?: string | null;
}

export interface QuizPayload {
  quiz_type: QuizType;
  pdf_ids: string[];
  topic?: string | null;
  page_start?: number | null;
  page_end?: number | null;
  num_questions: number;
  difficulty: Difficulty;
  exam_id: number;
  quiz_id: string;
}

export type JobRequest =
  | { kind: 'ingest'; payload: IngestPayload }
  | { kind: 'generate-quiz'; payload: QuizPayload };

export type JobResult = Record<string, unknown>;

export type Job = JobRequest & {
  id: string;
  status: JobStatus;
  created_at: Date;
  started_at: Date | null;
  ended_at: Date | null;
  result: JobResult | null;
  error: string | null;
  worker: string | null;
};

// --- notifications ---

export type NotificationEvent = 'upload-processed' | 'quiz-generated';
export type NotificationStatus = 'pending' | 'delivered' | 'dropped';

/** Event content fixed when the owning job completes. */
export interface NewNotification {
  event: NotificationEvent;
  correlation_id: string;
  url: string;
  payload: Record<string, unknown>;
}

export interface Notification extends NewNotification {
  id: string;
  status: NotificationStatus;
  attempts: number;
  last_error: string | null;
  created_at: Date;
  delivered_at: Date | null;
}
