// src/services/rag.ts
// What: Retrieval-augmented chat and quiz context assembly on top of the Retriever and Generator.
// How: Chat retrieves 4 chunks for one document or 8 across several, labels sources by chunk id (with the
//      document name when several are in play) and hands the joined context to the Generator. Quiz context
//      comes from similarity search (topic 8, multi-document 12) or the structural page-range filter.

import logger from '../logging.js';
import { ValidationError, errorMessage } from '../errors.js';
import type { Retriever } from './retriever.js';
import type { Generator, QuizParams } from './generator.js';
import type { ChatAnswer, ChatEvent, ChatTurn, QuizQuestion, StoredChunk } from '../models/types.js';

const SINGLE_DOC_K = 4;
const MULTI_DOC_K = 8;
const TOPIC_QUIZ_K = 8;
const MULTI_DOC_QUIZ_K = 12;

export const NO_DOCUMENTS_MESSAGE = 'No PDFs specified. Please select at least one PDF to chat with.';

export function noRelevantInfoMessage(documentCount: number): string {
  const what = documentCount === 1 ? 'PDF' : `${documentCount} PDFs`;
  return `I couldn't find any relevant information in the ${what} to answer your question. Please make sure the PDFs have been uploaded and processed correctly.`;
}

export function sourceLabel(chunk: StoredChunk, multiDocument: boolean): string {
  const chunkId = chunk.metadata.chunk_id ?? 'unknown';
  if (!multiDocument) return `Chunk ${chunkId}`;
  const pdfName = chunk.metadata.pdf_name ?? 'Unknown PDF';
  return `${pdfName} - Chunk ${chunkId}`;
}

const joinContext = (chunks: StoredChunk[]) => chunks.map((c) => c.content).join('\n\n');

export class RagService {
  constructor(
    private readonly retriever: Retriever,
    private readonly generator: Generator,
  ) {}

  private retrieveForChat(message: string, documentIds: string[]) {
    return documentIds.length === 1
      ? this.retriever.search(message, documentIds[0], SINGLE_DOC_K)
      : this.retriever.searchMany(message, documentIds, MULTI_DOC_K);
  }

  async chat(documentIds: string[], message: string, history: ChatTurn[] = []): Promise<ChatAnswer> {
    if (documentIds.length === 0) return { response: NO_DOCUMENTS_MESSAGE, sources: [] };

    const chunks = await this.retrieveForChat(message, documentIds);
    if (chunks.length === 0) {
      return { response: noRelevantInfoMessage(documentIds.length), sources: [] };
    }

    const multi = documentIds.length > 1;
    const response = await this.generator.chat({
      context: joinContext(chunks),
      question: message,
      history,
      documentCount: documentIds.length,
    });
    return { response, sources: chunks.map((c) => sourceLabel(c, multi)) };
  }

  async *chatStream(documentIds: string[], message: string, history: ChatTurn[] = []): AsyncGenerator<ChatEvent> {
    if (documentIds.length === 0) {
      yield { type: 'error', data: NO_DOCUMENTS_MESSAGE };
      return;
    }
    yield { type: 'status', data: 'Searching relevant documents...' };

    let chunks: StoredChunk[];
    try {
      chunks = await this.retrieveForChat(message, documentIds);
    } catch (err) {
      logger.error({ err, documentIds }, 'Retrieval for streaming chat failed');
      yield { type: 'error', data: `I'm sorry, I encountered an error while processing your question: ${errorMessage(err)}` };
      return;
    }
    if (chunks.length === 0) {
      yield { type: 'error', data: noRelevantInfoMessage(documentIds.length) };
      return;
    }

    const multi = documentIds.length > 1;
    yield* this.generator.chatStream(
      { context: joinContext(chunks), question: message, history, documentCount: documentIds.length },
      chunks.map((c) => sourceLabel(c, multi)),
    );
  }

  async quizContext(documentIds: string[], params: QuizParams): Promise<string> {
    switch (params.quiz_type) {
      case 'multi_pdf_topic':
        return joinContext(await this.retriever.searchMany(params.topic ?? '', documentIds, MULTI_DOC_QUIZ_K));
      case 'topic':
        return joinContext(await this.retriever.search(params.topic ?? '', documentIds[0], TOPIC_QUIZ_K));
      case 'page_range':
        return joinContext(
          await this.retriever.pageRange(documentIds[0], params.page_start ?? 0, params.page_end ?? 0),
        );
    }
  }

  async generateQuiz(documentIds: string[], params: QuizParams): Promise<QuizQuestion[]> {
    if (documentIds.length === 0) throw new ValidationError('At least one PDF ID is required');
    const context = await this.quizContext(documentIds, params);
    if (!context.trim()) {
      throw new ValidationError('No relevant content found for quiz generation');
    }
    logger.debug({ quiz_type: params.quiz_type, context_chars: context.length }, 'Assembled quiz context');
    return this.generator.generateQuiz(context, params);
  }
}
