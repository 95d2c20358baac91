import { describe, expect, it } from 'vitest';
import { chatRequestSchema, quizRequestSchema, uploadRequestSchema } from '../src/models/schemas.js';

const messages = (result: { success: boolean; error?: { errors: { message: string }[] } }) =>
  result.error?.errors.map((e) => e.message) ?? [];

describe('uploadRequestSchema', () => {
  it('requires a URL and a positive upload id', () => {
    expect(uploadRequestSchema.safeParse({ source_url: 'https://files.test/a.pdf', upload_id: 3 }).success).toBe(true);
    expect(uploadRequestSchema.safeParse({ source_url: 'not a url', upload_id: 3 }).success).toBe(false);
    expect(uploadRequestSchema.safeParse({ source_url: 'https://files.test/a.pdf', upload_id: 0 }).success).toBe(false);
  });
});

describe('chatRequestSchema', () => {
  it('defaults the conversation history', () => {
    const parsed = chatRequestSchema.parse({ pdf_ids: ['a'], message: 'Hi?' });
    expect(parsed.conversation_history).toEqual([]);
  });

  it('rejects blank messages and empty document lists', () => {
    expect(messages(chatRequestSchema.safeParse({ pdf_ids: ['a'], message: '   ' }))).toEqual(['Message cannot be empty']);
    expect(messages(chatRequestSchema.safeParse({ pdf_ids: [], message: 'Hi?' }))).toEqual([
      'At least one PDF ID is required',
    ]);
  });
});

describe('quizRequestSchema', () => {
  const base = { pdf_ids: ['a'], exam_id: 7 };

  it('applies count and difficulty defaults', () => {
    const parsed = quizRequestSchema.parse({ ...base, quiz_type: 'topic', topic: 'cells' });
    expect(parsed).toMatchObject({ num_questions: 5, difficulty: 'medium' });
  });

  it('requires a topic for topic quizzes', () => {
    expect(messages(quizRequestSchema.safeParse({ ...base, quiz_type: 'multi_pdf_topic' }))).toEqual([
      'Topic is required for topic-based quizzes',
    ]);
  });

  it('checks page ranges', () => {
    expect(messages(quizRequestSchema.safeParse({ ...base, quiz_type: 'page_range', page_start: 2 }))).toEqual([
      'Page start and end are required for page range quiz',
    ]);
    expect(
      messages(quizRequestSchema.safeParse({ ...base, quiz_type: 'page_range', page_start: 0, page_end: 3 })),
    ).toEqual(['Page numbers must be positive']);
    expect(
      messages(quizRequestSchema.safeParse({ ...base, quiz_type: 'page_range', page_start: 4, page_end: 3 })),
    ).toEqual(['Page start cannot be greater than page end']);
  });

  it('bounds the number of questions', () => {
    expect(
      messages(quizRequestSchema.safeParse({ ...base, quiz_type: 'topic', topic: 't', num_questions: 21 })),
    ).toEqual(['Number of questions must be between 1 and 20']);
  });
});
