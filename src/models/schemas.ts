// src/models/schemas.ts
// What: zod schemas for request bodies, stored job payloads and model output.
// How: Routes safeParse request bodies; the pg repositories parse JSONB payloads back into typed jobs;
//      the generator decodes quiz JSON with quizResponseSchema.

import { z } from 'zod';

export const difficultySchema = z.enum(['easy', 'medium', 'hard']);
export const quizTypeSchema = z.enum(['topic', 'page_range', 'multi_pdf_topic']);

export const uploadRequestSchema = z.object({
  source_url: z.string().url(),
  upload_id: z.number().int().positive(),
  pdf_name: z.string().min(1).max(500).optional(),
});

const turnSchema = z.object({
  role: z.string().default('user'),
  content: z.string().default(''),
});

export const chatRequestSchema = z.object({
  pdf_ids: z.array(z.string().min(1)).min(1, 'At least one PDF ID is required'),
  message: z.string().refine((m) => m.trim().length > 0, 'Message cannot be empty'),
  conversation_history: z.array(turnSchema).optional().default([]),
});

export const quizRequestSchema = z
  .object({
    quiz_type: quizTypeSchema,
    pdf_ids: z.array(z.string().min(1)).min(1, 'At least one PDF ID is required'),
    topic: z.string().trim().min(1).optional(),
    page_start: z.number().int().optional(),
    page_end: z.number().int().optional(),
    num_questions: z
      .number()
      .int()
      .min(1, 'Number of questions must be between 1 and 20')
      .max(20, 'Number of questions must be between 1 and 20')
      .default(5),
    difficulty: difficultySchema.default('medium'),
    exam_id: z.number().int().positive({ message: 'exam_id is required for queued quiz generation' }),
  })
  .superRefine((req, ctx) => {
    if (req.quiz_type !== 'page_range' && !req.topic) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['topic'], message: 'Topic is required for topic-based quizzes' });
    }
    if (req.quiz_type === 'page_range') {
      if (req.page_start === undefined || req.page_end === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['page_start'],
          message: 'Page start and end are required for page range quiz',
        });
      } else if (req.page_start < 1) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['page_start'], message: 'Page numbers must be positive' });
      } else if (req.page_start > req.page_end) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['page_start'],
          message: 'Page start cannot be greater than page end',
        });
      }
    }
  });

export type UploadRequest = z.infer<typeof uploadRequestSchema>;
export type ChatRequest = z.infer<typeof chatRequestSchema>;
export type QuizRequest = z.infer<typeof quizRequestSchema>;

// --- stored job payloads ---

export const ingestPayloadSchema = z.object({
  source_url: z.string(),
  upload_id: z.number().int(),
  pdf_id: z.string(),
  pdf_name: z.string().nullish(),
});

export const quizPayloadSchema = z.object({
  quiz_type: quizTypeSchema,
  pdf_ids: z.array(z.string()).min(1),
  topic: z.string().nullish(),
  page_start: z.number().int().nullish(),
  page_end: z.number().int().nullish(),
  num_questions: z.number().int(),
  difficulty: difficultySchema,
  exam_id: z.number().int(),
  quiz_id: z.string(),
});

export const jobRequestSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ingest'), payload: ingestPayloadSchema }),
  z.object({ kind: z.literal('generate-quiz'), payload: quizPayloadSchema }),
]);

// --- model output ---

export const quizQuestionSchema = z.object({
  question: z.string().min(1),
  options: z.array(z.string()).length(4),
  correct_answer: z.string().min(1),
  explanation: z
    .string()
    .nullish()
    .transform((v) => v ?? undefined),
});

/** Questions are checked one by one against quizQuestionSchema so one malformed entry does not sink the rest. */
export const quizResponseSchema = z.object({
  questions: z.array(z.unknown()),
});
