// src/services/generator.ts
// What: Prompt construction, quiz output parsing and LLM calls for chat and quiz generation.
// How: Builds plain-text prompts, calls the chat or quiz CompletionService, and turns quiz output into
//      questions in three stages: strict JSON (zod), a line scanner, then a single placeholder question.

import type { ZodError } from 'zod';
import logger from '../logging.js';
import { errorMessage } from '../errors.js';
import { quizQuestionSchema, quizResponseSchema } from '../models/schemas.js';
import type { CompletionService } from './completions.js';
import type { ChatEvent, ChatTurn, Difficulty, QuizQuestion, QuizType } from '../models/types.js';

const HISTORY_TURNS = 5;

export const PLACEHOLDER_QUESTION: QuizQuestion = {
  question: 'What is the main topic discussed in the provided content?',
  options: ['A) Topic A', 'B) Topic B', 'C) Topic C', 'D) Topic D'],
  correct_answer: 'A) Topic A',
  explanation: 'This is a fallback question due to parsing issues.',
};

// --- prompts ---

const capitalize = (s: string) => (s ? s.charAt(0).toUpperCase() + s.slice(1).toLowerCase() : s);

export function renderHistory(history: ChatTurn[]): string {
  return history
    .slice(-HISTORY_TURNS)
    .map((t) => `${capitalize(t.role || 'user')}: ${t.content}\n`)
    .join('');
}

export interface ChatPromptInput {
  context: string;
  question: string;
  history: ChatTurn[];
  documentCount: number;
}

export function buildChatPrompt({ context, question, history, documentCount }: ChatPromptInput): string {
  const single = documentCount <= 1;
  const grounding = single ? 'the provided PDF content' : `the provided content from ${documentCount} PDF documents`;
  const source = single ? 'the PDF content' : 'the PDF documents';

  return `
You are a helpful AI assistant that answers questions based on ${grounding}.
Be informative and accurate, and stay grounded in the provided context.

Conversation History:
${renderHistory(history)}
Relevant Content from PDF Documents:
${context}

User Question: ${question}

Instructions:
1. Answer the question based primarily on ${source} provided
2. If the answer is not fully contained in ${source}, say which information is missing
3. Be specific and cite relevant parts of the content when possible
4. If you cannot answer the question based on ${source}, say so clearly
5. Keep the response focused on the question
6. When drawing from multiple documents, combine the information coherently

Answer:`;
}

export function difficultyGuidance(difficulty: Difficulty, multiDocument = false): string {
  switch (difficulty) {
    case 'easy':
      return 'Make questions straightforward and factual';
    case 'medium':
      return multiDocument
        ? 'Include some comparative and analytical questions'
        : 'Include some analytical and application-based questions';
    case 'hard':
      return multiDocument
        ? 'Focus on synthesis and complex analysis across sources'
        : 'Focus on complex analysis and synthesis';
  }
}

const jsonShape = (explanation: string) => `{
    "questions": [
        {
            "question": "Question text here?",
            "options": ["A) Option 1", "B) Option 2", "C) Option 3", "D) Option 4"],
            "correct_answer": "A) Option 1",
            "explanation": "${explanation}"
        }
    ]
}`;

const SHARED_RULES = [
  'If the content allows mathematical questions, prefer including them',
  'Questions must be answerable from the provided content, not from outside knowledge',
  'Analytical questions may go beyond the literal text as long as the content is enough to answer them',
  'Theoretical questions must come directly from the provided content',
  'Questions and answers must not rely on any graphical illustration',
  'Provide clear explanations for correct answers; an explanation should be enough to understand the concept behind the question',
];

const OUTPUT_RULES = [
  'DO NOT include any text outside the JSON structure',
  'DO NOT include any comments or explanations in the response',
  'The response must be parseable JSON',
];

const numbered = (rules: string[]) => rules.map((r, i) => `${i + 1}. ${r}`).join('\n');

export function buildTopicQuizPrompt(context: string, topic: string, numQuestions: number, difficulty: Difficulty): string {
  const rules = [
    'Each question should have exactly 4 options (A, B, C, D)',
    'Questions should test understanding of the content, not just memorization',
    `For ${difficulty} difficulty: ${difficultyGuidance(difficulty)}`,
    ...SHARED_RULES,
    'Ensure all information needed to answer is in the provided content',
    ...OUTPUT_RULES,
  ];
  return `
Create a ${difficulty} level quiz with ${numQuestions} multiple choice questions about "${topic}" based on the following content. Multiple topics are colon separated; cover every topic when there are several. You must return the response in the given JSON format.

Content:
${context}

Requirements:
${numbered(rules)}

Return the response in this exact JSON format:
${jsonShape('Brief explanation of why this is correct and why others are wrong')}

Generate ${numQuestions} questions following this format exactly. Do not add any text outside the JSON.
`;
}

export function buildPageRangeQuizPrompt(
  context: string,
  pageStart: number,
  pageEnd: number,
  numQuestions: number,
  difficulty: Difficulty,
): string {
  const rules = [
    'Each question should have exactly 4 options (A, B, C, D)',
    'Questions should focus specifically on content from the specified page range',
    `For ${difficulty} difficulty: ${difficultyGuidance(difficulty)}`,
    ...SHARED_RULES,
    'Reference the page range when relevant',
    ...OUTPUT_RULES,
  ];
  return `
Create a ${difficulty} level quiz with ${numQuestions} multiple choice questions based on content from pages ${pageStart} to ${pageEnd}. You must return the response in the given JSON format.

Content:
${context}

Requirements:
${numbered(rules)}

Return the response in this exact JSON format:
${jsonShape(`Brief explanation of why this is correct (from pages ${pageStart}-${pageEnd})`)}

Generate ${numQuestions} questions following this format exactly. Do not add any text outside the JSON.
`;
}

export function buildMultiDocumentQuizPrompt(
  context: string,
  topic: string,
  numQuestions: number,
  difficulty: Difficulty,
): string {
  const rules = [
    'Each question should have exactly 4 options (A, B, C, D)',
    'Questions should combine information across the different sources',
    `For ${difficulty} difficulty: ${difficultyGuidance(difficulty, true)}`,
    ...SHARED_RULES,
    'Ensure all information needed to answer is in the provided content',
    'When possible, note if information comes from multiple sources',
    ...OUTPUT_RULES,
  ];
  return `
Create a ${difficulty} level quiz with ${numQuestions} multiple choice questions about "${topic}" based on content from multiple PDF documents. Multiple topics are colon separated; cover every topic when there are several. You must return the response in the given JSON format.

Content from multiple sources:
${context}

Requirements:
${numbered(rules)}

Return the response in this exact JSON format:
${jsonShape('Brief explanation of why this is correct, drawing from the multiple sources')}

Generate ${numQuestions} questions following this format exactly. Do not add any text outside the JSON and do not include unrelated topics.
`;
}

// --- quiz parsing ---

export type DecodeResult = { ok: true; questions: QuizQuestion[] } | { ok: false; reason: string };

function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

const issuesText = (error: ZodError) => error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');

/** Keeps every well-formed question; fails only when none survive. */
export function decodeQuizJson(text: string): DecodeResult {
  const body = stripCodeFence(text);
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (err) {
    return { ok: false, reason: `invalid JSON: ${errorMessage(err)}` };
  }
  const parsed = quizResponseSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: issuesText(parsed.error) };
  }

  const questions: QuizQuestion[] = [];
  const rejected: string[] = [];
  parsed.data.questions.forEach((entry, i) => {
    const q = quizQuestionSchema.safeParse(entry);
    if (q.success) questions.push(q.data);
    else rejected.push(`questions.${i}: ${issuesText(q.error)}`);
  });
  if (questions.length === 0) {
    return { ok: false, reason: rejected.length > 0 ? rejected.join('; ') : 'no questions' };
  }
  if (rejected.length > 0) {
    logger.warn({ kept: questions.length, rejected }, 'Dropped malformed quiz questions');
  }
  return { ok: true, questions };
}

const OPTION_PREFIXES = ['A)', 'B)', 'C)', 'D)'];
const ANSWER_PREFIXES = ['correct:', 'answer:', 'correct answer:'];
const EXPLANATION_PREFIXES = ['explanation:', 'because:'];

const afterColon = (line: string) => line.slice(line.indexOf(':') + 1).trim();

/** Line-oriented recovery for free-text quiz output. */
export function scanQuizLines(text: string): QuizQuestion[] {
  const out: QuizQuestion[] = [];
  let question: string | null = null;
  let options: string[] = [];
  let answer: string | null = null;
  let explanation: string | null = null;

  const flush = () => {
    if (question && options.length > 0 && answer) {
      out.push({
        question,
        options,
        correct_answer: answer,
        explanation: explanation || 'No explanation provided',
      });
    }
  };

  for (const rawLine of text.trim().split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;
    const lower = line.toLowerCase();
    const isOption = OPTION_PREFIXES.some((p) => line.startsWith(p));

    if (line.endsWith('?') && !isOption) {
      flush();
      question = line;
      options = [];
      answer = null;
      explanation = null;
    } else if (isOption) {
      options.push(line);
    } else if (ANSWER_PREFIXES.some((p) => lower.startsWith(p))) {
      answer = afterColon(line);
    } else if (EXPLANATION_PREFIXES.some((p) => lower.startsWith(p))) {
      explanation = afterColon(line);
    }
  }
  flush();
  return out;
}

export function parseQuizResponse(text: string, numQuestions: number): QuizQuestion[] {
  const decoded = decodeQuizJson(text);
  if (decoded.ok) return decoded.questions.slice(0, numQuestions);

  logger.warn({ reason: decoded.reason }, 'Quiz output is not valid JSON; trying line scanner');
  const scanned = scanQuizLines(text);
  if (scanned.length > 0) return scanned.slice(0, numQuestions);

  logger.warn('Line scanner found no questions; returning placeholder question');
  return [{ ...PLACEHOLDER_QUESTION, options: [...PLACEHOLDER_QUESTION.options] }];
}

// --- generator ---

export interface QuizParams {
  quiz_type: QuizType;
  topic?: string | null;
  page_start?: number | null;
  page_end?: number | null;
  num_questions: number;
  difficulty: Difficulty;
}

export function buildQuizPrompt(context: string, params: QuizParams): string {
  const { num_questions: n, difficulty } = params;
  switch (params.quiz_type) {
    case 'topic':
      return buildTopicQuizPrompt(context, params.topic ?? '', n, difficulty);
    case 'multi_pdf_topic':
      return buildMultiDocumentQuizPrompt(context, params.topic ?? '', n, difficulty);
    case 'page_range':
      return buildPageRangeQuizPrompt(context, params.page_start ?? 1, params.page_end ?? 1, n, difficulty);
  }
}

export class Generator {
  constructor(
    private readonly chatLlm: CompletionService,
    private readonly quizLlm: CompletionService,
  ) {}

  async generateQuiz(context: string, params: QuizParams): Promise<QuizQuestion[]> {
    const raw = await this.quizLlm.complete(buildQuizPrompt(context, params));
    const questions = parseQuizResponse(raw, params.num_questions);
    logger.info({ quiz_type: params.quiz_type, questions: questions.length }, 'Quiz generated');
    return questions;
  }

  chat(input: ChatPromptInput): Promise<string> {
    return this.chatLlm.complete(buildChatPrompt(input));
  }

  /** Emits sources, then content deltas, then done; a failing model call ends the stream with an error event. */
  async *chatStream(input: ChatPromptInput, sources: string[]): AsyncGenerator<ChatEvent> {
    yield { type: 'sources', data: sources };
    yield { type: 'status', data: 'Generating response...' };
    try {
      for await (const delta of this.chatLlm.completeStream(buildChatPrompt(input))) {
        yield { type: 'content', data: delta };
      }
    } catch (err) {
      logger.error({ err }, 'Streaming chat failed');
      yield { type: 'error', data: `I'm sorry, I encountered an error while processing your question: ${errorMessage(err)}` };
      return;
    }
    yield { type: 'done', data: 'Response completed' };
  }
}
