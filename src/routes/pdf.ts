// src/routes/pdf.ts
// What: /pdf routes: queue ingestion and quiz jobs, chat (blocking and SSE), job introspection, document admin.
// How: Validates bodies with zod (400 { error: { message } }), checks chat documents exist, and forwards
//      everything else to the services; thrown AppErrors reach the centralized handler via next(err).

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { ZodError } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import logger from '../logging.js';
import { NotFoundError, ValidationError, errorMessage } from '../errors.js';
import { chatRequestSchema, quizRequestSchema, uploadRequestSchema } from '../models/schemas.js';
import type { DocumentStore } from '../services/documentStore.js';
import type { Retriever } from '../services/retriever.js';
import type { RagService } from '../services/rag.js';
import type { JobQueue } from '../services/jobQueue.js';
import type { Job } from '../models/types.js';

export interface PdfRouteDeps {
  store: DocumentStore;
  retriever: Retriever;
  rag: RagService;
  queue: JobQueue;
}

function badRequest(res: Response, error: ZodError): void {
  const message = error.errors.map((e) => e.message).join('; ');
  res.status(400).json({ error: { message } });
}

const iso = (d: Date | null) => (d ? d.toISOString() : null);

function jobView(job: Job) {
  return {
    job_id: job.id,
    kind: job.kind,
    status: job.status,
    created_at: iso(job.created_at),
    started_at: iso(job.started_at),
    ended_at: iso(job.ended_at),
    result: job.result,
    error: job.error,
    worker: job.worker,
  };
}

export function createPdfRouter({ store, retriever, rag, queue }: PdfRouteDeps): Router {
  const router = Router();

  async function ensureDocumentsExist(ids: string[]): Promise<void> {
    for (const id of ids) {
      try {
        await store.describe(id);
      } catch (err) {
        if (err instanceof NotFoundError) throw new NotFoundError(`PDF with ID ${id} not found`);
        throw err;
      }
    }
  }

  router.post('/upload', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = uploadRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        badRequest(res, parsed.error);
        return;
      }
      const { source_url, upload_id, pdf_name } = parsed.data;
      const pdfId = uuidv4();
      const job = await queue.enqueue({
        kind: 'ingest',
        payload: { source_url, upload_id, pdf_id: pdfId, pdf_name: pdf_name ?? null },
      });
      res.status(202).json({
        job_id: job.id,
        pdf_id: pdfId,
        upload_id,
        status: job.status,
        message: 'PDF upload queued for processing',
      });
    } catch (err) {
      next(err);
    }
  });

  router.post('/chat', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = chatRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        badRequest(res, parsed.error);
        return;
      }
      const { pdf_ids, message, conversation_history } = parsed.data;
      await ensureDocumentsExist(pdf_ids);
      const answer = await rag.chat(pdf_ids, message, conversation_history);
      res.json(answer);
    } catch (err) {
      next(err);
    }
  });

  router.post('/chat/stream', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = chatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    const { pdf_ids, message, conversation_history } = parsed.data;
    try {
      await ensureDocumentsExist(pdf_ids);
    } catch (err) {
      next(err);
      return;
    }

    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    // The request has already emitted 'close' once the body was read; the response closes with the socket.
    let closed = false;
    res.on('close', () => {
      closed = true;
    });
    const gone = () => closed || res.destroyed || res.writableEnded;

    try {
      // Leaving the loop returns the generator, which closes the upstream completion stream.
      for await (const event of rag.chatStream(pdf_ids, message, conversation_history)) {
        if (gone()) {
          logger.info({ pdf_ids }, 'Client disconnected; stopping chat stream');
          break;
        }
        res.write(`data: ${JSON.stringify(event)}\n\n`);
      }
    } catch (err) {
      logger.error({ err }, 'Streaming chat failed');
      if (!gone()) {
        res.write(`data: ${JSON.stringify({ type: 'error', data: `Streaming error: ${errorMessage(err)}` })}\n\n`);
      }
    } finally {
      res.end();
    }
  });

  router.post('/generate-quiz', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = quizRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        badRequest(res, parsed.error);
        return;
      }
      const body = parsed.data;

      if (body.quiz_type === 'page_range' && body.page_start !== undefined && body.page_end !== undefined) {
        try {
          const info = await store.describe(body.pdf_ids[0]);
          if (typeof info.total_pages === 'number' && info.total_pages > 0 && body.page_end > info.total_pages) {
            throw new ValidationError(
              `Page range ${body.page_start}-${body.page_end} exceeds PDF length (${info.total_pages} pages)`,
            );
          }
        } catch (err) {
          // an unknown document is reported by the job itself
          if (!(err instanceof NotFoundError)) throw err;
        }
      }

      const quizId = uuidv4();
      const job = await queue.enqueue({
        kind: 'generate-quiz',
        payload: {
          quiz_type: body.quiz_type,
          pdf_ids: body.pdf_ids,
          topic: body.topic ?? null,
          page_start: body.page_start ?? null,
          page_end: body.page_end ?? null,
          num_questions: body.num_questions,
          difficulty: body.difficulty,
          exam_id: body.exam_id,
          quiz_id: quizId,
        },
      });
      res.status(202).json({
        job_id: job.id,
        quiz_id: quizId,
        exam_id: body.exam_id,
        status: job.status,
        message: 'Quiz generation queued for processing',
      });
    } catch (err) {
      next(err);
    }
  });

  router.get('/job/:id/status', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = await queue.status(req.params.id);
      res.json(jobView(job));
    } catch (err) {
      next(err);
    }
  });

  router.delete('/job/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = req.params.id;
      const canceled = await queue.cancel(id);
      res.json({
        job_id: id,
        canceled,
        message: canceled
          ? `Job ${id} cancelled successfully`
          : `Job ${id} could not be cancelled (may already be started or completed)`,
      });
    } catch (err) {
      next(err);
    }
  });

  router.get('/queue/info', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await queue.info());
    } catch (err) {
      next(err);
    }
  });

  router.get('/list', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const pdfs = await store.listAll();
      res.json({ pdfs, total: pdfs.length });
    } catch (err) {
      next(err);
    }
  });

  router.get('/health', async (_req: Request, res: Response) => {
    try {
      await store.listAll();
      res.json({
        status: 'healthy',
        services: { document_store: 'operational', job_queue: 'operational' },
      });
    } catch (err) {
      logger.error({ err }, 'Health check failed');
      res.status(503).json({ error: { message: `Service unhealthy: ${errorMessage(err)}`, code: 'UNHEALTHY' } });
    }
  });

  router.get('/:id/info', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await store.describe(req.params.id));
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id/debug-pages', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = req.params.id;
      const info = await store.describe(id);
      const distribution = await retriever.pageDistribution(id);
      res.json({ pdf_info: info, ...distribution });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = req.params.id;
      const deleted = await store.delete(id);
      if (!deleted) throw new NotFoundError(`PDF ${id} not found`);
      res.json({ message: `PDF ${id} deleted successfully` });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
