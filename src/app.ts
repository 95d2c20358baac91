// src/app.ts
// What: Express application factory shared by the server entrypoint and the HTTP tests.
// How: JSON body limit, the root router and a centralized error handler returning { error: { message, code? } }.

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import logger from './logging.js';
import { createRouter } from './routes/index.js';
import { AppError } from './errors.js';
import type { PdfRouteDeps } from './routes/pdf.js';

function errorStatus(err: unknown): number {
  if (err instanceof AppError) return err.status;
  // body-parser errors carry their own 4xx status
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') return err.status;
  return 500;
}

export function createApp(deps: PdfRouteDeps): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));

  app.use('/', createRouter(deps));

  // Centralized error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    const code = err instanceof AppError ? err.code : undefined;
    const message = err instanceof Error ? err.message : 'Internal Server Error';
    if (status >= 500) {
      logger.error({ err, status, code }, 'Unhandled error');
    } else {
      logger.warn({ status, code, message }, 'Request failed');
    }
    res.status(status).json({ error: { message, code } });
  });

  return app;
}
