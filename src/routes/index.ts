// src/routes/index.ts
// What: Root router composition.
// How: Exposes /health and mounts the /pdf router built from the shared services.

import { Router, type Request, type Response } from 'express';
import { createPdfRouter, type PdfRouteDeps } from './pdf.js';

export function createRouter(deps: PdfRouteDeps): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  router.use('/pdf', createPdfRouter(deps));

  return router;
}
