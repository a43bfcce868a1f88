/**
 * src/routes/documents.ts
 * What: /documents routes to list, inspect and delete indexed documents.
 * How:
 *  - GET /documents: summaries with passage counts, newest first.
 *  - GET /documents/:id: the document with its passages in order; 404 when unknown.
 *  - DELETE /documents/:id: removes the document and its passages; 204, or 404 when unknown.
 *  - POST /documents/delete { ids }: batch delete reporting deleted and missing ids.
 *  - POST /documents/clear { confirm: true }: removes everything; refuses without the confirmation flag.
 */
import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { deleteMany, VectorStore } from '../services/vectorStore.js';
import logger from '../logging.js';

const batchSchema = z.object({
  ids: z.array(z.string().min(1)).min(1).max(500),
});

const clearSchema = z.object({
  confirm: z.literal(true),
});

export function createDocumentsRouter(store: VectorStore): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const items = await store.listDocuments();
      res.json({ items, total: items.length });
    } catch (err) {
      next(err);
    }
  });

  router.post('/delete', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = batchSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message, code: 'VALIDATION_ERROR' } });
        return;
      }
      const result = await deleteMany(store, parsed.data.ids);
      logger.info({ deleted: result.deleted.length, missing: result.missing.length }, 'Batch delete');
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  router.post('/clear', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = clearSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({
          error: { message: 'Clearing the database requires { "confirm": true }', code: 'VALIDATION_ERROR' },
        });
        return;
      }
      const deleted = await store.clear();
      logger.warn({ deleted }, 'Database cleared');
      res.json({ deleted });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await store.getDocument(String(req.params.id)));
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = String(req.params.id);
      await store.deleteDocument(id);
      logger.info({ document_id: id }, 'Document deleted');
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
