// src/routes/search.ts
// What: /search route for semantic search over passages.
// How: Validates input with zod and delegates to SearchService, which embeds the query and ranks passages.
//      topK falls back to the service default (SEARCH_DEFAULT_TOP_K).

import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { SearchService } from '../services/search.js';

const schema = z.object({
  // Cap query length to avoid oversized embedding requests
  query: z.string().trim().min(1).max(2000),
  topK: z.number().int().positive().max(100).optional(),
});

export function createSearchRouter(search: SearchService): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message, code: 'VALIDATION_ERROR' } });
        return;
      }
      const { query: q } = parsed.data;
      const topK = parsed.data.topK ?? search.defaultTopK;
      const matches = await search.search(q, topK);
      res.json({ query: q, topK, matches });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
