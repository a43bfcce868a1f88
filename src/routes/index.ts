// src/routes/index.ts
// What: Root router composition.
// How: Exposes /health, mounts the JSON API (/documents, /search, /upload) and the browser UI (/ and /ui/*).

import { Request, Response, Router } from 'express';
import { Indexer } from '../services/indexer.js';
import { SearchService } from '../services/search.js';
import { VectorStore } from '../services/vectorStore.js';
import { createDocumentsRouter } from './documents.js';
import { createSearchRouter } from './search.js';
import { createUiRouter } from './ui.js';
import { createUploadRouter } from './upload.js';

export interface RouterDeps {
  store: VectorStore;
  indexer: Indexer;
  search: SearchService;
  uploadMaxBytes: number;
}

export function createRouter(deps: RouterDeps): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  router.use('/documents', createDocumentsRouter(deps.store));
  router.use('/search', createSearchRouter(deps.search));
  router.use('/upload', createUploadRouter(deps.indexer, deps.uploadMaxBytes));
  router.use('/', createUiRouter(deps));

  return router;
}
