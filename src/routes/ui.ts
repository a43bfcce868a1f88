// src/routes/ui.ts
// What: Browser UI routes.
// How: GET / renders the page, running a search when ?q= is present and listing documents when ?show=documents.
//      The POST /ui/* handlers (upload, batch delete, clear) do their work and render the same page with notices;
//      typed failures become error notices instead of JSON errors, anything else goes to the error handler.

import { NextFunction, Request, Response, Router } from 'express';
import multer from 'multer';
import { z } from 'zod';
import logger from '../logging.js';
import { DocumentSummary, SearchMatch } from '../models/types.js';
import { Indexer } from '../services/indexer.js';
import { SearchService } from '../services/search.js';
import { deleteMany, VectorStore } from '../services/vectorStore.js';
import { formatSize, Notice, renderPage } from '../ui/render.js';
import { AppError } from '../util/errors.js';
import { createUploadMiddleware, processUploads, uploadedFiles } from './upload.js';

export const UI_DEFAULT_TOP_K = 3;
export const UI_MAX_TOP_K = 10;

const pageQuery = z.object({
  q: z.string().trim().max(2000).optional().default(''),
  k: z.coerce.number().int().min(1).max(UI_MAX_TOP_K).catch(UI_DEFAULT_TOP_K),
  show: z.string().optional(),
});

export interface UiDeps {
  store: VectorStore;
  indexer: Indexer;
  search: SearchService;
  uploadMaxBytes: number;
}

function toIds(value: unknown): string[] {
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string');
  return typeof value === 'string' ? [value] : [];
}

export function createUiRouter(deps: UiDeps): Router {
  const router = Router();
  const upload = createUploadMiddleware(deps.uploadMaxBytes);

  async function render(
    res: Response,
    opts: { notices: Notice[]; query?: string; topK?: number; showDocuments?: boolean; results?: SearchMatch[] },
  ): Promise<void> {
    const notices = [...opts.notices];
    let documents: DocumentSummary[] | undefined;
    if (opts.showDocuments) {
      try {
        documents = await deps.store.listDocuments();
      } catch (err) {
        if (!(err instanceof AppError)) throw err;
        notices.push({ kind: 'error', message: `Error loading documents: ${err.message}` });
      }
    }
    res.type('html').send(
      renderPage({
        notices,
        query: opts.query ?? '',
        topK: opts.topK ?? UI_DEFAULT_TOP_K,
        maxTopK: UI_MAX_TOP_K,
        results: opts.results,
        documents,
      }),
    );
  }

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = pageQuery.safeParse(req.query);
      const { q, k, show } = parsed.success ? parsed.data : { q: '', k: UI_DEFAULT_TOP_K, show: undefined };
      const notices: Notice[] = [];
      let results: SearchMatch[] | undefined;
      if (q) {
        try {
          results = await deps.search.search(q, k);
        } catch (err) {
          if (!(err instanceof AppError)) throw err;
          notices.push({ kind: 'error', message: `Search failed: ${err.message}` });
        }
      }
      await render(res, { notices, query: q, topK: k, showDocuments: show === 'documents', results });
    } catch (err) {
      next(err);
    }
  });

  router.post('/ui/upload', (req: Request, res: Response, next: NextFunction) => {
    upload(req, res, (uploadErr?: unknown) => {
      void (async () => {
        if (uploadErr) {
          const message =
            uploadErr instanceof multer.MulterError && uploadErr.code === 'LIMIT_FILE_SIZE'
              ? `File too large. Maximum size is ${formatSize(deps.uploadMaxBytes)}.`
              : `Upload failed: ${uploadErr instanceof Error ? uploadErr.message : String(uploadErr)}`;
          await render(res, { notices: [{ kind: 'error', message }] });
          return;
        }
        const files = uploadedFiles(req);
        if (files.length === 0) {
          await render(res, { notices: [{ kind: 'warning', message: 'Choose at least one file to upload.' }] });
          return;
        }
        const results = await processUploads(deps.indexer, files);
        const notices: Notice[] = results.map((r): Notice => {
          if (r.status === 'indexed') {
            return { kind: 'success', message: `Successfully added: ${r.filename} (${r.passages_count} passages)` };
          }
          if (r.status === 'already_exists') {
            return { kind: 'info', message: `Already in the database: ${r.filename}` };
          }
          return { kind: 'error', message: `Error processing ${r.filename}: ${r.error ?? r.status}` };
        });
        await render(res, { notices });
      })().catch(next);
    });
  });

  router.post('/ui/documents/delete', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ids = toIds(req.body?.ids);
      if (ids.length === 0) {
        await render(res, {
          notices: [{ kind: 'warning', message: 'Select at least one document to delete.' }],
          showDocuments: true,
        });
        return;
      }
      const notices: Notice[] = [];
      try {
        const result = await deleteMany(deps.store, ids);
        logger.info({ deleted: result.deleted.length, missing: result.missing.length }, 'Batch delete from UI');
        notices.push({ kind: 'success', message: `Successfully deleted ${result.deleted.length} documents!` });
        if (result.missing.length > 0) {
          notices.push({ kind: 'warning', message: `${result.missing.length} selected documents no longer exist.` });
        }
      } catch (err) {
        if (!(err instanceof AppError)) throw err;
        notices.push({ kind: 'error', message: `Error deleting documents: ${err.message}` });
      }
      await render(res, { notices, showDocuments: true });
    } catch (err) {
      next(err);
    }
  });

  router.post('/ui/documents/clear', async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (req.body?.confirm !== 'on') {
        await render(res, { notices: [{ kind: 'warning', message: 'Please confirm by checking the box first.' }] });
        return;
      }
      const notices: Notice[] = [];
      try {
        const deleted = await deps.store.clear();
        logger.warn({ deleted }, 'Database cleared from UI');
        notices.push({ kind: 'success', message: `Database cleared! (${deleted} documents removed)` });
      } catch (err) {
        if (!(err instanceof AppError)) throw err;
        notices.push({ kind: 'error', message: `Error clearing database: ${err.message}` });
      }
      await render(res, { notices });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
