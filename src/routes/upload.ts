// src/routes/upload.ts
// What: HTTP endpoint for file uploads.
// How: Uses multer (memory storage) for multipart/form-data, field "files", up to MAX_FILES per request.
//      Each file goes through the upload service on its own; the response lists one result per file.
//      200 when every file was indexed or already present, 422 when any failed. Multer limit errors reach
//      the centralized error handler.

import { NextFunction, Request, Response, Router } from 'express';
import multer from 'multer';
import logger from '../logging.js';
import { Indexer } from '../services/indexer.js';
import { handleUpload, UploadResult } from '../services/uploader.js';

export const MAX_FILES = 10;

export function createUploadMiddleware(maxBytes: number) {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxBytes,
      files: MAX_FILES,
    },
  }).array('files', MAX_FILES);
}

/** Multer hands over the multipart filename as latin1; browsers send UTF-8. */
export function decodeOriginalName(name: string): string {
  return Buffer.from(name, 'latin1').toString('utf8');
}

export function uploadedFiles(req: Request): Express.Multer.File[] {
  return Array.isArray(req.files) ? req.files : [];
}

export async function processUploads(indexer: Indexer, files: Express.Multer.File[]): Promise<UploadResult[]> {
  const results: UploadResult[] = [];
  for (const file of files) {
    results.push(await handleUpload(indexer, file.buffer, decodeOriginalName(file.originalname), file.mimetype));
  }
  return results;
}

export function createUploadRouter(indexer: Indexer, maxBytes: number): Router {
  const router = Router();

  router.post('/', createUploadMiddleware(maxBytes), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const files = uploadedFiles(req);
      if (files.length === 0) {
        res.status(400).json({ error: { message: 'No file provided', code: 'VALIDATION_ERROR' } });
        return;
      }

      logger.info({ files: files.map((f) => ({ name: f.originalname, size: f.size })) }, 'Upload request received');

      const results = await processUploads(indexer, files);
      // 422 for processing failures (files were received but could not be indexed)
      res.status(results.every((r) => r.success) ? 200 : 422).json({ results });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
