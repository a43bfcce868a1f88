// src/app.ts
// What: Express application factory.
// How: Wires JSON and form body parsers, mounts the routes for the given store/indexer/search service and ends
//      with the centralized error handler returning { error: { message, code? } }. Kept free of env and
//      network setup so tests can build an app around in-memory components.

import express, { Express, NextFunction, Request, Response } from 'express';
import multer from 'multer';
import logger from './logging.js';
import { createRouter, RouterDeps } from './routes/index.js';
import { AppError } from './util/errors.js';

interface HttpErrorLike {
  status: number;
  message: string;
}

// body-parser and friends throw errors carrying an HTTP status
function isHttpError(err: unknown): err is HttpErrorLike {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

export function createApp(deps: RouterDeps): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false, limit: '1mb' }));

  app.use('/', createRouter(deps));

  // Centralized error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    let status = 500;
    let code: string | undefined;
    let message = 'Internal Server Error';

    if (err instanceof AppError) {
      status = err.status;
      code = err.code;
      message = err.message;
    } else if (err instanceof multer.MulterError) {
      status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      code = 'VALIDATION_ERROR';
      message = err.message;
    } else if (isHttpError(err)) {
      status = err.status;
      code = 'VALIDATION_ERROR';
      message = err.message;
    }

    if (status >= 500) {
      logger.error({ err, status, code }, 'Unhandled error');
    } else {
      logger.warn({ err, status, code }, 'Request failed');
    }
    res.status(status).json({ error: { message, code } });
  });

  return app;
}
