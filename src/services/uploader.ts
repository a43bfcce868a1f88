// src/services/uploader.ts
// What: Handles uploaded files - sanitizes the name, computes the hash, runs the indexer, reports a status.
// How: Computes SHA256 for duplicate detection and sanitizes the filename, then delegates to Indexer.
//      Typed pipeline errors become per-file statuses so one bad file does not fail a multi-file upload;
//      anything untyped propagates to the centralized error handler.

import { createHash } from 'crypto';
import path from 'path';
import logger from '../logging.js';
import {
  AppError,
  EmbeddingServiceError,
  ParseError,
  StorageError,
  UnsupportedFormatError,
} from '../util/errors.js';
import { Indexer } from './indexer.js';

/**
 * Compute SHA256 hash of a buffer.
 */
export function computeFileHash(buffer: Buffer): string {
  return createHash('sha256').update(buffer).digest('hex');
}

/**
 * Sanitize filename to prevent path traversal and ensure valid characters.
 * - Removes path components (/, \)
 * - Limits length to 200 characters
 * - Replaces problematic characters
 */
export function sanitizeFilename(name: string): string {
  // Remove any path components, including Windows-style ones
  let sanitized = path.basename(name.replace(/\\/g, '/'));

  // Replace problematic characters
  sanitized = sanitized.replace(/[<>:"|?*\x00-\x1f]/g, '_');

  // Limit length (preserve extension)
  const ext = path.extname(sanitized);
  const base = path.basename(sanitized, ext);
  const maxBaseLen = 200 - ext.length;

  if (base.length > maxBaseLen) {
    sanitized = base.substring(0, maxBaseLen) + ext;
  }

  return sanitized || 'upload';
}

export type UploadStatus =
  | 'indexed'
  | 'already_exists'
  | 'unsupported_format'
  | 'failed_parse'
  | 'failed_embed'
  | 'failed_insert';

export interface UploadResult {
  success: boolean;
  document_id?: string;
  filename: string;
  passages_count?: number;
  status: UploadStatus;
  error?: string;
}

function failureStatus(err: AppError): UploadStatus | undefined {
  if (err instanceof UnsupportedFormatError) return 'unsupported_format';
  if (err instanceof ParseError) return 'failed_parse';
  if (err instanceof EmbeddingServiceError) return 'failed_embed';
  if (err instanceof StorageError) return 'failed_insert';
  return undefined;
}

/**
 * Handle an uploaded file:
 * 1. Sanitize the name and hash the bytes
 * 2. Run the indexing pipeline
 * 3. Map typed failures to a per-file status
 */
export async function handleUpload(
  indexer: Indexer,
  buffer: Buffer,
  originalFilename: string,
  mimetype?: string,
): Promise<UploadResult> {
  const filename = sanitizeFilename(originalFilename);
  const fileHash = computeFileHash(buffer);

  logger.info({ filename, hash: fileHash, size: buffer.length }, 'Processing upload');

  try {
    const outcome = await indexer.indexDocument({ buffer, filename, sha256: fileHash, mimetype });
    return {
      success: true,
      document_id: outcome.document.id,
      filename,
      passages_count: outcome.passages_count,
      status: outcome.status,
    };
  } catch (err) {
    if (!(err instanceof AppError)) throw err;
    const status = failureStatus(err);
    if (!status) throw err;
    logger.warn({ err, filename, status }, 'Upload failed');
    return { success: false, filename, status, error: err.message };
  }
}
