/**
 * src/services/extractor.ts
 * What: Turn an uploaded file into plain text, page by page.
 * How: detectFormat() decides PDF vs. text from the extension, falling back to the mimetype.
 *      Text is decoded as strict UTF-8; PDFs are parsed in-process with pdfjs-dist (legacy build, the one
 *      meant for Node) and each page's text items are joined, honouring end-of-line markers.
 *      Every failure is a typed error: UnsupportedFormatError for unknown types, ParseError for empty,
 *      corrupt or text-less files.
 */

import path from 'path';
import { getDocument, PDFDateString } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { ContentType } from '../models/types.js';
import { errorMessage, ParseError, UnsupportedFormatError } from '../util/errors.js';

export type SupportedFormat = 'pdf' | 'text';

export interface ExtractedPage {
  page: number | null; // 1-based for PDFs, null for text files
  text: string;
}

// From the PDF info dictionary; empty for text files.
export interface DocumentInfo {
  creator?: string;
  creation_date?: string; // ISO timestamp when parseable, raw PDF date otherwise
}

export interface ExtractedDocument {
  format: SupportedFormat;
  content_type: ContentType;
  pages: ExtractedPage[];
  page_count: number | null;
  text: string;
  info: DocumentInfo;
}

const TEXT_EXTENSIONS = new Set(['.txt', '.text', '.md', '.markdown']);
const TEXT_MIMETYPES = new Set(['text/plain', 'text/markdown']);

export function detectFormat(filename: string, mimetype?: string): SupportedFormat {
  const ext = path.extname(filename).toLowerCase();
  if (ext === '.pdf') return 'pdf';
  if (TEXT_EXTENSIONS.has(ext)) return 'text';
  // Extension wins when present; the mimetype only decides for files without a known one.
  if (!ext || ext === '.') {
    const mt = (mimetype ?? '').split(';')[0].trim().toLowerCase();
    if (mt === 'application/pdf') return 'pdf';
    if (TEXT_MIMETYPES.has(mt)) return 'text';
  }
  throw new UnsupportedFormatError(`Unsupported file type for "${filename}"; upload a PDF or plain-text file`);
}

export async function extractText(buffer: Buffer, filename: string, mimetype?: string): Promise<ExtractedDocument> {
  const format = detectFormat(filename, mimetype);
  if (buffer.length === 0) {
    throw new ParseError(`"${filename}" is empty`);
  }
  return format === 'pdf' ? extractPdf(buffer, filename) : extractPlainText(buffer, filename);
}

function extractPlainText(buffer: Buffer, filename: string): ExtractedDocument {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch (err) {
    throw new ParseError(`"${filename}" is not valid UTF-8 text`, { cause: err });
  }
  text = text.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
  if (text.trim().length === 0) {
    throw new ParseError(`"${filename}" contains no text`);
  }
  return {
    format: 'text',
    content_type: 'text/plain',
    pages: [{ page: null, text }],
    page_count: null,
    text,
    info: {},
  };
}

async function extractPdf(buffer: Buffer, filename: string): Promise<ExtractedDocument> {
  // pdfjs wants a plain Uint8Array (not a Buffer) and may detach it, so hand over a copy.
  const loadingTask = getDocument({
    data: new Uint8Array(buffer),
    isEvalSupported: false,
    disableFontFace: true,
    verbosity: 0,
  });

  const pages: ExtractedPage[] = [];
  let pageCount: number;
  let info: DocumentInfo;
  try {
    const pdf = await loadingTask.promise;
    pageCount = pdf.numPages;
    info = toDocumentInfo((await pdf.getMetadata()).info);
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const content = await page.getTextContent();
      let text = '';
      for (const item of content.items) {
        if (!('str' in item)) continue;
        text += item.str;
        if (item.hasEOL) text += '\n';
      }
      pages.push({ page: pageNum, text: text.trim() });
      page.cleanup();
    }
  } catch (err) {
    throw new ParseError(`Could not read PDF "${filename}": ${errorMessage(err)}`, { cause: err });
  } finally {
    await loadingTask.destroy();
  }

  const withText = pages.filter((p) => p.text.length > 0);
  if (withText.length === 0) {
    throw new ParseError(`"${filename}" has no extractable text (scanned PDF?)`);
  }
  return {
    format: 'pdf',
    content_type: 'application/pdf',
    pages: withText,
    page_count: pageCount,
    text: withText.map((p) => p.text).join('\n\n'),
    info,
  };
}

function infoString(info: object, key: string): string | undefined {
  const value: unknown = Object.entries(info).find(([k]) => k === key)?.[1];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function toDocumentInfo(raw: unknown): DocumentInfo {
  if (typeof raw !== 'object' || raw === null) return {};
  const info: DocumentInfo = {};
  const creator = infoString(raw, 'Creator');
  if (creator) info.creator = creator;
  const created = infoString(raw, 'CreationDate');
  if (created) info.creation_date = PDFDateString.toDateObject(created)?.toISOString() ?? created;
  return info;
}
