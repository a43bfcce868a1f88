import { describe, expect, it, vi } from 'vitest';
import { buildPdf } from '../test-utils/pdf.js';
import { createTestStack } from '../test-utils/stack.js';
import { ParseError, StorageError, UnsupportedFormatError } from '../util/errors.js';
import { MemoryVectorStore } from './memoryVectorStore.js';
import { computeFileHash } from './uploader.js';

describe('Indexer', () => {
  it('indexes a PDF page by page', async () => {
    const { indexer, store } = createTestStack();
    const buffer = buildPdf(['Photosynthesis turns light into sugar.', 'Mitochondria release energy.']);

    const outcome = await indexer.indexDocument({ buffer, filename: 'bio.pdf', sha256: computeFileHash(buffer) });

    expect(outcome.status).toBe('indexed');
    expect(outcome.passages_count).toBe(2);
    expect(outcome.document).toMatchObject({ filename: 'bio.pdf', content_type: 'application/pdf', page_count: 2 });
    const detail = await store.getDocument(outcome.document.id);
    expect(detail.passages.map((p) => [p.ordinal, p.metadata])).toEqual([
      [0, { source: 'bio.pdf', page: 1 }],
      [1, { source: 'bio.pdf', page: 2 }],
    ]);
    expect(detail.document.content).toBe('Photosynthesis turns light into sugar.\n\nMitochondria release energy.');
  });

  it('keeps PDF info in passage metadata', async () => {
    const { indexer, store } = createTestStack();
    const buffer = buildPdf(['Tides follow the moon.'], { creator: 'Writer', creationDate: 'D:20240501120000Z' });

    const outcome = await indexer.indexDocument({ buffer, filename: 'tides.pdf', sha256: computeFileHash(buffer) });

    const detail = await store.getDocument(outcome.document.id);
    expect(detail.passages[0].metadata).toEqual({
      source: 'tides.pdf',
      page: 1,
      creator: 'Writer',
      creation_date: '2024-05-01T12:00:00.000Z',
    });
  });

  it('checks for duplicates before parsing', async () => {
    const { indexer, upload, embedder } = createTestStack();
    const first = await upload('a.txt', 'Original text.');
    const embed = vi.spyOn(embedder, 'embed');

    const outcome = await indexer.indexDocument({
      buffer: Buffer.from('Original text.'),
      filename: 'renamed.txt',
      sha256: computeFileHash(Buffer.from('Original text.')),
    });

    expect(outcome.status).toBe('already_exists');
    expect(outcome.document.id).toBe(first.document_id);
    expect(outcome.document.filename).toBe('a.txt');
    expect(embed).not.toHaveBeenCalled();
  });

  it('reports a lost insert race as already_exists', async () => {
    const { indexer, store, upload } = createTestStack();
    const winner = await upload('first.txt', 'Raced text.');
    // The hash check misses, as it would when both uploads checked before either inserted.
    vi.spyOn(store, 'findByHash').mockResolvedValueOnce(null);
    const buffer = Buffer.from('Raced text.');

    const outcome = await indexer.indexDocument({ buffer, filename: 'second.txt', sha256: computeFileHash(buffer) });

    expect(outcome).toMatchObject({ status: 'already_exists', passages_count: 0 });
    expect(outcome.document.id).toBe(winner.document_id);
    expect(await store.listDocuments()).toHaveLength(1);
  });

  it('still fails storage errors that are not duplicates', async () => {
    const { indexer } = createTestStack({ store: new MemoryVectorStore(3) });
    const buffer = Buffer.from('Some text.');
    await expect(
      indexer.indexDocument({ buffer, filename: 'a.txt', sha256: computeFileHash(buffer) }),
    ).rejects.toThrow(new StorageError('Vector has 384 dimensions; the store expects 3'));
  });

  it('rejects unsupported files before touching the store', async () => {
    const { indexer, store } = createTestStack();
    const findByHash = vi.spyOn(store, 'findByHash');
    await expect(
      indexer.indexDocument({ buffer: Buffer.from('x'), filename: 'a.docx', sha256: 'h' }),
    ).rejects.toBeInstanceOf(UnsupportedFormatError);
    expect(findByHash).not.toHaveBeenCalled();
  });

  it('persists nothing when parsing fails', async () => {
    const { indexer, store } = createTestStack();
    await expect(
      indexer.indexDocument({ buffer: Buffer.from('not a pdf'), filename: 'a.pdf', sha256: 'h' }),
    ).rejects.toBeInstanceOf(ParseError);
    expect(await store.listDocuments()).toEqual([]);
  });

  it('splits long text into several passages', async () => {
    const { indexer, store } = createTestStack({ chunkSize: 100, chunkOverlap: 20 });
    const text = Array.from({ length: 12 }, (_, i) => `Line ${i} of the report.`).join('\n');
    const buffer = Buffer.from(text);

    const outcome = await indexer.indexDocument({ buffer, filename: 'r.txt', sha256: computeFileHash(buffer) });

    const detail = await store.getDocument(outcome.document.id);
    expect(outcome.passages_count).toBe(detail.passages.length);
    expect(detail.passages.length).toBeGreaterThan(1);
    expect(detail.passages.every((p) => p.content.length <= 100)).toBe(true);
  });
});
