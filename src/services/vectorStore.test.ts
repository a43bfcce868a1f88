import { describe, expect, it, vi } from 'vitest';
import { StorageError } from '../util/errors.js';
import { MemoryVectorStore } from './memoryVectorStore.js';
import { openStore } from './vectorStore.js';

describe('openStore', () => {
  it('returns the store once its schema checks out', async () => {
    const store = new MemoryVectorStore(4);
    const close = vi.spyOn(store, 'close');
    expect(await openStore(store)).toBe(store);
    expect(close).not.toHaveBeenCalled();
  });

  it('closes the store when the schema check fails', async () => {
    const store = new MemoryVectorStore(4);
    const failure = new StorageError('passages.embedding is vector(1536) but EMBEDDING_DIMENSIONS expects vector(4)');
    vi.spyOn(store, 'init').mockRejectedValue(failure);
    const close = vi.spyOn(store, 'close');

    await expect(openStore(store)).rejects.toBe(failure);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('reports the schema failure even when closing fails too', async () => {
    const store = new MemoryVectorStore(4);
    const failure = new StorageError('Schema check failed: connect ECONNREFUSED');
    vi.spyOn(store, 'init').mockRejectedValue(failure);
    vi.spyOn(store, 'close').mockRejectedValue(new Error('pool already ended'));

    await expect(openStore(store)).rejects.toBe(failure);
  });
});
