import { describe, expect, it, vi } from 'vitest';
import { cachedEmbedder, cosineSimilarity, embedWithTimeout } from './embeddings.js';

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('clamps opposite vectors to 0', () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(0);
  });

  it('returns 0 for mismatched, empty or zero vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe('embedWithTimeout', () => {
  it('wraps a vector in an ok result', async () => {
    expect(await embedWithTimeout(async () => [0.1, 0.2], 'text', 100)).toEqual({ ok: true, vector: [0.1, 0.2] });
  });

  it('rejects empty vectors', async () => {
    expect(await embedWithTimeout(async () => [], 'text', 100)).toEqual({ ok: false, reason: 'empty vector' });
  });

  it('turns a rejection into a failed result', async () => {
    const result = await embedWithTimeout(
      async () => {
        throw new Error('connection refused');
      },
      'text',
      100
    );
    expect(result).toEqual({ ok: false, reason: 'connection refused' });
  });

  it('gives up after the timeout', async () => {
    const result = await embedWithTimeout(() => new Promise<number[]>(() => {}), 'text', 5);
    expect(result).toEqual({ ok: false, reason: 'timed out after 5ms' });
  });
});

describe('cachedEmbedder', () => {
  it('embeds identical text once', async () => {
    const embed = vi.fn(async (text: string) => [text.length]);
    const cached = cachedEmbedder(embed);

    expect(await cached('python')).toEqual([6]);
    expect(await cached('python')).toEqual([6]);
    expect(await cached('go')).toEqual([2]);
    expect(embed).toHaveBeenCalledTimes(2);
  });

  it('retries text whose embedding failed', async () => {
    const embed = vi
      .fn<(text: string) => Promise<number[]>>()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce([1, 2]);
    const cached = cachedEmbedder(embed);

    await expect(cached('python')).rejects.toThrow('timeout');
    expect(await cached('python')).toEqual([1, 2]);
    expect(embed).toHaveBeenCalledTimes(2);
  });
});
