import OpenAI from 'openai';
import { env } from '../config.js';

export type EmbeddingFunction = (text: string) => Promise<number[]>;

export type EmbeddingResult =
  | { ok: true; vector: number[] }
  | { ok: false; reason: string };

export function createOpenAIEmbedder(client: OpenAI, model: string = env.EMBEDDING_MODEL): EmbeddingFunction {
  return async (text: string) => {
    const response = await client.embeddings.create({ model, input: text });
    const first = response.data[0];
    if (!first) {
      throw new Error(`Embedding response for model ${model} contained no vectors`);
    }
    return first.embedding;
  };
}

/**
 * Embedder from the environment, or null when no API key is configured (the
 * similarity scorer then runs lexical-only).
 */
export function embedderFromEnv(): EmbeddingFunction | null {
  if (!env.OPENAI_API_KEY) {
    console.log('[Embeddings] OPENAI_API_KEY not set, using lexical similarity only');
    return null;
  }
  return cachedEmbedder(createOpenAIEmbedder(new OpenAI({ apiKey: env.OPENAI_API_KEY })));
}

// Identical strings are embedded once; failed calls are not cached
export function cachedEmbedder(embed: EmbeddingFunction): EmbeddingFunction {
  const cache = new Map<string, Promise<number[]>>();
  return (text: string) => {
    const hit = cache.get(text);
    if (hit) return hit;

    const pending = embed(text);
    cache.set(text, pending);
    void pending.catch(() => cache.delete(text));
    return pending;
  };
}

/**
 * Runs one embedding call, settling within `timeoutMs`. Failures and timeouts
 * come back as `{ ok: false }` rather than a rejection.
 */
export async function embedWithTimeout(
  embed: EmbeddingFunction,
  text: string,
  timeoutMs: number
): Promise<EmbeddingResult> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<EmbeddingResult>(resolve => {
    timer = setTimeout(() => resolve({ ok: false, reason: `timed out after ${timeoutMs}ms` }), timeoutMs);
  });

  const call = embed(text).then(
    (vector): EmbeddingResult =>
      vector.length > 0 ? { ok: true, vector } : { ok: false, reason: 'empty vector' },
    (error: unknown): EmbeddingResult => ({
      ok: false,
      reason: error instanceof Error ? error.message : String(error),
    })
  );

  try {
    return await Promise.race([call, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Cosine of the angle between two vectors, clamped to [0, 1]. */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return Math.min(1, Math.max(0, dotProduct / denominator));
}
