import natural from 'natural';
import { embedWithTimeout, cosineSimilarity, type EmbeddingFunction } from '../ai/embeddings.js';
import { env } from '../config.js';

export interface SimilarityScorerOptions {
  embed?: EmbeddingFunction | null;
  timeoutMs?: number;
}

export interface BestMatch {
  candidate: string | null;
  score: number;
}

/** Edit-distance ratio: 1 - levenshtein / longer length, case-insensitive. */
export function lexicalSimilarity(a: string, b: string): number {
  const left = a.toLowerCase().trim();
  const right = b.toLowerCase().trim();
  if (!left || !right) return 0;
  if (left === right) return 1;

  const distance = natural.LevenshteinDistance(left, right);
  const longest = Math.max(left.length, right.length);
  return Math.max(0, 1 - distance / longest);
}

/**
 * Hybrid text similarity. With an embedding backend the score is the mean of
 * the lexical ratio and the embedding cosine; when the backend is missing,
 * slow or failing the lexical ratio is used alone.
 */
export class SimilarityScorer {
  private readonly embed: EmbeddingFunction | null;
  private readonly timeoutMs: number;
  private backendFailures = 0;

  constructor(options: SimilarityScorerOptions = {}) {
    this.embed = options.embed ?? null;
    this.timeoutMs = options.timeoutMs ?? env.EMBEDDING_TIMEOUT_MS;
  }

  get hasEmbeddings(): boolean {
    return this.embed !== null;
  }

  /** Number of embedding calls that fell back to lexical-only scoring. */
  get fallbackCount(): number {
    return this.backendFailures;
  }

  async similarity(a: string, b: string): Promise<number> {
    const left = a.trim();
    const right = b.trim();
    if (!left || !right) return 0;
    if (left.toLowerCase() === right.toLowerCase()) return 1;

    const lexical = lexicalSimilarity(left, right);
    if (!this.embed) return lexical;

    const [first, second] = await Promise.all([
      embedWithTimeout(this.embed, left, this.timeoutMs),
      embedWithTimeout(this.embed, right, this.timeoutMs),
    ]);
    if (!first.ok || !second.ok) {
      this.backendFailures++;
      const reason = !first.ok ? first.reason : !second.ok ? second.reason : 'unknown';
      console.warn(`[Embeddings] Backend unavailable, using lexical similarity: ${reason}`);
      return lexical;
    }

    const semantic = cosineSimilarity(first.vector, second.vector);
    return Math.min(1, Math.max(0, (lexical + semantic) / 2));
  }

  async bestMatch(target: string, candidates: string[]): Promise<BestMatch> {
    let best: BestMatch = { candidate: null, score: 0 };
    for (const candidate of candidates) {
      const score = await this.similarity(target, candidate);
      if (score > best.score) {
        best = { candidate, score };
      }
      if (score === 1) break;
    }
    return best;
  }
}
