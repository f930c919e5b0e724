import { embedderFromEnv } from './ai/embeddings.js';
import { env } from './config.js';
import { DuplicateIndex } from './dedup/duplicateIndex.js';
import { SimilarityScorer } from './text/similarity.js';

export function argValue(flag: string): string | undefined {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

/** Arguments that are neither flags nor the values of `valueFlags`. */
export function positionalArgs(valueFlags: string[] = []): string[] {
  const args = process.argv.slice(2);
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (valueFlags.includes(args[i])) {
      i++;
    } else if (!args[i].startsWith('--')) {
      out.push(args[i]);
    }
  }
  return out;
}

export function openIndex(): { index: DuplicateIndex; scorer: SimilarityScorer } {
  const scorer = new SimilarityScorer({ embed: embedderFromEnv() });
  const index = DuplicateIndex.open(env.APPLICATIONS_DB_PATH, { scorer });
  return { index, scorer };
}
