import { env } from '../config.js';
import type { JobRequirement, MatchPreferences, MatchResult, ParsedResume } from '../types.js';
import type { CompositeMatcher } from './compositeMatcher.js';

export interface BatchMatchOptions {
  preferences?: Partial<MatchPreferences>;
  topN?: number;
  concurrency?: number;
  signal?: AbortSignal;
}

export interface BatchMatchSummary {
  matches: MatchResult[];
  processed: number;
  failed: number;
  skipped: number;
}

// Highest overall first; ties go to the stronger skill match, then job id
export function compareMatches(a: MatchResult, b: MatchResult): number {
  return (
    b.overallScore - a.overallScore ||
    b.scores.skills - a.scores.skills ||
    a.jobId.localeCompare(b.jobId)
  );
}

/**
 * Matches one resume against many postings with a fixed number of workers.
 * A posting whose match throws is logged and left out; once `signal` aborts,
 * postings not yet started are skipped.
 */
export async function batchMatchJobs(
  matcher: CompositeMatcher,
  resume: ParsedResume,
  jobs: JobRequirement[],
  options: BatchMatchOptions = {}
): Promise<BatchMatchSummary> {
  const topN = options.topN ?? 20;
  const concurrency = Math.max(1, Math.min(options.concurrency ?? env.MATCH_CONCURRENCY, jobs.length));

  console.log(`[Match] Matching resume against ${jobs.length} jobs (${concurrency} workers)...`);

  const matches: MatchResult[] = [];
  let next = 0;
  let processed = 0;
  let failed = 0;

  const worker = async () => {
    while (next < jobs.length && !options.signal?.aborted) {
      const job = jobs[next++];
      try {
        matches.push(await matcher.match(resume, job, options.preferences));
      } catch (error) {
        failed++;
        console.error(`[Match] Error matching job ${job.id}:`, error);
      }
      processed++;
      if (processed % 10 === 0) {
        console.log(`[Match] Processed ${processed}/${jobs.length} jobs`);
      }
    }
  };

  await Promise.all(Array.from({ length: jobs.length === 0 ? 0 : concurrency }, worker));

  const skipped = jobs.length - processed;
  if (skipped > 0) {
    console.log(`[Match] Aborted, skipped ${skipped} remaining jobs`);
  }

  matches.sort(compareMatches);
  const top = matches.slice(0, topN);

  console.log(`[Match] Completed matching. Top ${top.length} results:`);
  top.forEach((match, i) => {
    console.log(`  ${i + 1}. ${(match.overallScore * 100).toFixed(1)}% - ${match.jobId} - ${match.recommendation}`);
  });

  return { matches: top, processed, failed, skipped };
}
