import { env } from './config.js';
import type { DuplicateIndex } from './dedup/duplicateIndex.js';
import { InputValidationError } from './errors.js';
import { batchMatchJobs } from './matching/batchMatch.js';
import type { CompositeMatcher } from './matching/compositeMatcher.js';
import { generateApplicationInsights } from './matching/recommendations.js';
import type {
  ApplicationInsights,
  DuplicateMatch,
  JobRequirement,
  MatchPreferences,
  MatchResult,
  ParsedResume,
} from './types.js';

export type ApplicationDecision = 'auto-apply' | 'manual-review' | 'skip';

export interface PipelineOptions {
  preferences?: Partial<MatchPreferences>;
  recordMinScore?: number;
  autoApplyScore?: number;
  dryRun?: boolean;
  signal?: AbortSignal;
}

export interface JobOutcome {
  job: JobRequirement;
  match: MatchResult;
  insights: ApplicationInsights;
  decision: ApplicationDecision;
  recorded: boolean;
}

export interface PipelineResult {
  outcomes: JobOutcome[];
  duplicates: { job: JobRequirement; match: DuplicateMatch }[];
}

function toFields(job: JobRequirement) {
  return {
    title: job.title,
    company: job.company,
    url: job.applicationUrl ?? '',
    description: job.description,
    location: job.location,
    salaryRange: job.salaryRange ? `${job.salaryRange[0]}-${job.salaryRange[1]}` : '',
    source: job.sourcePlatform,
  };
}

/**
 * Dedup, then score, then record. Postings already in the index are dropped
 * before matching; postings scoring at least `recordMinScore` are queued for
 * application and written to the index one at a time.
 */
export async function runPipeline(
  resume: ParsedResume,
  jobs: JobRequirement[],
  index: DuplicateIndex,
  matcher: CompositeMatcher,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const recordMinScore = options.recordMinScore ?? env.RECORD_MIN_SCORE;
  const autoApplyScore = options.autoApplyScore ?? env.AUTO_APPLY_SCORE;
  const dryRun = options.dryRun ?? env.DRY_RUN;

  const seenIds = new Set<string>();
  for (const job of jobs) {
    if (seenIds.has(job.id)) {
      throw new InputValidationError('jobs', `job id "${job.id}" appears more than once`);
    }
    seenIds.add(job.id);
  }

  // Step 1: Drop postings already applied to
  const duplicates: PipelineResult['duplicates'] = [];
  const fresh: JobRequirement[] = [];
  for (const job of jobs) {
    const { isDuplicate, match } = await index.isDuplicate(
      job.title,
      job.company,
      job.applicationUrl ?? '',
      job.description
    );
    if (isDuplicate && match) {
      duplicates.push({ job, match });
    } else {
      fresh.push(job);
    }
  }
  console.log(`\nNew jobs (not in index): ${fresh.length}, duplicates skipped: ${duplicates.length}`);

  // Step 2: Score the rest
  const { matches } = await batchMatchJobs(matcher, resume, fresh, {
    preferences: options.preferences,
    topN: fresh.length,
    signal: options.signal,
  });

  // Step 3: Decide and record, each write flushed on its own
  const byId = new Map(fresh.map(job => [job.id, job]));
  const outcomes: JobOutcome[] = [];
  for (const match of matches) {
    const job = byId.get(match.jobId);
    if (!job) continue;

    let decision: ApplicationDecision =
      match.overallScore >= autoApplyScore ? 'auto-apply' : match.overallScore >= recordMinScore ? 'manual-review' : 'skip';
    let recorded = false;

    if (decision !== 'skip' && options.signal?.aborted) {
      // Not written to the index, so it must not be applied to either
      decision = 'skip';
    } else if (decision !== 'skip' && !dryRun) {
      const { inserted, record } = await index.add(toFields(job));
      recorded = inserted;
      if (!inserted) {
        console.log(`  Skipping ${job.title} @ ${job.company}: duplicate of ${record.id} in this batch`);
        decision = 'skip';
      }
    }

    outcomes.push({ job, match, insights: generateApplicationInsights(match, resume), decision, recorded });
  }

  return { outcomes, duplicates };
}
