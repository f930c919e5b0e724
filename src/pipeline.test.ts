import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DuplicateIndex } from './dedup/duplicateIndex.js';
import { InputValidationError } from './errors.js';
import { CompositeMatcher } from './matching/compositeMatcher.js';
import { runPipeline } from './pipeline.js';
import { SimilarityScorer } from './text/similarity.js';
import { makeJob, makeResume, tempDbPath } from './testing/fixtures.js';

const jobs = [
  makeJob({ id: 'job-weak', title: 'Junior Accountant', company: 'Vandelay', requiredSkills: ['bookkeeping'],
    preferredSkills: [], experienceLevel: 'junior', remoteFriendly: false, location: 'Lisbon', industry: 'Finance',
    companySize: 'Large', salaryRange: [30000, 40000] }),
  makeJob({ id: 'job-strong', applicationUrl: 'https://www.linkedin.com/jobs/view/1001' }),
  makeJob({ id: 'job-strong-repost', applicationUrl: 'https://careers.example.com/jobs/1' }),
  makeJob({ id: 'job-seen', title: 'QA Analyst', company: 'Umbrella', applicationUrl: 'https://www.linkedin.com/jobs/view/777' }),
];

describe('runPipeline', () => {
  let index: DuplicateIndex;
  let matcher: CompositeMatcher;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const scorer = new SimilarityScorer();
    index = DuplicateIndex.open(tempDbPath(), { scorer });
    matcher = new CompositeMatcher({ scorer });
    await index.add({ title: 'QA Analyst', company: 'Umbrella', url: 'https://www.linkedin.com/jobs/view/777' });
  });

  afterEach(() => {
    index.close();
    vi.restoreAllMocks();
  });

  it('skips known postings, ranks the rest and records the good ones once', async () => {
    const result = await runPipeline(makeResume(), jobs, index, matcher, {
      preferences: { minSalary: 60000 },
      recordMinScore: 0.6,
      autoApplyScore: 0.8,
      dryRun: false,
    });

    expect(result.duplicates.map(({ job, match }) => [job.id, match.matchType])).toEqual([['job-seen', 'exact']]);
    expect(result.outcomes.map(({ job, decision, recorded }) => [job.id, decision, recorded])).toEqual([
      ['job-strong', 'auto-apply', true],
      ['job-strong-repost', 'skip', false],
      ['job-weak', 'skip', false],
    ]);
    expect(result.outcomes[0].insights.applicationStrategy).toBe('Apply with confidence using standard approach');
    expect(result.outcomes[2].match.overallScore).toBeCloseTo(0.41);

    expect(index.size).toBe(2);
    expect(index.get('linkedin_1001')).toMatchObject({
      jobTitle: 'Senior Backend Engineer',
      salaryRange: '70000-90000',
      jobSource: 'test',
    });
  });

  it('skips and records nothing once aborted', async () => {
    const controller = new AbortController();
    const original = matcher.match.bind(matcher);
    vi.spyOn(matcher, 'match').mockImplementation(async (resume, job, preferences) => {
      controller.abort();
      return original(resume, job, preferences);
    });

    const result = await runPipeline(makeResume(), [jobs[1]], index, matcher, {
      preferences: { minSalary: 60000 },
      dryRun: false,
      signal: controller.signal,
    });

    expect(result.outcomes.map(({ job, decision, recorded }) => [job.id, decision, recorded])).toEqual([
      ['job-strong', 'skip', false],
    ]);
    expect(index.size).toBe(1);
  });

  it('rejects postings that share an id', async () => {
    await expect(runPipeline(makeResume(), [jobs[1], jobs[1]], index, matcher, { dryRun: true })).rejects.toThrow(
      InputValidationError
    );
  });

  it('records nothing on a dry run', async () => {
    const result = await runPipeline(makeResume(), jobs, index, matcher, {
      preferences: { minSalary: 60000 },
      dryRun: true,
    });

    expect(result.outcomes.map(outcome => outcome.recorded)).toEqual([false, false, false]);
    expect(result.outcomes[1].decision).toBe('auto-apply');
    expect(index.size).toBe(1);
  });
});
