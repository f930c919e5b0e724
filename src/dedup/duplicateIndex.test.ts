import { readFileSync, writeFileSync } from 'fs';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InputValidationError, RecordNotFoundError, StorageCorruptionError } from '../errors.js';
import { SimilarityScorer } from '../text/similarity.js';
import { tempDbPath } from '../testing/fixtures.js';
import { DuplicateIndex, extractJobIdFromUrl, generateJobId } from './duplicateIndex.js';

const NOW = new Date('2026-03-10T12:00:00.000Z');
const DESCRIPTION = 'Design and operate large-scale search infrastructure in Zurich.';

describe('extractJobIdFromUrl', () => {
  it('reads ids embedded by known job boards', () => {
    expect(extractJobIdFromUrl('https://www.linkedin.com/jobs/view/12345')).toBe('linkedin_12345');
    expect(extractJobIdFromUrl('https://www.linkedin.com/jobs/view/senior-engineer-at-acme-3456789/')).toBe(
      'linkedin_3456789'
    );
    expect(extractJobIdFromUrl('https://www.indeed.com/viewjob?jk=A1B2C3D4')).toBe('indeed_a1b2c3d4');
    expect(extractJobIdFromUrl('https://www.glassdoor.com/job-listing/x.htm?jobListingId=998877')).toBe(
      'glassdoor_998877'
    );
  });

  it('returns null for other URLs', () => {
    expect(extractJobIdFromUrl('https://careers.example.com/jobs/123')).toBeNull();
    expect(extractJobIdFromUrl('')).toBeNull();
  });
});

describe('generateJobId', () => {
  it('prefers the job board id', () => {
    expect(generateJobId('Engineer', 'Acme', 'https://www.linkedin.com/jobs/view/42')).toBe('linkedin_42');
  });

  it('hashes the normalized title and company otherwise', () => {
    const id = generateJobId('Senior Software Engineer', 'Google Inc.');
    expect(id).toMatch(/^[0-9a-f]{12}$/);
    expect(generateJobId('Senior Software Engineer', 'Google Inc.')).toBe(id);
    expect(generateJobId('Sr. Software Developer', 'Alphabet')).toBe(id);
    expect(generateJobId('Senior Software Engineer', 'Google', 'https://careers.google.com/jobs/1')).toBe(id);
    expect(generateJobId('Staff Software Engineer', 'Google')).not.toBe(id);
  });

  it('still produces an id for malformed records, with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(generateJobId('', 'Acme')).toMatch(/^[0-9a-f]{12}$/);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});

describe('DuplicateIndex', () => {
  const opened: DuplicateIndex[] = [];
  const openIndex = (path = tempDbPath()) => {
    const index = DuplicateIndex.open(path, { scorer: new SimilarityScorer(), now: () => NOW });
    opened.push(index);
    return index;
  };

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    for (const index of opened.splice(0)) index.close();
    vi.restoreAllMocks();
  });

  it('refuses to start from an unreadable file', () => {
    const path = tempDbPath();
    writeFileSync(path, 'garbage '.repeat(200));
    expect(() => openIndex(path)).toThrow(StorageCorruptionError);
  });

  it('records a posting once', async () => {
    const index = openIndex();
    const first = await index.add({ title: 'Backend Engineer', company: 'Globex', source: 'indeed' });
    const second = await index.add({ title: 'Backend Engineer', company: 'Globex' });

    expect(first.inserted).toBe(true);
    expect(first.record).toMatchObject({
      jobTitle: 'Backend Engineer',
      company: 'Globex',
      jobSource: 'indeed',
      status: 'applied',
      applicationDate: NOW.toISOString(),
      duplicateOf: '',
      similarityScore: 0,
    });
    expect(second.inserted).toBe(false);
    expect(second.record.id).toBe(first.record.id);
    expect(index.size).toBe(1);
  });

  it('treats a shared URL as an exact duplicate', async () => {
    const index = openIndex();
    await index.add({ title: 'Backend Engineer', company: 'Globex', url: 'https://globex.example/careers/7' });

    const verdict = await index.isDuplicate('Platform Engineer', 'Globex Corp', 'https://globex.example/careers/7');
    expect(verdict.isDuplicate).toBe(true);
    expect(verdict.match).toMatchObject({ matchType: 'exact', similarityScore: 1, matchingFactors: ['identical_url'] });
  });

  it('catches the same role reposted under a different title and company name', async () => {
    const index = openIndex();
    await index.add({
      title: 'Senior Software Engineer',
      company: 'Google',
      url: 'https://www.linkedin.com/jobs/view/12345',
      description: DESCRIPTION,
    });

    const verdict = await index.isDuplicate(
      'Sr. Software Developer',
      'Alphabet',
      'https://careers.google.com/jobs/123',
      DESCRIPTION
    );

    expect(verdict.isDuplicate).toBe(true);
    expect(verdict.match).toEqual({
      candidateId: generateJobId('Senior Software Engineer', 'Google'),
      existingId: 'linkedin_12345',
      similarityScore: 1,
      matchType: 'high_similarity',
      matchingFactors: ['title_match', 'company_match', 'description_match'],
      confidence: 1,
    });
  });

  it('records related postings with a link to the earlier one', async () => {
    const index = openIndex();
    const original = await index.add({ title: 'Data Engineer', company: 'Initech' });
    const related = await index.add({ title: 'Data Engineer Lead', company: 'Initech' });

    expect(related.inserted).toBe(true);
    expect(related.record.duplicateOf).toBe(original.record.id);
    expect(related.record.similarityScore).toBeCloseTo(31 / 36);

    const potentials = await index.getPotentialDuplicates();
    expect(potentials).toHaveLength(1);
    expect(potentials[0]).toMatchObject({
      candidateId: original.record.id,
      existingId: related.record.id,
      matchType: 'potential',
      matchingFactors: ['similar_title', 'similar_company'],
    });
  });

  it('reports a related-only match without blocking', async () => {
    const index = openIndex();
    const original = await index.add({ title: 'Data Engineer', company: 'Initech' });

    const verdict = await index.isDuplicate('Data Engineer Lead', 'Initech');
    expect(verdict.isDuplicate).toBe(false);
    expect(verdict.match).toMatchObject({ existingId: original.record.id, matchType: 'potential' });
  });

  it('blocks on a definitive match even when a related match scores higher', async () => {
    const index = openIndex();
    const close = await index.add({ title: 'Platform Enginxyz', company: 'Umbrellax' });
    const related = await index.add({ title: 'Platform Engineer', company: 'Umbrellay' });
    expect(related.inserted).toBe(true);

    const matches = await index.findDuplicates({ title: 'Platform Engineer', company: 'Umbrellax' });
    expect(matches.map(match => [match.matchType, match.existingId])).toEqual([
      ['potential', related.record.id],
      ['high_similarity', close.record.id],
    ]);
    expect(matches[0].similarityScore).toBeCloseTo(17 / 18);
    expect(matches[1].similarityScore).toBeCloseTo(31 / 34);

    const verdict = await index.isDuplicate('Platform Engineer', 'Umbrellax');
    expect(verdict.isDuplicate).toBe(true);
    expect(verdict.match).toMatchObject({ existingId: close.record.id, matchType: 'high_similarity' });

    const again = await index.add({ title: 'Platform Engineer', company: 'Umbrellax' });
    expect(again.inserted).toBe(false);
    expect(again.record.id).toBe(close.record.id);
    expect(index.size).toBe(2);
  });

  it('leaves unrelated postings unlinked', async () => {
    const index = openIndex();
    await index.add({ title: 'Data Engineer', company: 'Initech' });

    expect(await index.isDuplicate('Product Designer', 'Globex')).toEqual({ isDuplicate: false, match: null });
  });

  it('lets only the first of two concurrent near-identical adds in', async () => {
    const index = openIndex();
    const results = await Promise.all([
      index.add({ title: 'Frontend Developer', company: 'Hooli' }),
      index.add({ title: 'Front-End Engineer', company: 'Hooli Inc' }),
    ]);

    expect(results.map(result => result.inserted)).toEqual([true, false]);
    expect(index.size).toBe(1);
  });

  it('persists every record across reopening', async () => {
    const path = tempDbPath();
    const first = openIndex(path);
    await first.add({ title: 'Data Engineer', company: 'Initech', location: 'Austin' });
    await first.add({ title: 'QA Analyst', company: 'Umbrella', url: 'https://www.linkedin.com/jobs/view/777' });
    const before = first.all();

    expect(openIndex(path).all()).toEqual(before);
  });

  it('updates status durably and rejects unknown ids', async () => {
    const path = tempDbPath();
    const index = openIndex(path);
    const { record } = await index.add({ title: 'Data Engineer', company: 'Initech' });

    const updated = await index.updateStatus(record.id, 'interviewed');
    expect(updated.status).toBe('interviewed');
    expect(openIndex(path).get(record.id)?.status).toBe('interviewed');

    await expect(index.updateStatus('missing', 'rejected')).rejects.toThrow(RecordNotFoundError);
  });

  it('summarises the index', async () => {
    const index = openIndex();
    await index.add({ title: 'Data Engineer', company: 'Initech', source: 'linkedin' });
    await index.add({ title: 'Data Engineer Lead', company: 'Initech' });
    await index.importJson({
      old1: { job_title: 'QA Analyst', company: 'Umbrella', application_date: '2026-01-05T00:00:00.000Z', application_status: 'rejected' },
    });

    expect(index.getStats()).toEqual({
      totalApplications: 3,
      byStatus: { applied: 2, rejected: 1 },
      byCompany: { Initech: 2, Umbrella: 1 },
      bySource: { linkedin: 1, unknown: 2 },
      duplicatesDetected: 1,
      recentApplications: 2,
    });
  });

  it('removes stale rejected and unanswered applications', async () => {
    const index = openIndex();
    await index.importJson({
      old1: { job_title: 'QA Analyst', company: 'Umbrella', application_date: '2026-01-05T00:00:00.000Z', application_status: 'rejected' },
      old2: { job_title: 'SRE', company: 'Hooli', application_date: '2026-01-20T00:00:00.000Z', application_status: 'no_response' },
      old3: { job_title: 'Analyst', company: 'Vandelay', application_date: '2026-01-20T00:00:00.000Z', application_status: 'interviewed' },
      new1: { job_title: 'Engineer', company: 'Initech', application_date: '2026-03-01T00:00:00.000Z', application_status: 'rejected' },
    });

    expect(index.findStaleApplications(30).map(record => record.id)).toEqual(['old1', 'old2']);
    expect(await index.cleanupOldApplications(30)).toBe(2);
    expect(index.all().map(record => record.id)).toEqual(['old3', 'new1']);
    expect(await index.cleanupOldApplications(30)).toBe(0);
  });

  it('exports and imports the keyed JSON layout', async () => {
    const source = openIndex();
    await source.add({ title: 'Data Engineer', company: 'Initech', description: 'Pipelines', salaryRange: '90k' });
    await source.add({ title: 'QA Analyst', company: 'Umbrella', url: 'https://www.linkedin.com/jobs/view/777' });
    const file = tempDbPath('applications.json');

    expect(source.exportJson(file)).toBe(2);
    const exported: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    expect(exported).toEqual(source.toJson());

    const target = openIndex();
    expect(await target.importJsonFile(file)).toBe(2);
    expect(target.all()).toEqual(source.all());
    expect(await target.importJsonFile(file)).toBe(0);
  });

  it('fills fields missing from older JSON files', async () => {
    const index = openIndex();
    await index.importJson({ abc123: { job_title: 'Data Engineer', company: 'Initech' } });

    expect(index.get('abc123')).toEqual({
      id: 'abc123',
      jobTitle: 'Data Engineer',
      company: 'Initech',
      jobUrl: '',
      applicationDate: '',
      jobDescription: '',
      location: '',
      salaryRange: '',
      jobSource: '',
      status: 'applied',
      similarityScore: 0,
      duplicateOf: '',
    });
  });

  it('rejects malformed JSON input', async () => {
    const index = openIndex();
    await expect(index.importJson({ x: { job_title: 'A', company: 'B', application_status: 'ghosted' } })).rejects.toThrow(
      InputValidationError
    );
    await expect(index.importJson(['not', 'keyed'])).rejects.toThrow(InputValidationError);

    const file = tempDbPath('broken.json');
    writeFileSync(file, '{ not json');
    await expect(index.importJsonFile(file)).rejects.toThrow(InputValidationError);
    expect(index.size).toBe(0);
  });
});
