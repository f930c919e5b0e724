import { createHash } from 'crypto';
import { readFileSync, writeFileSync } from 'fs';
import { z } from 'zod';
import { dedupConfig, type DedupConfig, type DedupThresholds } from '../config.js';
import { InputValidationError, RecordNotFoundError } from '../errors.js';
import { APPLICATION_STATUSES, ApplicationStore } from '../storage/db.js';
import type { SimilarityScorer } from '../text/similarity.js';
import { normalizeCompany, normalizeTitle } from '../text/textNormalizer.js';
import type {
  ApplicationFields,
  ApplicationStats,
  ApplicationStatus,
  DuplicateMatch,
  DuplicateMatchType,
  JobApplicationRecord,
} from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const RECENT_DAYS = 7;

export function extractJobIdFromUrl(url: string, config: DedupConfig = dedupConfig): string | null {
  if (!url) return null;
  for (const { platform, pattern } of config.jobBoardPatterns) {
    const match = url.match(pattern);
    if (match?.[1]) {
      return `${platform}_${match[1].toLowerCase()}`;
    }
  }
  return null;
}

/**
 * Deterministic record id: the board's own id when the URL carries one,
 * otherwise a hash of the normalized title and company.
 */
export function generateJobId(title: string, company: string, url = '', config: DedupConfig = dedupConfig): string {
  const fromUrl = extractJobIdFromUrl(url.trim(), config);
  if (fromUrl) return fromUrl;

  if (!title.trim() || !company.trim()) {
    console.warn(`[Dedup] Malformed record: missing ${!title.trim() ? 'title' : 'company'} (title="${title}", company="${company}")`);
  }

  const content = `${normalizeTitle(title, config)}|${normalizeCompany(company, config)}`;
  return createHash('md5').update(content).digest('hex').slice(0, 12);
}

interface IndexedRecord {
  record: JobApplicationRecord;
  normalizedTitle: string;
  normalizedCompany: string;
}

interface Candidate {
  id: string;
  jobUrl: string;
  jobDescription: string;
  normalizedTitle: string;
  normalizedCompany: string;
}

export interface DuplicateVerdict {
  isDuplicate: boolean;
  match: DuplicateMatch | null;
}

export interface AddResult {
  inserted: boolean;
  record: JobApplicationRecord;
}

export interface DuplicateIndexOptions {
  scorer: SimilarityScorer;
  thresholds?: Partial<DedupThresholds>;
  config?: DedupConfig;
  now?: () => Date;
}

const legacyRecordSchema = z.object({
  job_id: z.string().optional(),
  job_title: z.string().default(''),
  company: z.string().default(''),
  job_url: z.string().default(''),
  application_date: z.string().default(''),
  job_description: z.string().default(''),
  location: z.string().default(''),
  salary_range: z.string().default(''),
  job_source: z.string().default(''),
  application_status: z.enum(APPLICATION_STATUSES).default('applied'),
  similarity_score: z.number().default(0),
  duplicate_of: z.string().default(''),
});

const legacyFileSchema = z.record(z.string(), legacyRecordSchema);

/**
 * Persistent record of applied-to postings. Reads may run concurrently;
 * `add`, `updateStatus`, removals and imports go through one write queue so
 * the first of two near-identical postings always becomes the canonical one.
 */
export class DuplicateIndex {
  readonly thresholds: DedupThresholds;
  private readonly config: DedupConfig;
  private readonly scorer: SimilarityScorer;
  private readonly store: ApplicationStore;
  private readonly now: () => Date;
  private readonly records = new Map<string, IndexedRecord>();
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(store: ApplicationStore, options: DuplicateIndexOptions) {
    this.store = store;
    this.scorer = options.scorer;
    this.config = options.config ?? dedupConfig;
    this.thresholds = { ...this.config.thresholds, ...options.thresholds };
    this.now = options.now ?? (() => new Date());

    for (const record of store.loadAll()) {
      this.remember(record);
    }
    console.log(`[Dedup] Loaded ${this.records.size} prior applications from ${store.path}`);
  }

  /** Opens (or creates) the SQLite index at `path` and loads every record. */
  static open(path: string, options: DuplicateIndexOptions): DuplicateIndex {
    return new DuplicateIndex(ApplicationStore.open(path), options);
  }

  get size(): number {
    return this.records.size;
  }

  all(): JobApplicationRecord[] {
    return [...this.records.values()].map(entry => ({ ...entry.record }));
  }

  get(id: string): JobApplicationRecord | null {
    const entry = this.records.get(id);
    return entry ? { ...entry.record } : null;
  }

  generateId(title: string, company: string, url = ''): string {
    return generateJobId(title, company, url, this.config);
  }

  async findDuplicates(fields: ApplicationFields): Promise<DuplicateMatch[]> {
    const candidate = this.toCandidate(fields);
    const matches: DuplicateMatch[] = [];

    for (const existing of this.records.values()) {
      const match = await this.compare(candidate, existing);
      if (match) matches.push(match);
    }

    return matches.sort(byStrength);
  }

  async isDuplicate(title: string, company: string, url = '', description = ''): Promise<DuplicateVerdict> {
    const duplicates = await this.findDuplicates({ title, company, url, description });
    // A stronger related-only match must not hide a definitive one
    const definitive = duplicates.find(match => this.isDefinitive(match));
    if (definitive) return { isDuplicate: true, match: definitive };

    return { isDuplicate: false, match: duplicates[0] ?? null };
  }

  /**
   * Records a posting unless it duplicates one already seen, in which case the
   * existing record comes back with `inserted: false`. A merely related
   * posting is inserted and stamped with the related record's id and score.
   */
  add(fields: ApplicationFields): Promise<AddResult> {
    return this.enqueue(() => this.addNow(fields));
  }

  private async addNow(fields: ApplicationFields): Promise<AddResult> {
    const { isDuplicate, match } = await this.isDuplicate(
      fields.title,
      fields.company,
      fields.url ?? '',
      fields.description ?? ''
    );

    if (isDuplicate && match) {
      const existing = this.records.get(match.existingId);
      if (existing) {
        console.log(`[Dedup] Duplicate detected: ${fields.title} at ${fields.company}`);
        console.log(`[Dedup]   Similar to ${match.existingId} (${match.matchType}, ${match.similarityScore.toFixed(3)})`);
        return { inserted: false, record: { ...existing.record } };
      }
    }

    const record: JobApplicationRecord = {
      id: this.generateId(fields.title, fields.company, fields.url ?? ''),
      jobTitle: fields.title,
      company: fields.company,
      jobUrl: fields.url ?? '',
      applicationDate: this.now().toISOString(),
      jobDescription: fields.description ?? '',
      location: fields.location ?? '',
      salaryRange: fields.salaryRange ?? '',
      jobSource: fields.source ?? '',
      status: 'applied',
      similarityScore: match?.similarityScore ?? 0,
      duplicateOf: match?.existingId ?? '',
    };

    if (!this.store.insert(record)) {
      // Written by another process since we loaded
      const stored = this.store.get(record.id);
      if (stored) {
        this.remember(stored);
        return { inserted: false, record: stored };
      }
    }

    this.remember(record);
    console.log(`[Dedup] Added new application: ${record.jobTitle} at ${record.company} (ID: ${record.id})`);
    return { inserted: true, record: { ...record } };
  }

  updateStatus(id: string, status: ApplicationStatus): Promise<JobApplicationRecord> {
    return this.enqueue(async () => {
      const entry = this.records.get(id);
      if (!entry || !this.store.updateStatus(id, status)) {
        throw new RecordNotFoundError(id);
      }
      entry.record = { ...entry.record, status };
      console.log(`[Dedup] Updated application ${id} status to: ${status}`);
      return { ...entry.record };
    });
  }

  getStats(): ApplicationStats {
    const stats: ApplicationStats = {
      totalApplications: this.records.size,
      byStatus: {},
      byCompany: {},
      bySource: {},
      duplicatesDetected: 0,
      recentApplications: 0,
    };
    const cutoff = this.now().getTime() - RECENT_DAYS * DAY_MS;

    for (const { record } of this.records.values()) {
      stats.byStatus[record.status] = (stats.byStatus[record.status] ?? 0) + 1;
      stats.byCompany[record.company] = (stats.byCompany[record.company] ?? 0) + 1;
      const source = record.jobSource || 'unknown';
      stats.bySource[source] = (stats.bySource[source] ?? 0) + 1;
      if (record.duplicateOf) stats.duplicatesDetected++;

      const appliedAt = Date.parse(record.applicationDate);
      if (!Number.isNaN(appliedAt) && appliedAt >= cutoff) {
        stats.recentApplications++;
      }
    }

    return stats;
  }

  /** Every stored pair at or above the potential threshold, each pair once. */
  async getPotentialDuplicates(): Promise<DuplicateMatch[]> {
    const entries = [...this.records.values()];
    const matches: DuplicateMatch[] = [];

    for (let i = 0; i < entries.length; i++) {
      const candidate = toCandidate(entries[i]);
      for (let j = i + 1; j < entries.length; j++) {
        const match = await this.compare(candidate, entries[j]);
        if (match) matches.push(match);
      }
    }

    return matches.sort(byStrength);
  }

  /** Rejected or unanswered applications older than `daysOld` days. */
  findStaleApplications(daysOld = 30): JobApplicationRecord[] {
    const cutoff = this.now().getTime() - daysOld * DAY_MS;
    return this.all().filter(record => {
      const appliedAt = Date.parse(record.applicationDate);
      return (
        !Number.isNaN(appliedAt) &&
        appliedAt < cutoff &&
        (record.status === 'rejected' || record.status === 'no_response')
      );
    });
  }

  removeApplications(ids: string[]): Promise<number> {
    return this.enqueue(async () => {
      const removed = this.store.deleteMany(ids);
      for (const id of ids) {
        this.records.delete(id);
      }
      console.log(`[Dedup] Removed ${removed} applications`);
      return removed;
    });
  }

  async cleanupOldApplications(daysOld = 30): Promise<number> {
    const stale = this.findStaleApplications(daysOld);
    if (stale.length === 0) return 0;
    return this.removeApplications(stale.map(record => record.id));
  }

  /** Keyed JSON layout: `{ id: { job_title, company, job_url, ... } }`. */
  toJson(): Record<string, Record<string, string | number>> {
    const out: Record<string, Record<string, string | number>> = {};
    for (const { record } of this.records.values()) {
      out[record.id] = {
        job_id: record.id,
        job_title: record.jobTitle,
        company: record.company,
        job_url: record.jobUrl,
        application_date: record.applicationDate,
        job_description: record.jobDescription,
        location: record.location,
        salary_range: record.salaryRange,
        job_source: record.jobSource,
        application_status: record.status,
        similarity_score: record.similarityScore,
        duplicate_of: record.duplicateOf,
      };
    }
    return out;
  }

  exportJson(filePath: string): number {
    writeFileSync(filePath, JSON.stringify(this.toJson(), null, 2));
    return this.records.size;
  }

  /**
   * Loads a keyed JSON file into the index. Fields missing from older files
   * default to empty values; ids already present are left untouched.
   */
  importJson(data: unknown, source = 'JSON input'): Promise<number> {
    const parsed = legacyFileSchema.safeParse(data);
    if (!parsed.success) {
      return Promise.reject(new InputValidationError(source, parsed.error.message));
    }

    return this.enqueue(async () => {
      let imported = 0;
      for (const [id, entry] of Object.entries(parsed.data)) {
        const record: JobApplicationRecord = {
          id: entry.job_id || id,
          jobTitle: entry.job_title,
          company: entry.company,
          jobUrl: entry.job_url,
          applicationDate: entry.application_date,
          jobDescription: entry.job_description,
          location: entry.location,
          salaryRange: entry.salary_range,
          jobSource: entry.job_source,
          status: entry.application_status,
          similarityScore: entry.similarity_score,
          duplicateOf: entry.duplicate_of,
        };
        if (!this.records.has(record.id) && this.store.insert(record)) {
          this.remember(record);
          imported++;
        }
      }
      console.log(`[Dedup] Imported ${imported} applications from ${source}`);
      return imported;
    });
  }

  importJsonFile(filePath: string): Promise<number> {
    let data: unknown;
    try {
      data = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return Promise.reject(new InputValidationError(filePath, message));
    }
    return this.importJson(data, filePath);
  }

  close(): void {
    this.store.close();
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task);
    // The caller observes failures through `run`; the queue itself keeps going
    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private remember(record: JobApplicationRecord): void {
    this.records.set(record.id, {
      record,
      normalizedTitle: normalizeTitle(record.jobTitle, this.config),
      normalizedCompany: normalizeCompany(record.company, this.config),
    });
  }

  private toCandidate(fields: ApplicationFields): Candidate {
    return {
      id: this.generateId(fields.title, fields.company, fields.url ?? ''),
      jobUrl: fields.url?.trim() ?? '',
      jobDescription: fields.description ?? '',
      normalizedTitle: normalizeTitle(fields.title, this.config),
      normalizedCompany: normalizeCompany(fields.company, this.config),
    };
  }

  // Potential matches are only ever recorded as related, never blocking
  private isDefinitive(match: DuplicateMatch): boolean {
    if (match.matchType === 'exact') return true;
    return match.matchType === 'high_similarity' && match.similarityScore >= this.thresholds.highSimilarity;
  }

  private async compare(candidate: Candidate, existing: IndexedRecord): Promise<DuplicateMatch | null> {
    const { record } = existing;
    const result = (matchType: DuplicateMatchType, similarityScore: number, matchingFactors: string[]): DuplicateMatch => ({
      candidateId: candidate.id,
      existingId: record.id,
      similarityScore,
      matchType,
      matchingFactors,
      confidence: similarityScore,
    });

    if (candidate.jobUrl && record.jobUrl && candidate.jobUrl === record.jobUrl.trim()) {
      return result('exact', 1, ['identical_url']);
    }
    if (candidate.id === record.id) {
      return result('exact', 1, ['identical_id']);
    }

    const [titleSimilarity, companySimilarity] = await Promise.all([
      this.scorer.similarity(candidate.normalizedTitle, existing.normalizedTitle),
      this.scorer.similarity(candidate.normalizedCompany, existing.normalizedCompany),
    ]);
    const { thresholds } = this;

    if (titleSimilarity >= thresholds.titleSimilarity && companySimilarity >= thresholds.companySimilarity) {
      let overall = (titleSimilarity + companySimilarity) / 2;
      const factors = ['title_match', 'company_match'];

      if (candidate.jobDescription && record.jobDescription) {
        const prefix = this.config.descriptionPrefixLength;
        const descriptionSimilarity = await this.scorer.similarity(
          candidate.jobDescription.slice(0, prefix),
          record.jobDescription.slice(0, prefix)
        );
        if (descriptionSimilarity > thresholds.descriptionSimilarity) {
          factors.push('description_match');
          overall = (overall + descriptionSimilarity) / 2;
        }
      }

      return overall >= thresholds.potentialDuplicate ? result('high_similarity', overall, factors) : null;
    }

    if (titleSimilarity >= thresholds.potentialDuplicate && companySimilarity >= thresholds.potentialDuplicate) {
      const overall = (titleSimilarity + companySimilarity) / 2;
      return result('potential', overall, ['similar_title', 'similar_company']);
    }

    return null;
  }
}

function toCandidate(entry: IndexedRecord): Candidate {
  return {
    id: entry.record.id,
    jobUrl: entry.record.jobUrl.trim(),
    jobDescription: entry.record.jobDescription,
    normalizedTitle: entry.normalizedTitle,
    normalizedCompany: entry.normalizedCompany,
  };
}

const MATCH_TYPE_RANK: Record<DuplicateMatchType, number> = { exact: 0, high_similarity: 1, potential: 2 };

function byStrength(a: DuplicateMatch, b: DuplicateMatch): number {
  return b.similarityScore - a.similarityScore || MATCH_TYPE_RANK[a.matchType] - MATCH_TYPE_RANK[b.matchType];
}
