import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { z } from 'zod';
import { StorageCorruptionError } from '../errors.js';
import type { ApplicationStatus, JobApplicationRecord } from '../types.js';

export const APPLICATION_STATUSES = [
  'applied',
  'interviewed',
  'offered',
  'rejected',
  'no_response',
  'withdrawn',
] as const satisfies readonly ApplicationStatus[];

// Columns added after the first release default to empty values on old files
const COLUMNS: { name: string; definition: string }[] = [
  { name: 'job_title', definition: "TEXT NOT NULL DEFAULT ''" },
  { name: 'company', definition: "TEXT NOT NULL DEFAULT ''" },
  { name: 'job_url', definition: "TEXT NOT NULL DEFAULT ''" },
  { name: 'application_date', definition: "TEXT NOT NULL DEFAULT ''" },
  { name: 'job_description', definition: "TEXT NOT NULL DEFAULT ''" },
  { name: 'location', definition: "TEXT NOT NULL DEFAULT ''" },
  { name: 'salary_range', definition: "TEXT NOT NULL DEFAULT ''" },
  { name: 'job_source', definition: "TEXT NOT NULL DEFAULT ''" },
  { name: 'application_status', definition: "TEXT NOT NULL DEFAULT 'applied'" },
  { name: 'similarity_score', definition: 'REAL NOT NULL DEFAULT 0' },
  { name: 'duplicate_of', definition: "TEXT NOT NULL DEFAULT ''" },
];

const text = z.string().nullable().transform(val => val ?? '');

const rowSchema = z.object({
  id: z.string().min(1),
  job_title: text,
  company: text,
  job_url: text,
  application_date: text,
  job_description: text,
  location: text,
  salary_range: text,
  job_source: text,
  application_status: z.enum(APPLICATION_STATUSES).nullable().transform(val => val ?? 'applied'),
  similarity_score: z.number().nullable().transform(val => val ?? 0),
  duplicate_of: text,
});

function rowToRecord(row: z.infer<typeof rowSchema>): JobApplicationRecord {
  return {
    id: row.id,
    jobTitle: row.job_title,
    company: row.company,
    jobUrl: row.job_url,
    applicationDate: row.application_date,
    jobDescription: row.job_description,
    location: row.location,
    salaryRange: row.salary_range,
    jobSource: row.job_source,
    status: row.application_status,
    similarityScore: row.similarity_score,
    duplicateOf: row.duplicate_of,
  };
}

function recordToRow(record: JobApplicationRecord) {
  return {
    id: record.id,
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

/**
 * SQLite-backed set of application records, one row per id. Every write is
 * its own transaction, so a crash loses at most the record being written.
 */
export class ApplicationStore {
  readonly path: string;
  private readonly db: DatabaseType;

  private constructor(path: string, db: DatabaseType) {
    this.path = path;
    this.db = db;
  }

  static open(path: string): ApplicationStore {
    let db: DatabaseType | undefined;
    try {
      db = new Database(path);
      // Enable WAL mode for better concurrent access
      db.pragma('journal_mode = WAL');
      db.exec(`
        CREATE TABLE IF NOT EXISTS applications (
          id TEXT PRIMARY KEY
        )
      `);
      const store = new ApplicationStore(path, db);
      store.migrate();
      return store;
    } catch (error) {
      db?.close();
      const message = error instanceof Error ? error.message : String(error);
      throw new StorageCorruptionError(path, message, { cause: error });
    }
  }

  private migrate(): void {
    const existing = new Set(
      this.db
        .prepare('PRAGMA table_info(applications)')
        .all()
        .map(row => z.object({ name: z.string() }).parse(row).name)
    );
    for (const column of COLUMNS) {
      if (!existing.has(column.name)) {
        this.db.exec(`ALTER TABLE applications ADD COLUMN ${column.name} ${column.definition}`);
      }
    }
    this.db.exec('CREATE INDEX IF NOT EXISTS idx_applications_date ON applications(application_date)');
  }

  loadAll(): JobApplicationRecord[] {
    let rows: unknown[];
    try {
      rows = this.db.prepare('SELECT * FROM applications ORDER BY rowid').all();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StorageCorruptionError(this.path, message, { cause: error });
    }

    return rows.map((row, i) => {
      const parsed = rowSchema.safeParse(row);
      if (!parsed.success) {
        throw new StorageCorruptionError(this.path, `row ${i + 1} is malformed: ${parsed.error.message}`);
      }
      return rowToRecord(parsed.data);
    });
  }

  get(id: string): JobApplicationRecord | null {
    const row = this.db.prepare('SELECT * FROM applications WHERE id = ?').get(id);
    if (row === undefined) return null;

    const parsed = rowSchema.safeParse(row);
    if (!parsed.success) {
      throw new StorageCorruptionError(this.path, `row ${id} is malformed: ${parsed.error.message}`);
    }
    return rowToRecord(parsed.data);
  }

  /** Inserts a record; false when a row with the same id already exists. */
  insert(record: JobApplicationRecord): boolean {
    const insert = this.db.prepare(`
      INSERT OR IGNORE INTO applications (id, job_title, company, job_url, application_date, job_description,
        location, salary_range, job_source, application_status, similarity_score, duplicate_of)
      VALUES (@id, @job_title, @company, @job_url, @application_date, @job_description,
        @location, @salary_range, @job_source, @application_status, @similarity_score, @duplicate_of)
    `);
    const run = this.db.transaction((row: ReturnType<typeof recordToRow>) => insert.run(row).changes > 0);
    return run(recordToRow(record));
  }

  insertMany(records: JobApplicationRecord[]): number {
    let inserted = 0;
    for (const record of records) {
      if (this.insert(record)) inserted++;
    }
    return inserted;
  }

  updateStatus(id: string, status: ApplicationStatus): boolean {
    const result = this.db.prepare('UPDATE applications SET application_status = ? WHERE id = ?').run(status, id);
    return result.changes > 0;
  }

  deleteMany(ids: string[]): number {
    const deleteStmt = this.db.prepare('DELETE FROM applications WHERE id = ?');
    const deleteAll = this.db.transaction((toDelete: string[]) => {
      let removed = 0;
      for (const id of toDelete) {
        removed += deleteStmt.run(id).changes;
      }
      return removed;
    });
    return deleteAll(ids);
  }

  close(): void {
    this.db.close();
  }
}
