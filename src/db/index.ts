import { initializeDatabase } from './schema';
import type Database from 'better-sqlite3';
import type { JobCandidate, JobRecord } from '../scrapers/types';
import { isTargetLocationText } from '../scrapers/filters';
import { identityKey } from '../utils/hash';

let db: Database.Database | null = null;

export function openDatabase(dbPath: string): Database.Database {
  db = initializeDatabase(dbPath);
  return db;
}

/** Swaps the active connection; tests pass an in-memory database. */
export function setDatabase(database: Database.Database): void {
  db = database;
}

export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error('Database not opened; call openDatabase() first');
  }
  return db;
}

export function closeDatabase(): void {
  db?.close();
  db = null;
}

// --- Jobs ---

export const JOB_STATUSES = ['new', 'interested', 'applied', 'rejected', 'archived'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export type SubmitResult = 'inserted' | 'duplicate';

interface JobRow {
  id: string;
  companyId: string;
  title: string;
  url: string;
  location: string | null;
  department: string | null;
  postedDate: string | null;
  discoveredAt: string;
  description: string;
  isTargetLocation: number;
  isTargetRole: number;
  mentionsVisaSupport: number;
  mentionsRelocation: number;
  status: string;
  notes: string | null;
}

const JOB_COLUMNS = `
  id, company_id as companyId, title, url, location, department,
  posted_date as postedDate, discovered_at as discoveredAt, description,
  is_target_location as isTargetLocation, is_target_role as isTargetRole,
  mentions_visa_support as mentionsVisaSupport, mentions_relocation as mentionsRelocation,
  status, notes
`;

function toRecord(row: JobRow): JobRecord {
  return {
    identityKey: row.id,
    companyId: row.companyId,
    title: row.title,
    url: row.url,
    location: row.location ?? undefined,
    department: row.department ?? undefined,
    postedDate: row.postedDate ?? undefined,
    discoveredAt: row.discoveredAt,
    description: row.description,
    isTargetLocation: row.isTargetLocation === 1,
    isTargetRole: row.isTargetRole === 1,
    mentionsVisaSupport: row.mentionsVisaSupport === 1,
    mentionsRelocation: row.mentionsRelocation === 1,
    status: row.status,
    notes: row.notes,
  };
}

/**
 * Inserts a first sighting. A posting whose identity key or URL is already
 * stored is left untouched and reported as a duplicate.
 */
export function submitJob(job: JobCandidate, now: Date = new Date()): SubmitResult {
  const database = getDatabase();
  const result = database.prepare(`
    INSERT OR IGNORE INTO jobs (id, company_id, title, url, location, department,
      posted_date, discovered_at, description, is_target_location, is_target_role,
      mentions_visa_support, mentions_relocation)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    identityKey(job.companyId, job.url),
    job.companyId, job.title, job.url, job.location ?? null, job.department ?? null,
    job.postedDate ?? null, now.toISOString(), job.description,
    job.isTargetLocation ? 1 : 0, job.isTargetRole ? 1 : 0,
    job.mentionsVisaSupport ? 1 : 0, job.mentionsRelocation ? 1 : 0
  );
  return result.changes === 1 ? 'inserted' : 'duplicate';
}

/** Records discovered at or after `since`, newest first. */
export function queryRecent(since: Date): JobRecord[] {
  const rows = getDatabase().prepare<[string], JobRow>(`
    SELECT ${JOB_COLUMNS} FROM jobs
    WHERE discovered_at >= ?
    ORDER BY discovered_at DESC, rowid DESC
  `).all(since.toISOString());
  return rows.map(toRecord);
}

/** Read-time filter on the persisted location text. */
export function queryAllMatching(
  locationPredicate: (location: string | null) => boolean = isTargetLocationText
): JobRecord[] {
  const rows = getDatabase().prepare<[], JobRow>(`
    SELECT ${JOB_COLUMNS} FROM jobs
    ORDER BY discovered_at DESC, rowid DESC
  `).all();
  return rows.filter(row => locationPredicate(row.location)).map(toRecord);
}

export function getJobById(id: string): JobRecord | null {
  const row = getDatabase().prepare<[string], JobRow>(
    `SELECT ${JOB_COLUMNS} FROM jobs WHERE id = ?`
  ).get(id);
  return row ? toRecord(row) : null;
}

/** The only mutation after insertion: the human-entered status and notes. */
export function updateJobStatus(id: string, update: { status?: JobStatus; notes?: string | null }): JobRecord | null {
  const database = getDatabase();
  const existing = getJobById(id);
  if (!existing) return null;

  database.prepare('UPDATE jobs SET status = ?, notes = ? WHERE id = ?').run(
    update.status ?? existing.status,
    update.notes !== undefined ? update.notes : existing.notes,
    id
  );
  return getJobById(id);
}

export interface JobStats {
  total: number;
  matching: number;
  byCompany: Record<string, number>;
  byStatus: Record<string, number>;
  lastScrape: string | null;
}

export function getJobStats(): JobStats {
  const database = getDatabase();

  const total = database.prepare<[], { c: number }>('SELECT COUNT(*) as c FROM jobs').get()?.c ?? 0;

  const locations = database.prepare<[], { location: string | null }>('SELECT location FROM jobs').all();
  const matching = locations.filter(row => isTargetLocationText(row.location)).length;

  const companies = database.prepare<[], { companyId: string; c: number }>(
    'SELECT company_id as companyId, COUNT(*) as c FROM jobs GROUP BY company_id ORDER BY c DESC'
  ).all();
  const byCompany: Record<string, number> = {};
  for (const row of companies) byCompany[row.companyId] = row.c;

  const statuses = database.prepare<[], { status: string; c: number }>(
    'SELECT status, COUNT(*) as c FROM jobs GROUP BY status'
  ).all();
  const byStatus: Record<string, number> = {};
  for (const row of statuses) byStatus[row.status] = row.c;

  const lastRun = database.prepare<[], { completedAt: string }>(
    'SELECT completed_at as completedAt FROM scrape_runs WHERE completed_at IS NOT NULL ORDER BY completed_at DESC LIMIT 1'
  ).get();

  return { total, matching, byCompany, byStatus, lastScrape: lastRun?.completedAt ?? null };
}

// --- Scrape Runs ---

export type RunStatus = 'running' | 'completed' | 'failed' | 'skipped';

export interface ScrapeRun {
  id: number;
  source: string;
  startedAt: string;
  completedAt: string | null;
  status: RunStatus;
  jobsFound: number;
  jobsNew: number;
  error: string | null;
}

export function startScrapeRun(source: string): number {
  const result = getDatabase().prepare(
    'INSERT INTO scrape_runs (source, started_at) VALUES (?, ?)'
  ).run(source, new Date().toISOString());
  return Number(result.lastInsertRowid);
}

export function completeScrapeRun(
  id: number,
  status: Exclude<RunStatus, 'running'>,
  jobsFound: number,
  jobsNew: number,
  error?: string
): void {
  getDatabase().prepare(`
    UPDATE scrape_runs SET completed_at = ?, status = ?, jobs_found = ?, jobs_new = ?, error = ?
    WHERE id = ?
  `).run(new Date().toISOString(), status, jobsFound, jobsNew, error ?? null, id);
}

export function getScrapeRuns(limit: number = 20): ScrapeRun[] {
  return getDatabase().prepare<[number], ScrapeRun>(`
    SELECT id, source, started_at as startedAt, completed_at as completedAt,
           status, jobs_found as jobsFound, jobs_new as jobsNew, error
    FROM scrape_runs ORDER BY started_at DESC, id DESC LIMIT ?
  `).all(limit);
}

/** The store operations the orchestrator depends on. */
export interface JobStore {
  submitJob(job: JobCandidate): SubmitResult;
  startScrapeRun(source: string): number;
  completeScrapeRun(
    id: number,
    status: Exclude<RunStatus, 'running'>,
    jobsFound: number,
    jobsNew: number,
    error?: string
  ): void;
}

export const sqliteStore: JobStore = {
  submitJob: job => submitJob(job),
  startScrapeRun,
  completeScrapeRun,
};
