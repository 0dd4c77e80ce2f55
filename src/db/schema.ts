import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export function initializeDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);

  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  // id is the identity key; url is unique on its own as well
  db.exec(`
    CREATE TABLE IF NOT EXISTS jobs (
      id TEXT PRIMARY KEY,
      company_id TEXT NOT NULL,
      title TEXT NOT NULL,
      url TEXT NOT NULL UNIQUE,
      location TEXT,
      department TEXT,
      posted_date TEXT,
      discovered_at TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      is_target_location INTEGER NOT NULL DEFAULT 0,
      is_target_role INTEGER NOT NULL DEFAULT 0,
      mentions_visa_support INTEGER NOT NULL DEFAULT 0,
      mentions_relocation INTEGER NOT NULL DEFAULT 0,
      status TEXT NOT NULL DEFAULT 'new',
      notes TEXT
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS scrape_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source TEXT NOT NULL,
      started_at TEXT NOT NULL,
      completed_at TEXT,
      status TEXT NOT NULL DEFAULT 'running',
      jobs_found INTEGER DEFAULT 0,
      jobs_new INTEGER DEFAULT 0,
      error TEXT
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_jobs_company ON jobs(company_id);
    CREATE INDEX IF NOT EXISTS idx_jobs_discovered ON jobs(discovered_at);
    CREATE INDEX IF NOT EXISTS idx_scrape_runs_started ON scrape_runs(started_at);
  `);

  return db;
}

export type { Database };
