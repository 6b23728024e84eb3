/**
 * SQLite database initialization and schema.
 */

import Database from "better-sqlite3";

export type DB = Database.Database;

export function initDatabase(path: string): DB {
  const db = new Database(path);

  // Enable WAL mode for better concurrent read performance
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  db.exec(`
    CREATE TABLE IF NOT EXISTS scraper_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_timestamp TEXT NOT NULL UNIQUE,
      run_date TEXT NOT NULL,
      total_attendees INTEGER NOT NULL,
      new_attendees INTEGER NOT NULL DEFAULT 0,
      updated_attendees INTEGER NOT NULL DEFAULT 0,
      status TEXT NOT NULL DEFAULT 'completed',
      error_message TEXT,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      metadata TEXT
    );

    CREATE TABLE IF NOT EXISTS attendees (
      id TEXT PRIMARY KEY,
      user_id TEXT,
      email TEXT,
      first_name TEXT,
      last_name TEXT,
      job_title TEXT,
      organization TEXT,
      biography TEXT,
      mobile_phone TEXT,
      landline_phone TEXT,
      website_url TEXT,
      photo_url TEXT,
      details TEXT NOT NULL DEFAULT '{}',
      socials TEXT NOT NULL DEFAULT '{}',
      first_seen_at TEXT NOT NULL,
      last_updated_at TEXT NOT NULL,
      last_seen_run_id INTEGER REFERENCES scraper_runs(id),
      update_count INTEGER NOT NULL DEFAULT 0,
      raw_data TEXT
    );

    CREATE TABLE IF NOT EXISTS attendee_changes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      attendee_id TEXT NOT NULL REFERENCES attendees(id) ON DELETE CASCADE,
      run_id INTEGER NOT NULL REFERENCES scraper_runs(id),
      field_name TEXT NOT NULL,
      old_value TEXT,
      new_value TEXT,
      changed_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_attendees_organization ON attendees(organization);
    CREATE INDEX IF NOT EXISTS idx_attendees_first_seen ON attendees(first_seen_at);
    CREATE INDEX IF NOT EXISTS idx_attendees_last_seen_run ON attendees(last_seen_run_id);
    CREATE INDEX IF NOT EXISTS idx_changes_attendee ON attendee_changes(attendee_id);
    CREATE INDEX IF NOT EXISTS idx_changes_run ON attendee_changes(run_id);
  `);

  return db;
}
