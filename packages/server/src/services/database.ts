import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';

/** Opens (or creates) the capture database. Pass ':memory:' for a throwaway one. */
export function openDatabase(file: string): BetterSqlite3.Database {
  if (file !== ':memory:') fs.mkdirSync(path.dirname(file), { recursive: true });

  const db: BetterSqlite3.Database = new Database(file);

  // Performance settings
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS captures (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      frame_count INTEGER NOT NULL DEFAULT 0,
      time_start REAL,
      time_end REAL,
      created_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS capture_frames (
      capture_id TEXT NOT NULL REFERENCES captures(id) ON DELETE CASCADE,
      row INTEGER NOT NULL,
      frame TEXT NOT NULL,
      PRIMARY KEY (capture_id, row)
    );

    CREATE INDEX IF NOT EXISTS idx_captures_created ON captures(created_at);
  `);

  return db;
}
