import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

/**
 * Open the task database. Pass ':memory:' for a throwaway store.
 */
export function openDatabase(dataPath: string | ':memory:'): Database.Database {
  let db: Database.Database;

  if (dataPath === ':memory:') {
    db = new Database(':memory:');
  } else {
    // Ensure data directory exists
    if (!fs.existsSync(dataPath)) {
      fs.mkdirSync(dataPath, { recursive: true });
    }

    db = new Database(path.join(dataPath, 'orchestrator.db'));

    // Enable WAL mode for better concurrency
    db.pragma('journal_mode = WAL');
  }

  initSchema(db);
  return db;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS tasks (
      id TEXT PRIMARY KEY,
      engine_job_id TEXT,
      name TEXT NOT NULL,
      source_kind TEXT NOT NULL CHECK (source_kind IN ('torrent', 'magnet')),
      source_uri TEXT,
      source_data BLOB,
      info_hash TEXT,
      status TEXT NOT NULL DEFAULT 'queued',
      desired_state TEXT NOT NULL DEFAULT 'active',
      progress REAL NOT NULL DEFAULT 0,
      total_size INTEGER NOT NULL DEFAULT 0,
      completed_size INTEGER NOT NULL DEFAULT 0,
      download_speed INTEGER NOT NULL DEFAULT 0,
      upload_speed INTEGER NOT NULL DEFAULT 0,
      eta INTEGER,
      error_message TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      completed_at INTEGER,
      version INTEGER NOT NULL DEFAULT 0
    )
  `);

  // engine_job_id -> id stays injective
  db.exec(`
    CREATE UNIQUE INDEX IF NOT EXISTS idx_tasks_engine_job ON tasks(engine_job_id)
      WHERE engine_job_id IS NOT NULL;
    CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
    CREATE INDEX IF NOT EXISTS idx_tasks_info_hash ON tasks(info_hash);
    CREATE INDEX IF NOT EXISTS idx_tasks_created ON tasks(created_at);
  `);

  console.log('[DB] Schema initialized');
}
