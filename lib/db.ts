import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export type DB = Database.Database;

export const MEMORY_DATABASE = ':memory:';

function initializeDatabase(db: DB) {
  try {
    // Credential pool, written only by the import/deactivate job
    db.exec(`
      CREATE TABLE IF NOT EXISTS credentials (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        identity TEXT NOT NULL UNIQUE,
        secret TEXT NOT NULL,
        external_uid TEXT NOT NULL,
        external_key TEXT NOT NULL,
        issued_at TEXT NOT NULL,
        expires_at TEXT,
        active INTEGER NOT NULL DEFAULT 1
      );

      -- One row per rotating pool; the checkout path writes nothing else
      CREATE TABLE IF NOT EXISTS rotation_state (
        name TEXT PRIMARY KEY,
        cursor INTEGER NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS shared_parameters (
        name TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        signature TEXT NOT NULL,
        group_id TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS search_cache (
        keyword TEXT PRIMARY KEY,
        results TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        expire_at TEXT NOT NULL,
        hit_count INTEGER NOT NULL DEFAULT 0
      );
    `);

    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_credentials_active_id ON credentials(active, id);
      CREATE INDEX IF NOT EXISTS idx_search_cache_expire_at ON search_cache(expire_at);
    `);
  } catch (error) {
    console.error('[Database] Initialization error:', error);
    throw error;
  }
}

const isCorruptError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'SQLITE_CORRUPT';

/**
 * Opens (or creates) the database at `dbPath`. A corrupt file is moved aside
 * and replaced with an empty one.
 */
export function openDatabase(dbPath: string = MEMORY_DATABASE): DB {
  const inMemory = dbPath === MEMORY_DATABASE;
  const resolved = inMemory ? dbPath : path.resolve(process.cwd(), dbPath);
  if (!inMemory) fs.mkdirSync(path.dirname(resolved), { recursive: true });

  let db: DB;
  try {
    db = new Database(resolved);
  } catch (error) {
    if (!isCorruptError(error) || inMemory) throw error;
    console.error('[Database] Database corrupt, recreating...');
    fs.renameSync(resolved, `${resolved}.corrupted.${Date.now()}`);
    db = new Database(resolved);
  }

  if (!inMemory) db.pragma('journal_mode = WAL');
  initializeDatabase(db);
  return db;
}
