import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';
import { runMigrations } from './migrations.js';
import { CONFIG_DIR } from '../config.js';

let _db: Database.Database | null = null;
let _dbRoot: string | null = null;

/**
 * Get the ledger connection for a project root.
 * Opens .bctgen/ledger.db with WAL mode and foreign keys.
 * Auto-runs migrations on first connection.
 */
export function getDb(projectRoot: string): Database.Database {
  if (_db && _dbRoot === projectRoot) return _db;
  closeDb();

  const dir = path.join(projectRoot, CONFIG_DIR);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  _db = new Database(path.join(dir, 'ledger.db'));
  _db.pragma('journal_mode = WAL');
  _db.pragma('foreign_keys = ON');
  runMigrations(_db);
  _dbRoot = projectRoot;

  return _db;
}

/**
 * Close the ledger connection.
 */
export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
    _dbRoot = null;
  }
}

/**
 * Open a fresh in-memory database for testing. Does NOT set the singleton.
 */
export function openTestDb(): Database.Database {
  const db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  return db;
}
