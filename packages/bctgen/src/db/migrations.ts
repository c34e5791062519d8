import type Database from 'better-sqlite3';

/**
 * Migrations keyed on the user_version pragma.
 * Each migration is an array index: migration[0] upgrades from version 0 to 1, etc.
 */

type Migration = (db: Database.Database) => void;

const migrations: Migration[] = [
  // Migration 001: v0 → v1, runs and per-code outcomes
  (db) => {
    db.exec(`
      CREATE TABLE runs (
        id INTEGER PRIMARY KEY,
        prompt_name TEXT NOT NULL,
        count_per_code INTEGER NOT NULL CHECK(count_per_code > 0),
        model TEXT,
        status TEXT NOT NULL DEFAULT 'running' CHECK(
          status IN ('running', 'completed', 'aborted')
        ),
        started_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        finished_at DATETIME
      );

      CREATE TABLE code_outcomes (
        id INTEGER PRIMARY KEY,
        run_id INTEGER NOT NULL REFERENCES runs(id),
        code TEXT NOT NULL,
        outcome TEXT NOT NULL CHECK(outcome IN ('succeeded', 'failed')),
        attempts INTEGER NOT NULL,
        rows_written INTEGER NOT NULL DEFAULT 0,
        error TEXT,
        recorded_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX idx_runs_prompt ON runs(prompt_name);
      CREATE INDEX idx_outcomes_run ON code_outcomes(run_id);
    `);
  },
];

export const SCHEMA_VERSION = migrations.length;

/**
 * Run all pending migrations. Uses user_version pragma for tracking.
 */
export function runMigrations(db: Database.Database): void {
  const currentVersion = Number(db.pragma('user_version', { simple: true }));

  for (let i = currentVersion; i < migrations.length; i++) {
    db.transaction(() => {
      migrations[i](db);
      db.pragma(`user_version = ${i + 1}`);
    })();
  }
}
