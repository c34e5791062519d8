import type Database from 'better-sqlite3';
import type { CodeOutcome, CodeOutcomeRecord, Run, RunStatus, RunSummary } from '../types.js';

/**
 * Ledger operations as named functions using prepared statements.
 * Each function takes a db instance so we can test with in-memory DBs.
 */

// ── Runs ─────────────────────────────────────────────────────

export function startRun(
  db: Database.Database,
  promptName: string,
  countPerCode: number,
  model: string | null,
): Run {
  const result = db.prepare(`
    INSERT INTO runs (prompt_name, count_per_code, model) VALUES (?, ?, ?)
  `).run(promptName, countPerCode, model);
  const run = getRun(db, Number(result.lastInsertRowid));
  if (!run) throw new Error('Failed to record run');
  return run;
}

export function finishRun(db: Database.Database, runId: number, status: Exclude<RunStatus, 'running'>): void {
  db.prepare(`
    UPDATE runs SET status = ?, finished_at = CURRENT_TIMESTAMP WHERE id = ?
  `).run(status, runId);
}

export function getRun(db: Database.Database, id: number): Run | null {
  return (db.prepare('SELECT * FROM runs WHERE id = ?').get(id) as Run | undefined) ?? null;
}

export function listRuns(db: Database.Database, promptName?: string): Run[] {
  if (promptName) {
    return db.prepare('SELECT * FROM runs WHERE prompt_name = ? ORDER BY id').all(promptName) as Run[];
  }
  return db.prepare('SELECT * FROM runs ORDER BY id').all() as Run[];
}

export function getLatestRun(db: Database.Database, promptName: string): Run | null {
  return (db.prepare(`
    SELECT * FROM runs WHERE prompt_name = ? ORDER BY id DESC LIMIT 1
  `).get(promptName) as Run | undefined) ?? null;
}

// ── Outcomes ─────────────────────────────────────────────────

export function recordOutcome(db: Database.Database, runId: number, outcome: CodeOutcome): void {
  db.prepare(`
    INSERT INTO code_outcomes (run_id, code, outcome, attempts, rows_written, error)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(runId, outcome.code, outcome.outcome, outcome.attempts, outcome.rows, outcome.error);
}

export function listOutcomesByRun(db: Database.Database, runId: number): CodeOutcomeRecord[] {
  return db.prepare(`
    SELECT * FROM code_outcomes WHERE run_id = ? ORDER BY id
  `).all(runId) as CodeOutcomeRecord[];
}

/**
 * Codes with a succeeded outcome in any run of this prompt configuration.
 * A code whose rows were written but whose outcome was never recorded is not listed.
 */
export function getCompletedCodes(db: Database.Database, promptName: string): Set<string> {
  const rows = db.prepare(`
    SELECT DISTINCT o.code FROM code_outcomes o
    JOIN runs r ON r.id = o.run_id
    WHERE r.prompt_name = ? AND o.outcome = 'succeeded'
  `).all(promptName) as Array<{ code: string }>;
  return new Set(rows.map(r => r.code));
}

export function summarizeRuns(db: Database.Database, promptName?: string): RunSummary[] {
  const stmt = db.prepare(`
    SELECT
      COALESCE(SUM(CASE WHEN outcome = 'succeeded' THEN 1 ELSE 0 END), 0) AS succeeded,
      COALESCE(SUM(CASE WHEN outcome = 'failed' THEN 1 ELSE 0 END), 0) AS failed,
      COALESCE(SUM(rows_written), 0) AS rows
    FROM code_outcomes WHERE run_id = ?
  `);
  return listRuns(db, promptName).map(run => {
    const counts = stmt.get(run.id) as { succeeded: number; failed: number; rows: number };
    return { run, ...counts };
  });
}
