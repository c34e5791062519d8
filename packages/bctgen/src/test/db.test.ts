import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type Database from 'better-sqlite3';
import { openTestDb, getDb, closeDb } from '../db/connection.js';
import { SCHEMA_VERSION } from '../db/migrations.js';
import {
  startRun,
  finishRun,
  getRun,
  listRuns,
  getLatestRun,
  recordOutcome,
  listOutcomesByRun,
  getCompletedCodes,
  summarizeRuns,
} from '../db/queries.js';
import { makeTmpDir, removeTmpDir } from './helpers.js';

let db: Database.Database;

beforeEach(() => {
  db = openTestDb();
});

afterEach(() => {
  db.close();
});

describe('Migrations', () => {
  it('creates the ledger tables', () => {
    const tables = db.prepare(`
      SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'
    `).all() as Array<{ name: string }>;
    assert.deepEqual(tables.map(t => t.name).sort(), ['code_outcomes', 'runs']);
  });

  it('sets user_version to the schema version', () => {
    assert.equal(db.pragma('user_version', { simple: true }), SCHEMA_VERSION);
  });
});

describe('Runs', () => {
  it('starts a run in running state', () => {
    const run = startRun(db, 'baseline', 10, 'sonnet');
    assert.equal(run.prompt_name, 'baseline');
    assert.equal(run.count_per_code, 10);
    assert.equal(run.model, 'sonnet');
    assert.equal(run.status, 'running');
    assert.equal(run.finished_at, null);
  });

  it('finishes a run', () => {
    const run = startRun(db, 'baseline', 10, null);
    finishRun(db, run.id, 'aborted');
    const updated = getRun(db, run.id);
    assert.equal(updated?.status, 'aborted');
    assert.notEqual(updated?.finished_at, null);
  });

  it('rejects a non-positive count', () => {
    assert.throws(() => startRun(db, 'baseline', 0, null));
  });

  it('lists runs per prompt and finds the latest', () => {
    startRun(db, 'baseline', 10, null);
    const other = startRun(db, 'variant', 5, null);
    const latest = startRun(db, 'baseline', 3, null);
    assert.equal(listRuns(db).length, 3);
    assert.deepEqual(listRuns(db, 'variant').map(r => r.id), [other.id]);
    assert.equal(getLatestRun(db, 'baseline')?.id, latest.id);
    assert.equal(getLatestRun(db, 'missing'), null);
  });
});

describe('Outcomes', () => {
  it('records outcomes in order', () => {
    const run = startRun(db, 'baseline', 2, null);
    recordOutcome(db, run.id, { code: '1.1', outcome: 'succeeded', attempts: 1, rows: 2, error: null });
    recordOutcome(db, run.id, { code: '1.2', outcome: 'failed', attempts: 2, rows: 0, error: 'timeout' });
    const rows = listOutcomesByRun(db, run.id);
    assert.deepEqual(
      rows.map(r => [r.code, r.outcome, r.attempts, r.rows_written, r.error]),
      [['1.1', 'succeeded', 1, 2, null], ['1.2', 'failed', 2, 0, 'timeout']],
    );
  });

  it('completed codes span runs of one prompt only', () => {
    const first = startRun(db, 'baseline', 2, null);
    recordOutcome(db, first.id, { code: '1.1', outcome: 'succeeded', attempts: 1, rows: 2, error: null });
    recordOutcome(db, first.id, { code: '1.2', outcome: 'failed', attempts: 2, rows: 0, error: 'x' });
    const second = startRun(db, 'baseline', 2, null);
    recordOutcome(db, second.id, { code: '2.1', outcome: 'succeeded', attempts: 2, rows: 2, error: null });
    const other = startRun(db, 'variant', 2, null);
    recordOutcome(db, other.id, { code: '3.1', outcome: 'succeeded', attempts: 1, rows: 2, error: null });

    assert.deepEqual([...getCompletedCodes(db, 'baseline')].sort(), ['1.1', '2.1']);
  });

  it('summarizes runs', () => {
    const run = startRun(db, 'baseline', 3, null);
    recordOutcome(db, run.id, { code: '1.1', outcome: 'succeeded', attempts: 1, rows: 3, error: null });
    recordOutcome(db, run.id, { code: '1.2', outcome: 'succeeded', attempts: 2, rows: 3, error: null });
    recordOutcome(db, run.id, { code: '1.3', outcome: 'failed', attempts: 2, rows: 0, error: 'x' });
    const empty = startRun(db, 'baseline', 3, null);

    const [full, none] = summarizeRuns(db, 'baseline');
    assert.equal(full.run.id, run.id);
    assert.deepEqual([full.succeeded, full.failed, full.rows], [2, 1, 6]);
    assert.equal(none.run.id, empty.id);
    assert.deepEqual([none.succeeded, none.failed, none.rows], [0, 0, 0]);
  });
});

describe('getDb()', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir('db');
  });

  afterEach(() => {
    closeDb();
    removeTmpDir(tmpDir);
  });

  it('creates .bctgen/ledger.db under the project root and persists across connections', () => {
    const run = startRun(getDb(tmpDir), 'baseline', 1, null);
    closeDb();
    assert.ok(fs.existsSync(path.join(tmpDir, '.bctgen', 'ledger.db')));
    assert.equal(getRun(getDb(tmpDir), run.id)?.prompt_name, 'baseline');
  });

  it('returns the same connection for the same root', () => {
    assert.equal(getDb(tmpDir), getDb(tmpDir));
  });
});
