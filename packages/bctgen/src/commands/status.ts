import * as fs from 'node:fs';
import * as path from 'node:path';
import type Database from 'better-sqlite3';
import { getFlagValue, loadConfig, resolveRoot, validatePromptName } from '../config.js';
import { getDb, closeDb } from '../db/connection.js';
import { getLatestRun, summarizeRuns } from '../db/queries.js';
import { DatasetStore, countRows } from '../dataset/table.js';
import type { Run, RunSummary } from '../types.js';
import * as fmt from '../output/format.js';

export interface DatasetStatus {
  prompt: string;
  tables: Array<{ code: string; rows: number }>;
  totalRows: number;
}

export interface StatusReport {
  runs: RunSummary[];
  /** Most recent run of the requested prompt; null without --prompt or when it never ran. */
  latest: Run | null;
  datasets: DatasetStatus[];
}

export async function status(args: string[], isJson: boolean): Promise<void> {
  const root = resolveRoot();
  const config = loadConfig(root);
  const promptName = getFlagValue(args, '--prompt', '-p');

  let report: StatusReport;
  try {
    report = collectStatus(getDb(root), path.resolve(root, config.paths.data), promptName);
  } finally {
    closeDb();
  }

  if (isJson) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  fmt.header('Dataset Status');

  if (report.runs.length === 0) {
    console.log('  No runs recorded.\n');
  } else {
    const rows = report.runs.map(s => [
      String(s.run.id),
      s.run.prompt_name,
      String(s.run.count_per_code),
      fmt.outcomeColor(s.run.status),
      String(s.succeeded),
      s.failed > 0 ? fmt.red(String(s.failed)) : '0',
      String(s.rows),
      s.run.started_at,
    ]);
    console.log(fmt.table(['Run', 'Prompt', 'Count', 'Status', 'OK', 'Failed', 'Rows', 'Started'], rows));
    console.log();
  }

  if (report.latest) {
    const { id, status: runStatus, finished_at } = report.latest;
    console.log(`  Latest run: #${id} ${fmt.outcomeColor(runStatus)}${finished_at ? ` at ${finished_at}` : ''}\n`);
  }

  if (report.datasets.length === 0) {
    console.log(`  ${fmt.dim('No dataset tables on disk.')}`);
    return;
  }
  for (const ds of report.datasets) {
    console.log(`  ${fmt.bold(ds.prompt)}: ${ds.tables.length} table(s), ${ds.totalRows} row(s)`);
  }
}

export function collectStatus(db: Database.Database, dataDir: string, promptName?: string): StatusReport {
  const datasets = collectDatasets(dataDir, promptName);
  return {
    runs: summarizeRuns(db, promptName),
    latest: promptName ? getLatestRun(db, promptName) : null,
    datasets,
  };
}

/** Row counts per table for each prompt configuration under the data directory. */
export function collectDatasets(dataDir: string, promptName?: string): DatasetStatus[] {
  if (promptName !== undefined) validatePromptName(promptName);
  if (!fs.existsSync(dataDir)) return [];
  const prompts = promptName
    ? [promptName]
    : fs.readdirSync(dataDir, { withFileTypes: true }).filter(d => d.isDirectory()).map(d => d.name).sort();

  return prompts.map(prompt => {
    const store = new DatasetStore(path.join(dataDir, prompt));
    const tables = store.listCodes().map(code => ({ code, rows: countRows(store.pathFor(code)) }));
    return { prompt, tables, totalRows: tables.reduce((sum, t) => sum + t.rows, 0) };
  });
}
