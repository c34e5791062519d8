import * as fs from 'node:fs';
import type Database from 'better-sqlite3';
import { parsePromptTemplate, renderPrompt, type TemplateShape } from '@bctgen/shared';
import {
  getFlagValue,
  hasFlag,
  loadConfig,
  parseCount,
  promptPaths,
  resolveRoot,
  taxonomyPath,
} from '../config.js';
import { getDb, closeDb } from '../db/connection.js';
import { finishRun, getCompletedCodes, recordOutcome, startRun } from '../db/queries.js';
import { DatasetStore } from '../dataset/table.js';
import { ClaudeGenerator } from '../generation/claude.js';
import type { GenerationPort } from '../generation/port.js';
import { Orchestrator, type PromptRenderer } from '../orchestrator.js';
import { CodeState } from '../state/types.js';
import { loadTaxonomy, parseCodeList, selectCodes } from '../taxonomy/loader.js';
import type { CodeOutcome, Run, TaxonomyEntry } from '../types.js';
import * as fmt from '../output/format.js';

export const DEFAULT_PROMPT = 'baseline';
const PREVIEW_COUNT = 5;

export interface GenerationJob {
  root: string;
  db: Database.Database;
  generator: GenerationPort;
  promptName: string;
  count: number;
  model: string | null;
  from?: string;
  only?: string[];
  resume?: boolean;
}

export interface GenerationReport {
  run: Run;
  shape: TemplateShape;
  skipped: string[];
  outcomes: CodeOutcome[];
}

/**
 * `bctgen generate` — generate messages for every selected taxonomy code.
 * Returns the per-code outcomes; failed codes are reported, not thrown.
 */
export async function generate(args: string[]): Promise<CodeOutcome[]> {
  const root = resolveRoot();
  const config = loadConfig(root);
  const model = getFlagValue(args, '--model') ?? config.generation.model;
  const only = getFlagValue(args, '--only');

  const generator = new ClaudeGenerator({
    model,
    maxTurns: config.generation.max_turns,
    apiKey: process.env.ANTHROPIC_API_KEY,
    cwd: root,
  });

  try {
    const report = await runGeneration({
      root,
      db: getDb(root),
      generator,
      promptName: getFlagValue(args, '--prompt', '-p') ?? DEFAULT_PROMPT,
      count: parseCount(getFlagValue(args, '--num', '-n'), config.generation.default_count),
      model,
      from: getFlagValue(args, '--from'),
      only: only ? parseCodeList(only) : undefined,
      resume: hasFlag(args, '--resume'),
    });
    fmt.info(`Reported cost: $${generator.costUsd.toFixed(4)}`);
    return report.outcomes;
  } finally {
    closeDb();
  }
}

export async function runGeneration(job: GenerationJob): Promise<GenerationReport> {
  const config = loadConfig(job.root);
  const { templateFile, datasetDir } = promptPaths(job.root, config, job.promptName);

  if (!fs.existsSync(templateFile)) {
    throw new Error(`Prompt template not found: ${templateFile}`);
  }
  // Malformed templates abort here, before any generation call.
  const template = parsePromptTemplate(fs.readFileSync(templateFile, 'utf-8'));

  const taxonomy = loadTaxonomy(taxonomyPath(job.root, config));
  const completed = job.resume ? getCompletedCodes(job.db, job.promptName) : new Set<string>();
  const candidates = selectCodes(taxonomy, { from: job.from, only: job.only });
  const selected = selectCodes(candidates, { exclude: completed });
  const skipped = candidates.filter(e => completed.has(e.code)).map(e => e.code);

  fmt.info(`System prompt: ${template.spec.systemPrompt}`);
  fmt.info(`User prompt: ${template.spec.userPrompt}`);
  fmt.header(`Generating "${job.promptName}" — ${job.count} message(s) for each of ${selected.length} code(s)`);
  if (skipped.length > 0) {
    fmt.info(`Skipping ${skipped.length} code(s) completed in earlier runs`);
  }

  const run = startRun(job.db, job.promptName, job.count, job.model);
  const orchestrator = new Orchestrator({
    generator: job.generator,
    store: new DatasetStore(datasetDir),
    render: taxonomyRenderer(taxonomy),
    onOutcome: (outcome) => recordOutcome(job.db, run.id, outcome),
    onStateChange: (code, state, error) => {
      if (state === CodeState.REQUESTING) fmt.info(`[${code}] requesting...`);
      else if (state === CodeState.RETRYING) fmt.warn(`[${code}] ${error ?? 'failed'} (retrying once)`);
      else if (state === CodeState.FAILED) fmt.warn(`[${code}] ${error ?? 'failed'} (skipped)`);
    },
    onMessages: (_code, messages) => {
      messages.slice(0, PREVIEW_COUNT).forEach((m, i) => {
        console.log(`  ${fmt.dim(`${i + 1}.`)} ${fmt.preview(m)}`);
      });
    },
  });

  let outcomes: CodeOutcome[];
  try {
    outcomes = await orchestrator.run(template.spec, selected.map(e => e.code), job.count);
  } catch (err) {
    finishRun(job.db, run.id, 'aborted');
    throw err;
  }
  finishRun(job.db, run.id, 'completed');

  reportOutcomes(outcomes, datasetDir);
  return { run: { ...run, status: 'completed' }, shape: template.shape, skipped, outcomes };
}

/** Fill the taxonomy placeholders for each code. */
export function taxonomyRenderer(taxonomy: TaxonomyEntry[]): PromptRenderer {
  const byCode = new Map(taxonomy.map(e => [e.code, e]));
  return (promptSpec, code, count) => {
    const entry = byCode.get(code);
    return renderPrompt(promptSpec, {
      bct_code: code,
      bct_label: entry?.label ?? '',
      bct_definition: entry?.definition ?? '',
      num_messages: String(count),
    });
  };
}

function reportOutcomes(outcomes: CodeOutcome[], datasetDir: string): void {
  const failed = outcomes.filter(o => o.outcome === 'failed');
  const rows = outcomes.reduce((sum, o) => sum + o.rows, 0);

  fmt.header('Generation complete');
  fmt.info(`${outcomes.length - failed.length}/${outcomes.length} code(s) succeeded, ${rows} row(s) written to ${datasetDir}`);
  if (failed.length > 0) {
    console.log(fmt.table(
      ['Code', 'Attempts', 'Error'],
      failed.map(o => [o.code, String(o.attempts), o.error ?? '']),
    ));
    fmt.warn(`${failed.length} code(s) failed. Re-run with --resume to retry only the missing codes.`);
  } else {
    fmt.success('All codes succeeded.');
  }
}
