export interface BctgenConfig {
  paths: {
    prompts: string;
    data: string;
    taxonomy: string;
  };
  generation: {
    model: string;
    max_turns: number;
    default_count: number;
  };
}

/** Opaque identifier of one behavior change technique, e.g. "1.1". */
export type TaxonomyCode = string;

export interface TaxonomyEntry {
  code: TaxonomyCode;
  label: string;
  definition: string;
}

export type Outcome = 'succeeded' | 'failed';

export interface CodeOutcome {
  code: TaxonomyCode;
  outcome: Outcome;
  attempts: number;
  rows: number;
  error: string | null;
}

export type RunStatus = 'running' | 'completed' | 'aborted';

export interface Run {
  id: number;
  prompt_name: string;
  count_per_code: number;
  model: string | null;
  status: RunStatus;
  started_at: string;
  finished_at: string | null;
}

export interface CodeOutcomeRecord {
  id: number;
  run_id: number;
  code: string;
  outcome: Outcome;
  attempts: number;
  rows_written: number;
  error: string | null;
  recorded_at: string;
}

export interface RunSummary {
  run: Run;
  succeeded: number;
  failed: number;
  rows: number;
}
