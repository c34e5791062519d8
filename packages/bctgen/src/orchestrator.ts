import { renderPrompt, type PromptSpec } from '@bctgen/shared';
import type { DatasetStore } from './dataset/table.js';
import { GenerationFailure, errorMessage } from './errors.js';
import type { GenerationPort, GenerationRequest } from './generation/port.js';
import { afterFailure, isTerminal, transition } from './state/machine.js';
import { CodeState, MAX_ATTEMPTS } from './state/types.js';
import type { CodeOutcome, TaxonomyCode } from './types.js';

export type PromptRenderer = (promptSpec: PromptSpec, code: TaxonomyCode, count: number) => PromptSpec;

export interface OrchestratorOptions {
  generator: GenerationPort;
  store: DatasetStore;
  /** Per-code prompt customization. Defaults to filling {bct_code} and {num_messages}. */
  render?: PromptRenderer;
  /** Called once per code after its rows are on disk (or it has failed). */
  onOutcome?: (outcome: CodeOutcome) => void;
  onStateChange?: (code: TaxonomyCode, state: CodeState, error?: string) => void;
  /** Called with the messages of a code before they are written. */
  onMessages?: (code: TaxonomyCode, messages: string[]) => void;
}

export const defaultRenderer: PromptRenderer = (promptSpec, code, count) =>
  renderPrompt(promptSpec, { bct_code: code, num_messages: String(count) });

/**
 * Drives generation code by code: one request per code, one immediate retry on
 * GenerationFailure, then skip. Anything else (including PersistenceFailure) aborts the run.
 */
export class Orchestrator {
  private readonly render: PromptRenderer;

  constructor(private readonly opts: OrchestratorOptions) {
    this.render = opts.render ?? defaultRenderer;
  }

  async run(promptSpec: PromptSpec, codes: Iterable<TaxonomyCode>, countPerCode: number): Promise<CodeOutcome[]> {
    if (!Number.isInteger(countPerCode) || countPerCode <= 0) {
      throw new RangeError(`countPerCode must be a positive integer, got ${countPerCode}`);
    }

    const outcomes: CodeOutcome[] = [];
    for (const code of codes) {
      const request: GenerationRequest = {
        promptSpec: this.render(promptSpec, code, countPerCode),
        code,
        count: countPerCode,
      };
      const outcome = await this.processCode(request);
      outcomes.push(outcome);
      this.opts.onOutcome?.(outcome);
    }
    return outcomes;
  }

  private async processCode(request: GenerationRequest): Promise<CodeOutcome> {
    const { code } = request;
    let state = CodeState.PENDING;
    let attempts = 0;
    let lastError: string | null = null;

    const move = (target: CodeState, error?: string): void => {
      state = transition(state, target);
      this.opts.onStateChange?.(code, state, error);
    };

    move(CodeState.REQUESTING);
    let rows = 0;
    while (!isTerminal(state)) {
      attempts++;
      let messages: string[];
      try {
        messages = await this.opts.generator.generate(request.promptSpec, request.count);
      } catch (err) {
        if (!(err instanceof GenerationFailure)) throw err;
        lastError = errorMessage(err);
        state = afterFailure(state, attempts, MAX_ATTEMPTS);
        this.opts.onStateChange?.(code, state, lastError);
        continue;
      }

      this.opts.onMessages?.(code, messages);
      rows = this.persist(code, messages);
      move(CodeState.SUCCEEDED);
    }

    return state === CodeState.SUCCEEDED
      ? { code, outcome: 'succeeded', attempts, rows, error: null }
      : { code, outcome: 'failed', attempts, rows: 0, error: lastError };
  }

  private persist(code: TaxonomyCode, messages: string[]): number {
    const { store } = this.opts;
    const handle = store.open(code);
    try {
      for (const message of messages) {
        store.append(handle, message);
      }
    } finally {
      store.close(handle);
    }
    return handle.rows;
  }
}
