import { query, type Options, type SDKMessage } from '@anthropic-ai/claude-agent-sdk';
import type { PromptSpec } from '@bctgen/shared';
import { GenerationFailure, errorMessage } from '../errors.js';
import { toMessages } from './parse.js';
import type { GenerationPort } from './port.js';

/** What the adapter needs from one streamed SDK message. */
export type CompletionEvent =
  | { kind: 'text'; text: string }
  | { kind: 'result'; ok: true; result: string; costUsd: number }
  | { kind: 'result'; ok: false; subtype: string; costUsd: number };

export interface StreamOptions {
  model: string;
  maxTurns: number;
  cwd: string;
  env: Record<string, string>;
}

export type CompletionStream = (promptSpec: PromptSpec, options: StreamOptions) => AsyncIterable<CompletionEvent>;

export interface ClaudeGeneratorConfig {
  model: string;
  maxTurns: number;
  /** Passed to the SDK as ANTHROPIC_API_KEY; when absent the SDK's own login is used. */
  apiKey: string | undefined;
  cwd: string;
  /** Source of completion events. Defaults to the SDK's `query()`. */
  stream?: CompletionStream;
}

/**
 * GenerationPort backed by the Claude Agent SDK.
 * One query per call, no tools; the completion must be a numbered list of `count` messages.
 */
export class ClaudeGenerator implements GenerationPort {
  private totalCostUsd = 0;
  private readonly stream: CompletionStream;

  constructor(private readonly config: ClaudeGeneratorConfig) {
    this.stream = config.stream ?? sdkStream;
  }

  /** Sum of the costs the SDK reported across calls. */
  get costUsd(): number {
    return this.totalCostUsd;
  }

  async generate(promptSpec: PromptSpec, count: number): Promise<string[]> {
    let text: string;
    try {
      const events = this.stream(promptSpec, {
        model: this.config.model,
        maxTurns: this.config.maxTurns,
        cwd: this.config.cwd,
        env: buildEnv(this.config.apiKey),
      });
      text = await collectCompletion(events, cost => { this.totalCostUsd += cost; });
    } catch (err) {
      if (err instanceof GenerationFailure) throw err;
      throw new GenerationFailure(`Generation request failed: ${errorMessage(err)}`, { cause: err });
    }
    return toMessages(text, count);
  }
}

/**
 * Drain a completion stream into its text. The success result wins over the
 * streamed assistant text; a non-success result or empty text fails.
 */
export async function collectCompletion(
  events: AsyncIterable<CompletionEvent>,
  onCost: (costUsd: number) => void = () => {},
): Promise<string> {
  const textParts: string[] = [];
  let result: string | null = null;

  for await (const event of events) {
    if (event.kind === 'text') {
      textParts.push(event.text);
      continue;
    }
    onCost(event.costUsd);
    if (!event.ok) {
      // Turn limit or execution error: the completion did not finish normally.
      throw new GenerationFailure(`Generation did not complete (${event.subtype})`);
    }
    result = event.result;
  }

  const text = result || textParts.join('\n');
  if (!text.trim()) {
    throw new GenerationFailure('Generation returned no text');
  }
  return text;
}

/** Map one SDK message to the events the adapter reads. */
export function toCompletionEvents(message: SDKMessage): CompletionEvent[] {
  if (message.type === 'assistant') {
    const events: CompletionEvent[] = [];
    for (const block of message.message.content) {
      if (block.type === 'text') events.push({ kind: 'text', text: block.text });
    }
    return events;
  }
  if (message.type === 'result') {
    return message.subtype === 'success'
      ? [{ kind: 'result', ok: true, result: message.result, costUsd: message.total_cost_usd }]
      : [{ kind: 'result', ok: false, subtype: message.subtype, costUsd: message.total_cost_usd }];
  }
  return [];
}

/** SDK options for one tool-free, single-shot completion. */
export function queryOptions(promptSpec: PromptSpec, options: StreamOptions): Options {
  return {
    model: options.model,
    systemPrompt: promptSpec.systemPrompt,
    tools: [],
    maxTurns: options.maxTurns,
    persistSession: false,
    cwd: options.cwd,
    env: options.env,
  };
}

async function* sdkStream(promptSpec: PromptSpec, options: StreamOptions): AsyncGenerator<CompletionEvent> {
  const conversation = query({ prompt: promptSpec.userPrompt, options: queryOptions(promptSpec, options) });
  for await (const message of conversation) {
    yield* toCompletionEvents(message);
  }
}

function buildEnv(apiKey: string | undefined): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  if (apiKey) env.ANTHROPIC_API_KEY = apiKey;
  return env;
}
