import type { PromptSpec } from '@bctgen/shared';
import type { TaxonomyCode } from '../types.js';

export interface GenerationRequest {
  promptSpec: PromptSpec;
  code: TaxonomyCode;
  count: number;
}

/**
 * The text-generation capability the orchestrator drives.
 * Resolves to exactly `count` messages, or rejects with GenerationFailure.
 */
export interface GenerationPort {
  generate(promptSpec: PromptSpec, count: number): Promise<string[]>;
}
