import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { PromptSpec } from '@bctgen/shared';
import { GenerationFailure } from '../errors.js';
import type { GenerationPort } from '../generation/port.js';

export interface FakeCall {
  promptSpec: PromptSpec;
  count: number;
}

/**
 * In-process GenerationPort. Produces `count` messages named after the prompt,
 * failing the first `failures(userPrompt)` calls for a given user prompt.
 */
export class FakeGenerator implements GenerationPort {
  readonly calls: FakeCall[] = [];
  private readonly failuresSoFar = new Map<string, number>();

  constructor(private readonly failures: (userPrompt: string) => number = () => 0) {}

  async generate(promptSpec: PromptSpec, count: number): Promise<string[]> {
    this.calls.push({ promptSpec, count });
    const key = promptSpec.userPrompt;
    const failed = this.failuresSoFar.get(key) ?? 0;
    if (failed < this.failures(key)) {
      this.failuresSoFar.set(key, failed + 1);
      throw new GenerationFailure(`service unavailable (${key})`);
    }
    return Array.from({ length: count }, (_, i) => `${key} #${i + 1}`);
  }
}

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `bctgen-${prefix}-`));
}

export function removeTmpDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
