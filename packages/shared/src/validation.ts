/**
 * Project readiness validation for bctgen.
 * Runs diagnostic checks and surfaces what's configured, what's missing,
 * and what the consequences are. Informational only; never blocks.
 */

import type { TemplateShape } from './template.js';

export interface ValidationCheck {
  label: string;
  status: 'pass' | 'warn' | 'fail';
  detail: string;
}

/**
 * Validate project readiness given config and filesystem checks.
 * Accepts pre-resolved values so the caller handles fs logic.
 */
export function validateProject(checks: {
  hasConfig: boolean;
  promptName: string;
  promptShape: TemplateShape | null;
  promptError: string | null;
  placeholders: string[];
  taxonomyCount: number;
  taxonomyError: string | null;
  hasApiKey: boolean;
  dataDirWritable: boolean;
}): ValidationCheck[] {
  const results: ValidationCheck[] = [];

  results.push(checks.hasConfig
    ? { label: 'Config', status: 'pass', detail: 'Found .bctgen/config.json' }
    : { label: 'Config', status: 'warn', detail: 'Not found — using defaults. Run `bctgen init` to create one' }
  );

  // Prompt template
  if (checks.promptShape) {
    const shape = checks.promptShape === 'separated' ? 'separator layout' : 'two-line layout';
    results.push({ label: `Prompt "${checks.promptName}"`, status: 'pass', detail: `Parsed (${shape})` });
  } else {
    results.push({ label: `Prompt "${checks.promptName}"`, status: 'fail', detail: checks.promptError ?? 'Not found' });
  }

  if (checks.promptShape) {
    const unknown = checks.placeholders.filter(p => !KNOWN_PLACEHOLDERS.includes(p));
    if (unknown.length > 0) {
      results.push({ label: 'Placeholders', status: 'warn', detail: `Unknown placeholder(s) left as written: ${unknown.join(', ')}` });
    } else if (!checks.placeholders.includes('num_messages')) {
      results.push({ label: 'Placeholders', status: 'warn', detail: 'No {num_messages} — the model is not told how many messages to write' });
    } else {
      results.push({ label: 'Placeholders', status: 'pass', detail: checks.placeholders.join(', ') });
    }
  }

  // Taxonomy
  if (checks.taxonomyError) {
    results.push({ label: 'Taxonomy', status: 'fail', detail: checks.taxonomyError });
  } else if (checks.taxonomyCount === 0) {
    results.push({ label: 'Taxonomy', status: 'fail', detail: 'No codes — add rows (No,Label,Definition) to the taxonomy file' });
  } else {
    results.push({ label: 'Taxonomy', status: 'pass', detail: `${checks.taxonomyCount} code(s)` });
  }

  results.push(checks.hasApiKey
    ? { label: 'API key', status: 'pass', detail: 'ANTHROPIC_API_KEY is set' }
    : { label: 'API key', status: 'warn', detail: 'ANTHROPIC_API_KEY not set — generation relies on an existing Claude login' }
  );

  results.push(checks.dataDirWritable
    ? { label: 'Data directory', status: 'pass', detail: 'Writable' }
    : { label: 'Data directory', status: 'fail', detail: 'Not writable — tables cannot be created' }
  );

  return results;
}

export const KNOWN_PLACEHOLDERS = ['bct_code', 'bct_label', 'bct_definition', 'num_messages'];

// Local NO_COLOR gate; shared does not import from bctgen.
const _useColor = !process.env.NO_COLOR && (process.stderr?.isTTY !== false);

/**
 * Format validation results for terminal output.
 */
export function formatValidation(checks: ValidationCheck[]): string {
  const lines: string[] = [];
  for (const c of checks) {
    const icon = c.status === 'pass' ? (_useColor ? '\x1b[32m✓\x1b[0m' : '✓')
               : c.status === 'warn' ? (_useColor ? '\x1b[33m⚠\x1b[0m' : '⚠')
               : (_useColor ? '\x1b[31m✗\x1b[0m' : '✗');
    lines.push(`  ${icon} ${c.label}: ${c.detail}`);
  }
  return lines.join('\n');
}

export function hasFailures(checks: ValidationCheck[]): boolean {
  return checks.some(c => c.status === 'fail');
}
