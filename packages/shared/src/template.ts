/**
 * Prompt template parsing.
 *
 * Two layouts are accepted:
 *   - two-line: line 1 is the system prompt, line 2 the user prompt
 *   - separated: a line of five or more `=` splits system (above) from user (below)
 *
 * The layout is detected once and carried on the result as `shape`.
 */

export interface PromptSpec {
  readonly systemPrompt: string;
  readonly userPrompt: string;
}

export type TemplateShape = 'two_line' | 'separated';

export interface ParsedTemplate {
  shape: TemplateShape;
  spec: PromptSpec;
}

export const SEPARATOR_PATTERN = /^=====+$/;

const PLACEHOLDER_PATTERN = /\{([a-z_][a-z0-9_]*)\}/gi;

export class MalformedTemplateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedTemplateError';
  }
}

function freezeSpec(systemPrompt: string, userPrompt: string): PromptSpec {
  return Object.freeze({ systemPrompt, userPrompt });
}

export function parsePromptTemplate(rawText: string): ParsedTemplate {
  const lines = rawText.split(/\r?\n/);
  const sepIdx = lines.findIndex(line => SEPARATOR_PATTERN.test(line.trim()));

  if (sepIdx >= 0) {
    const systemPrompt = lines.slice(0, sepIdx).join('\n').trim();
    const userPrompt = lines.slice(sepIdx + 1).join('\n').trim();
    if (!systemPrompt) {
      throw new MalformedTemplateError('Template has a separator line but no system prompt above it');
    }
    if (!userPrompt) {
      throw new MalformedTemplateError('Template has a separator line but no user prompt below it');
    }
    return { shape: 'separated', spec: freezeSpec(systemPrompt, userPrompt) };
  }

  const nonEmpty = lines.map(l => l.trim()).filter(Boolean);
  if (nonEmpty.length < 2) {
    throw new MalformedTemplateError(
      `Template needs a system and a user prompt (found ${nonEmpty.length} non-empty line(s) and no "=====" separator)`,
    );
  }
  return { shape: 'two_line', spec: freezeSpec(nonEmpty[0], nonEmpty[1]) };
}

export function parsePrompt(rawText: string): PromptSpec {
  return parsePromptTemplate(rawText).spec;
}

/**
 * Substitute `{name}` placeholders in both prompts.
 * Placeholders without a value are left as written.
 */
export function renderPrompt(spec: PromptSpec, vars: Record<string, string>): PromptSpec {
  const fill = (text: string): string =>
    text.replace(PLACEHOLDER_PATTERN, (match, name: string) =>
      Object.prototype.hasOwnProperty.call(vars, name) ? vars[name] : match,
    );
  return freezeSpec(fill(spec.systemPrompt), fill(spec.userPrompt));
}

export function listPlaceholders(spec: PromptSpec): string[] {
  const names = new Set<string>();
  for (const text of [spec.systemPrompt, spec.userPrompt]) {
    for (const m of text.matchAll(PLACEHOLDER_PATTERN)) names.add(m[1]);
  }
  return [...names].sort();
}
