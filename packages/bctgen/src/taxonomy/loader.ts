import * as fs from 'node:fs';
import { parseCsv } from '../dataset/csv.js';
import type { TaxonomyCode, TaxonomyEntry } from '../types.js';

const COLUMNS = { code: 'no', label: 'label', definition: 'definition' } as const;

/**
 * Load the technique taxonomy from a CSV file with `No`, `Label` and
 * `Definition` columns (header names are case-insensitive, extra columns ignored).
 * Entries keep file order; rows without a code are skipped.
 */
export function loadTaxonomy(filePath: string): TaxonomyEntry[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Taxonomy file not found: ${filePath}`);
  }
  return parseTaxonomy(fs.readFileSync(filePath, 'utf-8'), filePath);
}

export function parseTaxonomy(text: string, source = 'taxonomy'): TaxonomyEntry[] {
  const [headerRow, ...rows] = parseCsv(text.replace(/^\uFEFF/, ''));
  if (!headerRow) return [];

  const header = headerRow.map(h => h.trim().toLowerCase());
  const idx = {
    code: header.indexOf(COLUMNS.code),
    label: header.indexOf(COLUMNS.label),
    definition: header.indexOf(COLUMNS.definition),
  };
  const missing = (['code', 'label', 'definition'] as const)
    .filter(k => idx[k] < 0)
    .map(k => COLUMNS[k]);
  if (missing.length > 0) {
    throw new Error(`${source}: missing column(s) ${missing.join(', ')}`);
  }

  const entries: TaxonomyEntry[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    const code = (row[idx.code] ?? '').trim();
    if (!code) continue;
    if (seen.has(code)) {
      throw new Error(`${source}: duplicate code ${code}`);
    }
    seen.add(code);
    entries.push({
      code,
      label: (row[idx.label] ?? '').trim(),
      definition: (row[idx.definition] ?? '').trim(),
    });
  }
  return entries;
}

export interface CodeSelection {
  /** Start at this code, skipping the ones before it. */
  from?: TaxonomyCode;
  /** Keep only these codes (taxonomy order is preserved). */
  only?: TaxonomyCode[];
  /** Drop these codes, e.g. ones a previous run completed. */
  exclude?: Iterable<TaxonomyCode>;
}

export function selectCodes(entries: TaxonomyEntry[], selection: CodeSelection = {}): TaxonomyEntry[] {
  const known = new Set(entries.map(e => e.code));
  let selected = entries;

  if (selection.from !== undefined) {
    const start = entries.findIndex(e => e.code === selection.from);
    if (start < 0) throw new Error(`Unknown code for --from: ${selection.from}`);
    selected = selected.slice(start);
  }

  if (selection.only && selection.only.length > 0) {
    const unknown = selection.only.filter(c => !known.has(c));
    if (unknown.length > 0) throw new Error(`Unknown code(s) for --only: ${unknown.join(', ')}`);
    const keep = new Set(selection.only);
    selected = selected.filter(e => keep.has(e.code));
  }

  if (selection.exclude) {
    const drop = new Set(selection.exclude);
    selected = selected.filter(e => !drop.has(e.code));
  }

  return selected;
}

/** Split a comma-separated code list, ignoring blanks. */
export function parseCodeList(value: string): TaxonomyCode[] {
  return value.split(',').map(c => c.trim()).filter(Boolean);
}
