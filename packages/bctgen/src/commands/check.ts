import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  formatValidation,
  hasFailures,
  listPlaceholders,
  parsePromptTemplate,
  validateProject,
  type TemplateShape,
} from '@bctgen/shared';
import { configPath, getFlagValue, loadConfig, promptPaths, resolveRoot, taxonomyPath } from '../config.js';
import { errorMessage } from '../errors.js';
import { loadTaxonomy } from '../taxonomy/loader.js';
import { DEFAULT_PROMPT } from './generate.js';
import * as fmt from '../output/format.js';

/**
 * `bctgen check` — report whether a prompt configuration is ready to generate.
 * Returns false when any check fails.
 */
export async function check(args: string[]): Promise<boolean> {
  const root = resolveRoot();
  const config = loadConfig(root);
  const promptName = getFlagValue(args, '--prompt', '-p') ?? DEFAULT_PROMPT;

  let promptShape: TemplateShape | null = null;
  let promptError: string | null = null;
  let placeholders: string[] = [];
  try {
    const { templateFile } = promptPaths(root, config, promptName);
    if (!fs.existsSync(templateFile)) {
      promptError = `Not found: ${templateFile}`;
    } else {
      const parsed = parsePromptTemplate(fs.readFileSync(templateFile, 'utf-8'));
      promptShape = parsed.shape;
      placeholders = listPlaceholders(parsed.spec);
    }
  } catch (err) {
    promptError = errorMessage(err);
  }

  let taxonomyCount = 0;
  let taxonomyError: string | null = null;
  try {
    taxonomyCount = loadTaxonomy(taxonomyPath(root, config)).length;
  } catch (err) {
    taxonomyError = errorMessage(err);
  }

  const checks = validateProject({
    hasConfig: fs.existsSync(configPath(root)),
    promptName,
    promptShape,
    promptError,
    placeholders,
    taxonomyCount,
    taxonomyError,
    hasApiKey: Boolean(process.env.ANTHROPIC_API_KEY),
    dataDirWritable: isWritable(path.resolve(root, config.paths.data)),
  });

  fmt.header('Project Check');
  console.log(formatValidation(checks));
  console.log();
  return !hasFailures(checks);
}

/** Whether the directory (or its nearest existing ancestor) accepts writes. */
function isWritable(dir: string): boolean {
  let target = dir;
  while (!fs.existsSync(target)) {
    const parent = path.dirname(target);
    if (parent === target) return false;
    target = parent;
  }
  try {
    fs.accessSync(target, fs.constants.W_OK);
    return true;
  } catch {
    return false;
  }
}
