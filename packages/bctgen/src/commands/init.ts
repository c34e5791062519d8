import * as fs from 'node:fs';
import * as path from 'node:path';
import { BASELINE_PROMPT, PROJECT_DIRS, TAXONOMY_HEADER, configTemplate, mkdirSafe } from '@bctgen/shared';
import { configPath, getFlagValue, parseCount } from '../config.js';
import * as fmt from '../output/format.js';

/**
 * `bctgen init` — scaffold .bctgen/config.json, prompts/baseline.txt and data/.
 * Existing files are left untouched.
 */
export async function init(args: string[], targetDir = process.cwd()): Promise<string[]> {
  const root = path.resolve(targetDir);
  const created: string[] = [];

  for (const dir of PROJECT_DIRS) {
    const full = path.join(root, dir);
    if (!fs.existsSync(full)) created.push(dir + '/');
    mkdirSafe(full);
  }

  const countFlag = getFlagValue(args, '--num', '-n');
  writeIfAbsent(configPath(root), configTemplate({
    model: getFlagValue(args, '--model'),
    defaultCount: countFlag === undefined ? undefined : parseCount(countFlag, 0),
    taxonomyPath: getFlagValue(args, '--taxonomy'),
  }) + '\n', created, root);
  writeIfAbsent(path.join(root, 'prompts', 'baseline.txt'), BASELINE_PROMPT, created, root);

  const taxonomyFile = path.resolve(root, getFlagValue(args, '--taxonomy') ?? 'taxonomy.csv');
  writeIfAbsent(taxonomyFile, TAXONOMY_HEADER, created, root);

  fmt.header('Project initialized');
  for (const f of created) fmt.success(`Created ${f}`);
  if (created.length === 0) fmt.info('Nothing to do — project already initialized.');
  fmt.info('Add taxonomy rows (No,Label,Definition), then run `bctgen check`.');
  return created;
}

function writeIfAbsent(file: string, content: string, created: string[], root: string): void {
  if (fs.existsSync(file)) return;
  mkdirSafe(path.dirname(file));
  fs.writeFileSync(file, content);
  created.push(path.relative(root, file));
}
