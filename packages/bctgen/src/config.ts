import * as fs from 'node:fs';
import * as path from 'node:path';
import { DEFAULT_CONFIG } from '@bctgen/shared';
import type { BctgenConfig } from './types.js';

let _cachedConfig: BctgenConfig | null = null;
let _cachedRoot: string | null = null;

export const CONFIG_DIR = '.bctgen';

/**
 * Walk up from startDir looking for a directory containing `.bctgen/`.
 */
export function findProjectRoot(startDir?: string): string | null {
  let dir = path.resolve(startDir ?? process.cwd());

  while (true) {
    if (fs.existsSync(path.join(dir, CONFIG_DIR))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/** Project root, falling back to the working directory outside a project. */
export function resolveRoot(startDir?: string): string {
  return findProjectRoot(startDir) ?? path.resolve(startDir ?? process.cwd());
}

export function configPath(projectRoot: string): string {
  return path.join(projectRoot, CONFIG_DIR, 'config.json');
}

/**
 * Load .bctgen/config.json with full defaults. Cached per project root.
 */
export function loadConfig(projectRoot: string): BctgenConfig {
  if (_cachedConfig && _cachedRoot === projectRoot) return _cachedConfig;
  const file = configPath(projectRoot);
  if (!fs.existsSync(file)) {
    _cachedConfig = {
      paths: { ...DEFAULT_CONFIG.paths },
      generation: { ...DEFAULT_CONFIG.generation },
    };
    _cachedRoot = projectRoot;
    return _cachedConfig;
  }
  let loaded: Partial<BctgenConfig>;
  try {
    loaded = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new Error(`Invalid config file ${file}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  const config: BctgenConfig = {
    paths: { ...DEFAULT_CONFIG.paths, ...loaded.paths },
    generation: { ...DEFAULT_CONFIG.generation, ...loaded.generation },
  };
  if (!Number.isInteger(config.generation.default_count) || config.generation.default_count <= 0) {
    throw new Error(`Invalid config: generation.default_count must be a positive integer`);
  }
  if (!Number.isInteger(config.generation.max_turns) || config.generation.max_turns <= 0) {
    throw new Error(`Invalid config: generation.max_turns must be a positive integer`);
  }
  _cachedConfig = config;
  _cachedRoot = projectRoot;
  return _cachedConfig;
}

/** Clear cached config (for testing). */
export function resetConfigCache(): void {
  _cachedConfig = null;
  _cachedRoot = null;
}

/** Absolute locations of the prompt template and dataset directory for a prompt configuration. */
export function promptPaths(projectRoot: string, config: BctgenConfig, promptName: string): {
  templateFile: string;
  datasetDir: string;
} {
  validatePromptName(promptName);
  return {
    templateFile: path.resolve(projectRoot, config.paths.prompts, `${promptName}.txt`),
    datasetDir: path.resolve(projectRoot, config.paths.data, promptName),
  };
}

/** Prompt names become file and directory names; reject anything that could leave its directory. */
export function validatePromptName(promptName: string): void {
  if (!/^[A-Za-z0-9._-]+$/.test(promptName) || promptName === '.' || promptName === '..') {
    throw new Error(`Invalid prompt name "${promptName}" (letters, digits, ".", "_" and "-" only)`);
  }
}

export function taxonomyPath(projectRoot: string, config: BctgenConfig): string {
  return path.resolve(projectRoot, config.paths.taxonomy);
}

/** Extract a flag's value from args array with bounds checking. Accepts aliases. */
export function getFlagValue(args: string[], ...flags: string[]): string | undefined {
  for (const flag of flags) {
    const idx = args.indexOf(flag);
    if (idx >= 0 && idx + 1 < args.length) return args[idx + 1];
  }
  return undefined;
}

export function hasFlag(args: string[], ...flags: string[]): boolean {
  return flags.some(f => args.includes(f));
}

/** Parse a positive integer flag, or return the fallback when absent. */
export function parseCount(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return n;
}
