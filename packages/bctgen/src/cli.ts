#!/usr/bin/env node

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import * as fmt from './output/format.js';

const VERSION: string = JSON.parse(
  fs.readFileSync(fileURLToPath(new URL('../package.json', import.meta.url)), 'utf-8'),
).version;

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--version') || args.includes('-v')) {
    console.log(VERSION);
    return;
  }

  if (args.includes('--help') || args.includes('-h') || args.length === 0) {
    printHelp();
    return;
  }

  const isJson = args.includes('--json');
  const command = args[0];
  const rest = args.slice(1).filter(a => a !== '--json');

  try {
    switch (command) {
      case 'init': {
        const { init } = await import('./commands/init.js');
        await init(rest);
        break;
      }
      case 'generate': {
        const { generate } = await import('./commands/generate.js');
        const outcomes = await generate(rest);
        if (outcomes.some(o => o.outcome === 'failed')) process.exitCode = 2;
        break;
      }
      case 'status': {
        const { status } = await import('./commands/status.js');
        await status(rest, isJson);
        break;
      }
      case 'codes': {
        const { codes } = await import('./commands/codes.js');
        await codes(isJson);
        break;
      }
      case 'check': {
        const { check } = await import('./commands/check.js');
        if (!(await check(rest))) process.exitCode = 1;
        break;
      }
      default:
        console.error(`Unknown command: ${command}`);
        printHelp();
        process.exit(1);
    }
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    fmt.error(`Error: ${msg}`);
    process.exit(1);
  }
}

function printHelp(): void {
  console.log(`
bctgen v${VERSION} — Synthetic behavior change message datasets

Usage: bctgen <command> [options]

Setup:
  init                       Create .bctgen/config.json, prompts/baseline.txt, data/
    --model M                Default model for generation
    --num N                  Default messages per code
    --taxonomy FILE          Taxonomy CSV (No,Label,Definition)
  check [--prompt NAME]      Check that a prompt configuration is ready

Generation:
  generate                   Generate messages for every taxonomy code
    -p, --prompt NAME        Prompt template prompts/NAME.txt (default: baseline)
    -n, --num N              Messages per code (default: from config, 10)
    --from CODE              Start at this code
    --only A,B,...           Only these codes
    --resume                 Skip codes completed by earlier runs of NAME
    --model M                Override the configured model

Inspection:
  status [--prompt NAME]     Runs from the ledger and rows on disk
  codes                      List the taxonomy

Flags:
  --json                     Output as JSON (status, codes)
  --version, -v              Print version
  --help, -h                 Print this help
`);
}

void main();
