import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { parsePrompt } from '@bctgen/shared';
import { Orchestrator, defaultRenderer } from '../orchestrator.js';
import { DatasetStore, readTable, countRows } from '../dataset/table.js';
import { PersistenceFailure } from '../errors.js';
import type { CodeOutcome } from '../types.js';
import { FakeGenerator, makeTmpDir, removeTmpDir } from './helpers.js';

let tmpDir: string;
let store: DatasetStore;

const TEMPLATE = parsePrompt('Sys\n=====\nWrite {num_messages} for {bct_code}');

beforeEach(() => {
  tmpDir = makeTmpDir('orch');
  store = new DatasetStore(path.join(tmpDir, 'data', 'baseline'));
});

afterEach(() => {
  removeTmpDir(tmpDir);
});

describe('Orchestrator.run', () => {
  it('writes one table of `count` rows for a code (end to end)', async () => {
    const generator = new FakeGenerator();
    const orch = new Orchestrator({ generator, store });
    const spec = parsePrompt('Be concise.\n=====\nWrite a message about self-monitoring.');

    const outcomes = await orch.run(spec, ['1.1'], 3);

    assert.deepEqual(outcomes, [{ code: '1.1', outcome: 'succeeded', attempts: 1, rows: 3, error: null }]);
    const rows = readTable(path.join(store.dir, '1.1.csv'));
    assert.equal(rows.length, 3);
    assert.ok(rows.every(r => r.code === '1.1'));
    assert.equal(rows[0].message, 'Write a message about self-monitoring. #1');
    assert.deepEqual(generator.calls[0].promptSpec, {
      systemPrompt: 'Be concise.',
      userPrompt: 'Write a message about self-monitoring.',
    });
  });

  it('renders {num_messages} and {bct_code} by default', async () => {
    const generator = new FakeGenerator();
    await new Orchestrator({ generator, store }).run(TEMPLATE, ['2.3'], 2);
    assert.equal(generator.calls[0].promptSpec.userPrompt, 'Write 2 for 2.3');
    assert.equal(generator.calls[0].count, 2);
  });

  it('uses a custom renderer when given', async () => {
    const generator = new FakeGenerator();
    const orch = new Orchestrator({
      generator,
      store,
      render: (spec, code, count) => ({ systemPrompt: spec.systemPrompt, userPrompt: `${code}/${count}` }),
    });
    await orch.run(TEMPLATE, ['1.1'], 1);
    assert.equal(generator.calls[0].promptSpec.userPrompt, '1.1/1');
  });

  it('processes codes in input order', async () => {
    const generator = new FakeGenerator();
    const outcomes = await new Orchestrator({ generator, store }).run(TEMPLATE, ['2.1', '1.1', '1.2'], 1);
    assert.deepEqual(outcomes.map(o => o.code), ['2.1', '1.1', '1.2']);
    assert.deepEqual(generator.calls.map(c => c.promptSpec.userPrompt), [
      'Write 1 for 2.1', 'Write 1 for 1.1', 'Write 1 for 1.2',
    ]);
  });

  it('isolates a code that fails twice and continues with the rest', async () => {
    const generator = new FakeGenerator(prompt => (prompt.endsWith('1.2') ? 2 : 0));
    const outcomes = await new Orchestrator({ generator, store }).run(TEMPLATE, ['1.1', '1.2', '1.3'], 2);

    assert.deepEqual(outcomes, [
      { code: '1.1', outcome: 'succeeded', attempts: 1, rows: 2, error: null },
      { code: '1.2', outcome: 'failed', attempts: 2, rows: 0, error: 'service unavailable (Write 2 for 1.2)' },
      { code: '1.3', outcome: 'succeeded', attempts: 1, rows: 2, error: null },
    ]);
    assert.equal(countRows(path.join(store.dir, '1.1.csv')), 2);
    assert.equal(countRows(path.join(store.dir, '1.3.csv')), 2);
    assert.equal(fs.existsSync(path.join(store.dir, '1.2.csv')), false);
    assert.equal(generator.calls.length, 4);
  });

  it('retries once immediately and succeeds', async () => {
    const generator = new FakeGenerator(prompt => (prompt.endsWith('1.2') ? 1 : 0));
    const outcomes = await new Orchestrator({ generator, store }).run(TEMPLATE, ['1.1', '1.2'], 2);
    assert.deepEqual(outcomes[1], { code: '1.2', outcome: 'succeeded', attempts: 2, rows: 2, error: null });
    assert.equal(countRows(path.join(store.dir, '1.2.csv')), 2);
  });

  it('appends across runs instead of truncating', async () => {
    const generator = new FakeGenerator();
    const orch = new Orchestrator({ generator, store });
    await orch.run(TEMPLATE, ['1.1', '1.2'], 3);
    await orch.run(TEMPLATE, ['1.1', '1.2'], 3);
    assert.equal(countRows(path.join(store.dir, '1.1.csv')), 6);
    assert.equal(countRows(path.join(store.dir, '1.2.csv')), 6);
  });

  it('keeps rows written before the run', async () => {
    fs.mkdirSync(store.dir, { recursive: true });
    fs.writeFileSync(path.join(store.dir, '1.1.csv'), 'earlier message,1.1\n');
    await new Orchestrator({ generator: new FakeGenerator(), store }).run(TEMPLATE, ['1.1'], 1);
    assert.deepEqual(readTable(path.join(store.dir, '1.1.csv')), [
      { message: 'earlier message', code: '1.1' },
      { message: 'Write 1 for 1.1 #1', code: '1.1' },
    ]);
  });

  it('reports outcomes and state changes as they happen', async () => {
    const seen: CodeOutcome[] = [];
    const states: string[] = [];
    const generator = new FakeGenerator(prompt => (prompt.endsWith('1.1') ? 1 : prompt.endsWith('1.2') ? 2 : 0));
    const outcomes = await new Orchestrator({
      generator,
      store,
      onOutcome: o => seen.push(o),
      onStateChange: (code, state) => states.push(`${code}:${state}`),
    }).run(TEMPLATE, ['1.1', '1.2', '1.3'], 1);

    assert.deepEqual(seen, outcomes);
    assert.deepEqual(states, [
      '1.1:requesting', '1.1:retrying', '1.1:succeeded',
      '1.2:requesting', '1.2:retrying', '1.2:failed',
      '1.3:requesting', '1.3:succeeded',
    ]);
  });

  it('hands messages to onMessages before they are written', async () => {
    const received: string[][] = [];
    await new Orchestrator({
      generator: new FakeGenerator(),
      store,
      onMessages: (_code, messages) => {
        assert.equal(fs.existsSync(path.join(store.dir, '1.1.csv')), false);
        received.push(messages);
      },
    }).run(TEMPLATE, ['1.1'], 2);
    assert.deepEqual(received, [['Write 2 for 1.1 #1', 'Write 2 for 1.1 #2']]);
  });

  it('rejects a non-positive or fractional count before generating', async () => {
    const generator = new FakeGenerator();
    const orch = new Orchestrator({ generator, store });
    await assert.rejects(orch.run(TEMPLATE, ['1.1'], 0), RangeError);
    await assert.rejects(orch.run(TEMPLATE, ['1.1'], 1.5), RangeError);
    assert.equal(generator.calls.length, 0);
  });

  it('aborts on errors other than GenerationFailure', async () => {
    const outcomes: CodeOutcome[] = [];
    const orch = new Orchestrator({
      generator: { generate: async () => { throw new TypeError('bug in adapter'); } },
      store,
      onOutcome: o => outcomes.push(o),
    });
    await assert.rejects(orch.run(TEMPLATE, ['1.1', '1.2'], 1), TypeError);
    assert.deepEqual(outcomes, []);
  });

  it('aborts the run with PersistenceFailure when a table cannot be created', async () => {
    const blocker = path.join(tmpDir, 'not-a-dir');
    fs.writeFileSync(blocker, '');
    const generator = new FakeGenerator();
    const orch = new Orchestrator({ generator, store: new DatasetStore(path.join(blocker, 'baseline')) });

    await assert.rejects(orch.run(TEMPLATE, ['1.1', '1.2'], 1), PersistenceFailure);
    assert.equal(generator.calls.length, 1);
  });
});

describe('defaultRenderer', () => {
  it('leaves taxonomy placeholders it does not know', () => {
    const spec = parsePrompt('S\n{num_messages} x {bct_label}');
    assert.equal(defaultRenderer(spec, '1.1', 4).userPrompt, '4 x {bct_label}');
  });
});
