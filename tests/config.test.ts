import { describe, expect, it } from 'vitest';
import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { deepMerge, envLayer, itemBudgets, loadConfig } from '../src/core/config/loader.js';
import { ConfigError } from '../src/core/errors.js';
import { testConfig } from './fakes.js';

async function repoWith(files: Record<string, string>): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'changeq-config-'));
  await mkdir(join(dir, '.changeq'));
  for (const [name, content] of Object.entries(files)) {
    await writeFile(join(dir, '.changeq', name), content);
  }
  return dir;
}

describe('loadConfig', () => {
  it('layers local config over shared config and env over both', async () => {
    const dir = await repoWith({
      'config.yaml': 'budgets:\n  maxRetries: 2\n  maxTurns: 10\nscan:\n  exclude: [old]\n',
      'local.config.yaml': 'budgets:\n  maxRetries: 4\n'
    });

    const { config, layers } = await loadConfig(dir, { env: { CHANGEQ_MAX_RETRIES: '5' } });

    expect(config.budgets).toEqual({ maxRetries: 5, maxTurns: 10, maxDurationSec: 600 });
    expect(config.scan.exclude).toEqual(['old']);
    expect(layers.map((l) => [l.name, l.values])).toEqual([
      ['shared', { budgets: { maxRetries: 2, maxTurns: 10 }, scan: { exclude: ['old'] } }],
      ['local', { budgets: { maxRetries: 4 } }],
      ['env', { budgets: { maxRetries: 5 } }]
    ]);
  });

  it('fills defaults when there is no config at all', async () => {
    const { config } = await loadConfig(await repoWith({}), { env: {} });
    expect(config.changesDir).toBe('changes');
    expect(config.verification.timeoutMs).toBe(120_000);
    expect(config.notify.events).toEqual(['change.completed', 'change.failed', 'change.needs_review']);
  });

  it('picks up an openspec layout when no layer names the changes directory', async () => {
    const dir = await repoWith({});
    await mkdir(join(dir, 'openspec', 'changes'), { recursive: true });
    expect((await loadConfig(dir, { env: {} })).config.changesDir).toBe('openspec/changes');
    expect((await loadConfig(dir, { env: { CHANGEQ_CHANGES_DIR: 'specs' } })).config.changesDir).toBe('specs');
  });

  it('names the offending key of an invalid value', async () => {
    const dir = await repoWith({ 'config.yaml': 'budgets:\n  maxRetries: 0\n' });
    await expect(loadConfig(dir, { env: {} })).rejects.toThrow(/^Invalid configuration at budgets\.maxRetries: /);
  });

  it('rejects a shared config that is not a mapping but ignores such a local one', async () => {
    const shared = await repoWith({ 'config.yaml': '- one\n- two\n' });
    await expect(loadConfig(shared, { env: {} })).rejects.toBeInstanceOf(ConfigError);

    const local = await repoWith({ 'local.config.yaml': 'just text\n' });
    expect((await loadConfig(local, { env: {} })).config.budgets.maxRetries).toBe(3);
  });

  it('rejects malformed yaml', async () => {
    const dir = await repoWith({ 'config.yaml': 'budgets: [unclosed\n' });
    await expect(loadConfig(dir, { env: {} })).rejects.toThrow(/^Failed to parse /);
  });
});

describe('turn budget', () => {
  it('takes the environment over the shared and personal layers', async () => {
    const dir = await repoWith({
      'config.yaml': 'budgets:\n  maxTurns: 10\n',
      'local.config.yaml': 'budgets:\n  maxTurns: 20\n'
    });

    const { config } = await loadConfig(dir, { env: { CHANGEQ_MAX_TURNS: '99' } });

    expect(itemBudgets(config, { overrides: {} }).maxTurns).toBe(99);
    expect(itemBudgets(config, { overrides: { maxTurns: 7 } }).maxTurns).toBe(7);
  });
});

describe('envLayer', () => {
  it('maps CHANGEQ_* variables onto config keys', () => {
    expect(
      envLayer({
        CHANGEQ_VOTER_TIMEOUT_MS: '500',
        CHANGEQ_EXECUTOR_MODEL: ' fast ',
        CHANGEQ_WEBHOOK_URL: '',
        CHANGEQ_BASE_BRANCH: 'develop',
        UNRELATED: 'x'
      })
    ).toEqual({ verification: { timeoutMs: 500 }, executor: { model: 'fast' } });
  });

  it('requires integers where the key is numeric', () => {
    expect(() => envLayer({ CHANGEQ_MAX_RETRIES: 'lots' })).toThrow("CHANGEQ_MAX_RETRIES must be an integer, got 'lots'");
  });
});

describe('deepMerge', () => {
  it('merges objects, replaces arrays and ignores nulls', () => {
    expect(deepMerge({ a: { x: 1, y: 2 }, list: [1, 2], keep: 'k' }, { a: { y: 3 }, list: [9], keep: null })).toEqual({
      a: { x: 1, y: 3 },
      list: [9],
      keep: 'k'
    });
  });
});

describe('itemBudgets', () => {
  it('lets front matter overrides win over config', () => {
    const config = testConfig({
      executor: { args: [], model: 'default-model' },
      budgets: { maxRetries: 3, maxDurationSec: 600, maxTurns: 50 }
    });
    expect(itemBudgets(config, { overrides: {} })).toEqual({
      maxRetries: 3,
      maxDurationMs: 600_000,
      maxTurns: 50,
      executorModel: 'default-model'
    });
    expect(itemBudgets(config, { overrides: { maxRetries: 1, maxDurationSec: 5, maxTurns: 7, executorModel: 'x' } })).toEqual({
      maxRetries: 1,
      maxDurationMs: 5_000,
      maxTurns: 7,
      executorModel: 'x'
    });
  });
});
