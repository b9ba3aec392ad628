import { detectChangesDir, workspacePaths } from '../../workspace/layout.js';
import { parseYaml, readTextIfExists } from '../../utils/fs.js';
import { ConfigError, errorMessage } from '../errors.js';
import type { WorkItem } from '../work-item/types.js';
import { ChangeqConfigSchema, type ItemBudgets, type ResolvedConfig } from './schema.js';

export type ConfigLayerName = 'shared' | 'local' | 'env';

type Env = Record<string, string | undefined>;
type PlainObject = Record<string, unknown>;

export interface LoadedConfig {
  config: ResolvedConfig;
  /** Raw layers as read, lowest precedence first; for `changeq config`. */
  layers: Array<{ name: ConfigLayerName; source: string; values: PlainObject }>;
}

/**
 * Merge `.changeq/config.yaml` < `.changeq/local.config.yaml` < `CHANGEQ_*` env vars,
 * then validate. The changes directory is auto-detected when no layer sets it.
 */
export async function loadConfig(repoRoot: string, opts: { env?: Env } = {}): Promise<LoadedConfig> {
  const paths = workspacePaths(repoRoot);
  const env = opts.env ?? process.env;

  const shared = await readLayer(paths.configPath, { strict: true });
  const local = await readLayer(paths.localConfigPath, { strict: false });
  const fromEnv = envLayer(env);

  const merged = [shared, local, fromEnv].reduce<PlainObject>((acc, layer) => deepMerge(acc, layer), {});
  const parsed = ChangeqConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? issue.path.join('.') : '(root)';
    throw new ConfigError(`Invalid configuration at ${where}: ${issue?.message ?? 'unknown error'}`);
  }

  const changesDir = parsed.data.changesDir ?? (await detectChangesDir(repoRoot));
  return {
    config: { ...parsed.data, changesDir },
    layers: [
      { name: 'shared', source: paths.configPath, values: shared },
      { name: 'local', source: paths.localConfigPath, values: local },
      { name: 'env', source: 'CHANGEQ_*', values: fromEnv }
    ]
  };
}

/** Objects merge key by key, arrays and scalars replace, `null`/`undefined` leave the base alone. */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const out: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === null || value === undefined) continue;
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return out;
}

/** Budgets for one item: front matter overrides win over the merged config. */
export function itemBudgets(config: ResolvedConfig, item: Pick<WorkItem, 'overrides'>): ItemBudgets {
  const o = item.overrides;
  return {
    maxRetries: o.maxRetries ?? config.budgets.maxRetries,
    maxDurationMs: (o.maxDurationSec ?? config.budgets.maxDurationSec) * 1000,
    maxTurns: o.maxTurns ?? config.budgets.maxTurns,
    executorModel: o.executorModel ?? config.executor.model
  };
}

async function readLayer(path: string, opts: { strict: boolean }): Promise<PlainObject> {
  const raw = await readTextIfExists(path);
  if (raw === null) return {};

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${path}: ${errorMessage(err)}`, { cause: err });
  }

  if (parsed === null || parsed === undefined) return {};
  if (isPlainObject(parsed)) return parsed;
  if (opts.strict) throw new ConfigError(`Invalid ${path}: expected a mapping at the top level`);
  return {};
}

const ENV_KEYS: Array<{ name: string; path: string[]; kind: 'string' | 'int' }> = [
  { name: 'CHANGEQ_CHANGES_DIR', path: ['changesDir'], kind: 'string' },
  { name: 'CHANGEQ_MAX_RETRIES', path: ['budgets', 'maxRetries'], kind: 'int' },
  { name: 'CHANGEQ_MAX_DURATION_SEC', path: ['budgets', 'maxDurationSec'], kind: 'int' },
  { name: 'CHANGEQ_MAX_TURNS', path: ['budgets', 'maxTurns'], kind: 'int' },
  { name: 'CHANGEQ_VOTER_TIMEOUT_MS', path: ['verification', 'timeoutMs'], kind: 'int' },
  { name: 'CHANGEQ_EXECUTOR_MODEL', path: ['executor', 'model'], kind: 'string' },
  { name: 'CHANGEQ_WEBHOOK_URL', path: ['notify', 'webhookUrl'], kind: 'string' }
];

export function envLayer(env: Env): PlainObject {
  let out: PlainObject = {};
  for (const key of ENV_KEYS) {
    const raw = env[key.name]?.trim();
    if (!raw) continue;

    let value: string | number = raw;
    if (key.kind === 'int') {
      const n = Number(raw);
      if (!Number.isInteger(n)) throw new ConfigError(`${key.name} must be an integer, got '${raw}'`);
      value = n;
    }
    out = deepMerge(out, nest(key.path, value));
  }
  return out;
}

function nest(path: string[], value: unknown): PlainObject {
  const [head, ...rest] = path;
  if (head === undefined) return {};
  return { [head]: rest.length ? nest(rest, value) : value };
}

function isPlainObject(v: unknown): v is PlainObject {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}
