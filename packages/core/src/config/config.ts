/**
 * Configuration loading.
 *
 * Precedence, lowest first: built-in defaults, the JSON config file, ASKDB_*
 * environment variables. The merged result is validated once. Secrets are
 * never read from the file.
 */

import AjvModule from 'ajv';
import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { RuleScope } from '../intent/classify.js';
import type { DbType } from '../db/types.js';
import { SAFE_DEFAULTS } from '../db/defaults.js';
import { DEFAULT_SCHEMA_TTL_SECONDS } from '../schema/cache.js';
import { DEFAULT_MODEL } from '../llm/openai.js';
import { defaultDbPath } from '../storage/sqlite.js';
import { configSchema } from './schema.js';

const Ajv = AjvModule.default;

export const CONFIG_FILE_NAME = 'askdb.config.json';

export interface DbConfig {
  type: DbType;
  host: string;
  port: number;
  /** Database name, or the file path for sqlite */
  database: string;
  user: string;
  ssl: boolean;
}

export interface AskdbConfig {
  db: DbConfig;
  schemaTtlSeconds: number;
  scope: RuleScope;
  model: string;
  storePath: string;
  maxRows: number;
  statementTimeoutMs: number;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Explicit file; must exist */
  configPath?: string;
  cwd?: string;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function defaultConfig(): AskdbConfig {
  return {
    db: { type: 'postgres', host: 'localhost', port: 5432, database: 'postgres', user: 'postgres', ssl: false },
    schemaTtlSeconds: DEFAULT_SCHEMA_TTL_SECONDS,
    scope: 'both',
    model: DEFAULT_MODEL,
    storePath: defaultDbPath(),
    maxRows: SAFE_DEFAULTS.maxRows,
    statementTimeoutMs: SAFE_DEFAULTS.statementTimeoutMs,
  };
}

type Candidate = Record<string, unknown>;

function isRecord(value: unknown): value is Candidate {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Numbers and booleans stay strings when they do not parse, so validation reports them. */
function envNumber(value: string): number | string {
  const trimmed = value.trim();
  return /^-?\d+$/.test(trimmed) ? Number(trimmed) : value;
}

function envBoolean(value: string): boolean | string {
  const v = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  return value;
}

function readConfigFile(path: string): Candidate {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError([`${path}: ${message}`]);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError([`${path}: must contain a JSON object`]);
  }
  return parsed;
}

function locateConfigFile(opts: LoadConfigOptions, env: NodeJS.ProcessEnv): string | null {
  const explicit = opts.configPath ?? env.ASKDB_CONFIG;
  const cwd = opts.cwd ?? process.cwd();
  if (explicit) {
    const path = resolve(cwd, explicit);
    if (!existsSync(path)) {
      throw new ConfigError([`Config file not found: ${path}`]);
    }
    return path;
  }
  const implicit = join(cwd, CONFIG_FILE_NAME);
  return existsSync(implicit) ? implicit : null;
}

function envOverrides(env: NodeJS.ProcessEnv): { db: Candidate; top: Candidate } {
  const db: Candidate = {};
  const top: Candidate = {};
  if (env.ASKDB_DB_TYPE) db.type = env.ASKDB_DB_TYPE;
  if (env.ASKDB_DB_HOST) db.host = env.ASKDB_DB_HOST;
  if (env.ASKDB_DB_PORT) db.port = envNumber(env.ASKDB_DB_PORT);
  if (env.ASKDB_DB_NAME) db.database = env.ASKDB_DB_NAME;
  if (env.ASKDB_DB_USER) db.user = env.ASKDB_DB_USER;
  if (env.ASKDB_DB_SSL) db.ssl = envBoolean(env.ASKDB_DB_SSL);
  if (env.ASKDB_SCHEMA_TTL) top.schemaTtlSeconds = envNumber(env.ASKDB_SCHEMA_TTL);
  if (env.ASKDB_SCOPE) top.scope = env.ASKDB_SCOPE;
  if (env.ASKDB_MODEL) top.model = env.ASKDB_MODEL;
  if (env.ASKDB_STORE_PATH) top.storePath = env.ASKDB_STORE_PATH;
  if (env.ASKDB_MAX_ROWS) top.maxRows = envNumber(env.ASKDB_MAX_ROWS);
  if (env.ASKDB_STATEMENT_TIMEOUT_MS) top.statementTimeoutMs = envNumber(env.ASKDB_STATEMENT_TIMEOUT_MS);
  return { db, top };
}

const validate = new Ajv({ allErrors: true }).compile<AskdbConfig>(configSchema);

export function loadConfig(opts: LoadConfigOptions = {}): AskdbConfig {
  const env = opts.env ?? process.env;
  const filePath = locateConfigFile(opts, env);
  const file = filePath ? readConfigFile(filePath) : {};
  const overrides = envOverrides(env);

  const defaults = defaultConfig();
  const fileDb = isRecord(file.db) ? file.db : {};
  const candidate: Candidate = {
    ...defaults,
    ...file,
    ...overrides.top,
    db: { ...defaults.db, ...fileDb, ...overrides.db },
  };
  if (file.db !== undefined && !isRecord(file.db)) {
    candidate.db = file.db;
  }

  if (!validate(candidate)) {
    const problems = (validate.errors ?? []).map((e) => {
      const where = e.instancePath || '/';
      const extra =
        typeof e.params.additionalProperty === 'string' ? ` (${e.params.additionalProperty})` : '';
      return `${where} ${e.message ?? 'is invalid'}${extra}`;
    });
    throw new ConfigError(problems);
  }
  return candidate;
}
