/**
 * Per-command wiring: configuration, connection and local store.
 */

import {
  LocalStore,
  OpenAISqlGenerator,
  loadConfig,
  type AskdbConfig,
  type DbConnection,
  type SqlGenerator,
} from '@askdb/core';
import { runtimeError, usageError } from './errors.js';
import { getPassword } from './util/password.js';

export interface GlobalOptions {
  config?: string;
}

export function resolveConfig(opts: GlobalOptions, env: NodeJS.ProcessEnv = process.env): AskdbConfig {
  return loadConfig({ env, configPath: opts.config });
}

export function openStore(config: Pick<AskdbConfig, 'storePath'>): LocalStore {
  const store = new LocalStore(config.storePath);
  store.migrate();
  return store;
}

/** Prompts for the password only when the database needs one. */
export async function resolveConnection(
  config: AskdbConfig,
  passwordSource: () => Promise<string> = getPassword,
): Promise<DbConnection> {
  const db = config.db;
  if (db.type === 'sqlite') {
    return { dbType: 'sqlite', database: db.database };
  }
  const password = await passwordSource();
  return {
    dbType: 'postgres',
    host: db.host,
    port: db.port,
    database: db.database,
    user: db.user,
    ssl: db.ssl,
    password,
  };
}

export function requirePostgres(conn: DbConnection, what: string): void {
  if (conn.dbType !== 'postgres') {
    throw usageError(`${what} requires a PostgreSQL connection (db.type is "${conn.dbType}").`);
  }
}

export function createGenerator(config: Pick<AskdbConfig, 'model'>, env: NodeJS.ProcessEnv = process.env): SqlGenerator {
  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) {
    throw runtimeError('OPENAI_API_KEY is not set. Export it before running "askdb ask".', 'OPENAI_FAILED');
  }
  return new OpenAISqlGenerator({ apiKey, model: config.model });
}
