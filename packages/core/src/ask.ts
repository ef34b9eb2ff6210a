/**
 * High-level orchestration.
 * Wires one database connection to the schema cache, executor, generator and
 * history store, then runs questions or raw SQL through the pipeline.
 */

import type { AskdbConfig } from './config/config.js';
import { createSqlExecutor, introspectSchemaForConnection } from './db/execute.js';
import type { DbConnection } from './db/types.js';
import type { SqlGenerator } from './llm/types.js';
import { runPipeline, type PipelineDeps } from './pipeline/run.js';
import { createPipelineState, type PipelineFlags, type PipelineState } from './pipeline/state.js';
import { SchemaCache } from './schema/cache.js';
import { recordPipelineRun, type QueryKind } from './storage/repo.js';
import type { LocalStore } from './storage/sqlite.js';

/** Cache key for a connection; the password is never part of it. */
export function schemaCacheKey(conn: DbConnection): string {
  switch (conn.dbType) {
    case 'postgres':
      return `postgres://${conn.user}@${conn.host}:${conn.port}/${conn.database}`;
    case 'sqlite':
      return `sqlite:${conn.database}`;
  }
}

export interface SessionOptions {
  conn: DbConnection;
  config: Pick<AskdbConfig, 'schemaTtlSeconds' | 'maxRows' | 'statementTimeoutMs'>;
  store: LocalStore;
  generator?: SqlGenerator;
}

export interface AskInput {
  question?: string;
  sql?: string;
  sessionId?: string;
  flags?: Partial<PipelineFlags>;
}

export interface AskResult {
  queryId: string;
  kind: QueryKind;
  state: PipelineState;
}

export class AskSession {
  readonly schema: SchemaCache;
  private readonly deps: PipelineDeps;
  private readonly store: LocalStore;

  constructor(opts: SessionOptions) {
    this.store = opts.store;
    this.schema = new SchemaCache({
      key: schemaCacheKey(opts.conn),
      loader: () => introspectSchemaForConnection(opts.conn),
      store: opts.store,
    });
    this.deps = {
      schema: this.schema,
      executor: createSqlExecutor(opts.conn, {
        maxRows: opts.config.maxRows,
        statementTimeoutMs: opts.config.statementTimeoutMs,
      }),
      generator: opts.generator,
      schemaTtlSeconds: opts.config.schemaTtlSeconds,
    };
  }

  /**
   * Run one request and record it in history. Supplied SQL skips generation.
   */
  async ask(input: AskInput): Promise<AskResult> {
    const state = await runPipeline(
      createPipelineState({
        question: input.question,
        sqlRaw: input.sql,
        sessionId: input.sessionId,
        flags: input.flags,
      }),
      this.deps,
    );
    const kind: QueryKind = input.sql?.trim() ? 'run' : 'ask';
    const queryId = recordPipelineRun(this.store.getDb(), state, kind);
    return { queryId, kind, state };
  }
}
