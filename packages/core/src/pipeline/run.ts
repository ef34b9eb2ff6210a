/**
 * Request lifecycle: schema context → generate → sanitize → execute → format.
 *
 * Every stage records its own failures in `errors` and hands on a complete
 * state, so runPipeline always resolves with a preview.
 */

import type { SqlExecutor } from '../db/types.js';
import type { SqlGenerator } from '../llm/types.js';
import { sanitizeSql, WARNING_MARKER } from '../policy/sanitize.js';
import { DEFAULT_SCHEMA_TTL_SECONDS, type SchemaContextSource } from '../schema/cache.js';
import { formatRows, NO_RESULTS } from './format.js';
import type { PipelineState } from './state.js';

export const NO_EXEC_PREVIEW = '[NO_EXEC] Execution skipped.';
export const NO_SQL_PREVIEW = '[INFO] No SQL to execute.';
export const UNSUPPORTED_PATTERN_ERROR = 'SQL contains unsupported aggregate/subquery pattern. See warning in SQL output.';

export interface PipelineDeps {
  schema: SchemaContextSource;
  executor: SqlExecutor;
  /** Used when the request carries a question but no SQL */
  generator?: SqlGenerator;
  schemaTtlSeconds?: number;
  now?: () => number;
}

type Stage = (state: PipelineState, deps: PipelineDeps) => Promise<PipelineState>;

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function withError(state: PipelineState, message: string): PipelineState {
  return { ...state, errors: [...state.errors, message] };
}

export async function loadSchemaContext(state: PipelineState, deps: PipelineDeps): Promise<PipelineState> {
  let next = state;
  try {
    if (state.flags.refreshSchema) {
      try {
        return { ...next, schemaContext: await deps.schema.refreshSchemaCache() };
      } catch (err: unknown) {
        next = withError(next, `Schema refresh failed: ${messageOf(err)}`);
      }
      return { ...next, schemaContext: await deps.schema.getSchemaContext(0) };
    }
    const ttl = deps.schemaTtlSeconds ?? DEFAULT_SCHEMA_TTL_SECONDS;
    return { ...next, schemaContext: await deps.schema.getSchemaContext(ttl) };
  } catch (err: unknown) {
    return withError({ ...next, schemaContext: '' }, `Schema context error: ${messageOf(err)}`);
  }
}

export async function generateSql(state: PipelineState, deps: PipelineDeps): Promise<PipelineState> {
  if (!deps.generator || state.sqlRaw.trim() || !state.question.trim() || state.flags.explainOnly) {
    return state;
  }
  try {
    const sqlRaw = await deps.generator.generateSql({
      question: state.question,
      schemaContext: state.schemaContext,
    });
    return { ...state, sqlRaw };
  } catch (err: unknown) {
    return withError(state, `SQL generation failed: ${messageOf(err)}`);
  }
}

export async function sanitizeStage(state: PipelineState): Promise<PipelineState> {
  const outcome = sanitizeSql(state.sqlRaw);
  if (!outcome.ok) {
    if (outcome.reason === 'unsafe') {
      return withError(
        {
          ...state,
          sanitized: null,
          rejection: { reason: 'unsafe', keyword: outcome.keyword, extracted: outcome.extracted },
        },
        `SQL rejected: forbidden keyword ${outcome.keyword}`,
      );
    }
    return { ...state, sanitized: null, rejection: { reason: 'empty' } };
  }

  const next: PipelineState = { ...state, sanitized: outcome.sql, rejection: null };
  return outcome.sql.text.includes(WARNING_MARKER) ? withError(next, UNSUPPORTED_PATTERN_ERROR) : next;
}

export async function executeStage(state: PipelineState, deps: PipelineDeps): Promise<PipelineState> {
  if (state.flags.noExec || state.flags.explainOnly || !state.sanitized) {
    return { ...state, execution: 'skipped', rows: [] };
  }
  const now = deps.now ?? Date.now;
  const start = now();
  try {
    const rows = await deps.executor.executeSqlQuery(state.sanitized);
    return { ...state, execution: 'ok', rows, execMs: now() - start };
  } catch (err: unknown) {
    return withError({ ...state, execution: 'failed', rows: [] }, `SQL execution failed: ${messageOf(err)}`);
  }
}

export async function formatStage(state: PipelineState): Promise<PipelineState> {
  if (state.execution === 'skipped') {
    const skippedByFlag = state.flags.noExec || state.flags.explainOnly;
    return { ...state, preview: skippedByFlag ? NO_EXEC_PREVIEW : NO_SQL_PREVIEW };
  }
  if (state.execution === 'failed') {
    return { ...state, preview: NO_RESULTS };
  }
  try {
    return { ...state, preview: formatRows(state.rows) };
  } catch (err: unknown) {
    return withError({ ...state, preview: NO_RESULTS }, `Result formatting failed: ${messageOf(err)}`);
  }
}

const STAGES: ReadonlyArray<readonly [name: string, stage: Stage]> = [
  ['schema', loadSchemaContext],
  ['generate', generateSql],
  ['sanitize', sanitizeStage],
  ['execute', executeStage],
  ['format', formatStage],
];

export async function runPipeline(initial: PipelineState, deps: PipelineDeps): Promise<PipelineState> {
  let state = initial;
  for (const [name, stage] of STAGES) {
    try {
      state = await stage(state, deps);
    } catch (err: unknown) {
      state = withError(state, `Pipeline stage "${name}" failed: ${messageOf(err)}`);
    }
  }
  return state.preview ? state : { ...state, preview: NO_RESULTS };
}
