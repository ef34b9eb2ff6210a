/**
 * Query history repository.
 * Stores questions and pipeline runs.
 * NEVER stores result row data.
 */

import type Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import type { PipelineState } from '../pipeline/state.js';

// ── Types ────────────────────────────────────────────────────────────

/** `ask` generated the SQL, `run` was given it */
export type QueryKind = 'ask' | 'run';

export interface HistoryItem {
  id: string;
  sessionId: string | null;
  question: string;
  kind: QueryKind;
  askedAt: string;
}

export interface HistoryListItem {
  id: string;
  question: string;
  kind: QueryKind;
  askedAt: string;
  status: string | null;
  execMs: number | null;
  rowCount: number | null;
}

export interface HistoryDetail {
  query: HistoryItem;
  run: {
    id: string;
    sanitizedSql: string | null;
    status: string;
    execMs: number | null;
    rowCount: number | null;
    errors: string[];
    ranAt: string;
  } | null;
}

type QueryRow = {
  id: string;
  session_id: string | null;
  question: string;
  kind: string;
  asked_at: string;
};

type ListRow = {
  id: string;
  question: string;
  kind: string;
  asked_at: string;
  status: string | null;
  exec_ms: number | null;
  row_count: number | null;
};

type RunRow = {
  id: string;
  sanitized_sql: string | null;
  status: string;
  exec_ms: number | null;
  row_count: number | null;
  errors_json: string;
  ran_at: string;
};

function toKind(kind: string): QueryKind {
  return kind === 'run' ? 'run' : 'ask';
}

// ── Repository functions ─────────────────────────────────────────────

/**
 * Store the question and outcome of one pipeline run. Returns the query id.
 */
export function recordPipelineRun(db: Database.Database, state: PipelineState, kind: QueryKind): string {
  const queryId = randomUUID();
  const question = state.question || state.sqlRaw;
  const insert = db.transaction(() => {
    db.prepare(
      `INSERT INTO queries (id, seq, session_id, asked_at, question, kind)
       VALUES (?, (SELECT COALESCE(MAX(seq), 0) + 1 FROM queries), ?, ?, ?, ?)`,
    ).run(queryId, state.sessionId, state.startedAt, question, kind);

    db.prepare(
      `INSERT INTO runs (id, query_id, sanitized_sql, status, exec_ms, row_count, errors_json)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    ).run(
      state.runId,
      queryId,
      state.sanitized?.text ?? null,
      state.execution,
      state.execMs,
      state.execution === 'ok' ? state.rows.length : null,
      JSON.stringify(state.errors),
    );
  });
  insert();
  return queryId;
}

/** Newest first. */
export function listHistory(
  db: Database.Database,
  opts: { sessionId?: string; limit?: number } = {},
): HistoryListItem[] {
  const limit = opts.limit ?? 20;
  const select = `SELECT q.id, q.question, q.kind, q.asked_at,
                         r.status, r.exec_ms, r.row_count
                  FROM queries q
                  LEFT JOIN runs r ON r.query_id = q.id`;
  const rows = opts.sessionId
    ? db
        .prepare<[string, number], ListRow>(`${select} WHERE q.session_id = ? ORDER BY q.seq DESC LIMIT ?`)
        .all(opts.sessionId, limit)
    : db.prepare<[number], ListRow>(`${select} ORDER BY q.seq DESC LIMIT ?`).all(limit);

  return rows.map((row) => ({
    id: row.id,
    question: row.question,
    kind: toKind(row.kind),
    askedAt: row.asked_at,
    status: row.status,
    execMs: row.exec_ms,
    rowCount: row.row_count,
  }));
}

export function getHistoryItem(db: Database.Database, id: string): HistoryDetail | null {
  const query = db
    .prepare<[string], QueryRow>('SELECT id, session_id, question, kind, asked_at FROM queries WHERE id = ?')
    .get(id);

  if (!query) return null;

  const runRow = db
    .prepare<[string], RunRow>(
      `SELECT id, sanitized_sql, status, exec_ms, row_count, errors_json, ran_at
       FROM runs WHERE query_id = ? ORDER BY ran_at DESC LIMIT 1`,
    )
    .get(id);

  return {
    query: {
      id: query.id,
      sessionId: query.session_id,
      question: query.question,
      kind: toKind(query.kind),
      askedAt: query.asked_at,
    },
    run: runRow
      ? {
          id: runRow.id,
          sanitizedSql: runRow.sanitized_sql,
          status: runRow.status,
          execMs: runRow.exec_ms,
          rowCount: runRow.row_count,
          errors: parseErrors(runRow.errors_json),
          ranAt: runRow.ran_at,
        }
      : null,
  };
}

function parseErrors(json: string): string[] {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/** Full id for a unique id prefix, as printed by `history list`. */
export function resolveQueryId(db: Database.Database, idOrPrefix: string): string | null {
  const matches = db
    .prepare<[string], { id: string }>('SELECT id FROM queries WHERE id LIKE ? LIMIT 2')
    .all(`${idOrPrefix.replace(/[%_]/g, '')}%`);
  return matches.length === 1 ? matches[0].id : null;
}
