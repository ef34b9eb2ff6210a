/**
 * AST parsing for ad-hoc SQL typed alongside admin requests.
 * Uses node-sql-parser with the PostgreSQL dialect.
 */

import pkg from 'node-sql-parser';
const { Parser } = pkg;

const parser = new Parser();
const PG_OPT = { database: 'PostgresQL' } as const;

export type SqlKind =
  | 'select'
  | 'insert'
  | 'update'
  | 'delete'
  | 'create'
  | 'alter'
  | 'drop'
  | 'truncate'
  | 'unknown';

const KNOWN_KINDS: ReadonlySet<string> = new Set([
  'select',
  'insert',
  'update',
  'delete',
  'create',
  'alter',
  'drop',
  'truncate',
]);

export interface ParseResult {
  /** One entry per statement, in order */
  kinds: SqlKind[];
  statementCount: number;
  /** Input with trailing semicolons stripped */
  normalizedSql: string;
}

export type ParseOutcome = ({ ok: true } & ParseResult) | { ok: false; error: string };

function isKnownKind(s: string): s is SqlKind {
  return KNOWN_KINDS.has(s);
}

function statementKind(node: unknown): SqlKind {
  if (typeof node === 'object' && node !== null && 'type' in node && typeof node.type === 'string') {
    const raw = node.type.toLowerCase();
    return isKnownKind(raw) ? raw : 'unknown';
  }
  return 'unknown';
}

export function parseSql(sql: string): ParseOutcome {
  const normalizedSql = sql.trim().replace(/;+\s*$/, '');
  if (!normalizedSql) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  try {
    const astResult = parser.astify(normalizedSql, PG_OPT);
    const statements = Array.isArray(astResult) ? astResult : [astResult];
    if (statements.length === 0) {
      return { ok: false, error: 'No statements found' };
    }
    return {
      ok: true,
      kinds: statements.map(statementKind),
      statementCount: statements.length,
      normalizedSql,
    };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `SQL parse error: ${msg}` };
  }
}
