/**
 * Audited execution of rendered admin statements.
 */

import { createHash } from 'node:crypto';
import type { ConcreteAction } from '../actions/types.js';
import { executeWriteQuery } from '../db/execute.js';
import { SAFE_DEFAULTS } from '../db/defaults.js';
import type { DbConnection } from '../db/types.js';
import { SanitizedSql } from '../policy/sanitize.js';

export interface AuditLog {
  logAudit(type: string, payload?: Record<string, unknown>): void;
}

export interface AdminExecutionResult {
  success: boolean;
  sql: string;
  rowsAffected: number;
  execMs: number;
  error?: string;
}

/**
 * Hash SQL for audit logging.
 */
export function hashSql(sql: string): string {
  return createHash('sha256').update(sql).digest('hex').slice(0, 16);
}

export type AdminWriter = (conn: DbConnection, sql: SanitizedSql) => Promise<{ rowsAffected: number; execMs: number }>;

const defaultWriter: AdminWriter = (conn, sql) =>
  executeWriteQuery(conn, sql, { statementTimeoutMs: SAFE_DEFAULTS.statementTimeoutMs });

/**
 * Render, execute and audit one action. Failures are returned, not thrown,
 * so a batch can report each line.
 */
export async function executeAdminAction(
  conn: DbConnection,
  action: ConcreteAction,
  audit: AuditLog,
  writer: AdminWriter = defaultWriter,
): Promise<AdminExecutionResult> {
  const sql = SanitizedSql.fromAction(action);
  if (!sql) {
    throw new Error(`${action.intent} does not render to SQL`);
  }
  const sqlHash = hashSql(sql.text);
  const base = { intent: action.intent, table: action.table ?? null, risk: action.risk, sql_hash: sqlHash };

  audit.logAudit('admin_confirmed', base);
  try {
    const result = await writer(conn, sql);
    audit.logAudit('admin_executed', { ...base, rows_affected: result.rowsAffected, exec_ms: result.execMs });
    return { success: true, sql: sql.text, ...result };
  } catch (err: unknown) {
    const error = err instanceof Error ? err.message : String(err);
    audit.logAudit('admin_failed', { ...base, error });
    return { success: false, sql: sql.text, rowsAffected: 0, execMs: 0, error };
  }
}
