/**
 * Admin console batch: one request per line.
 *
 * Lines are classified up front. Read-only intents and raw SELECT/WITH
 * statements run immediately, analytic intents go to star diagnostics, and
 * schema changes wait behind one typed confirmation for the whole batch.
 */

import {
  SanitizedSql,
  assessStatementRisk,
  classifyRequest,
  executeAdminAction,
  isSchemaChangeIntent,
  isStarIntent,
  renderSql,
  requestBatchConfirmation,
  sanitizeSql,
  splitRequests,
  verifyConfirmation,
  type AdminWriter,
  type AuditLog,
  type ConcreteAction,
  type ConfirmationRequest,
  type DbConnection,
  type DiagnosticResult,
  type ExecuteResult,
  type RiskLevel,
  type RuleScope,
} from '@askdb/core';

const RAW_QUERY_RE = /^\s*(?:select|with)\b/i;

export type AdminLineResult =
  | { line: string; status: 'unknown'; message: string }
  | { line: string; status: 'clarification'; question: string }
  | { line: string; status: 'rejected'; message: string }
  | { line: string; status: 'query'; sql: string; risk: RiskLevel; result: ExecuteResult }
  | { line: string; status: 'diagnostic'; result: DiagnosticResult }
  | { line: string; status: 'planned'; sql: string; risk: RiskLevel; note: string }
  | { line: string; status: 'executed'; sql: string; risk: RiskLevel; execMs: number }
  | { line: string; status: 'skipped'; sql: string; risk: RiskLevel; message: string }
  | { line: string; status: 'failed'; message: string; sql?: string };

export interface AdminBatchDeps {
  conn: DbConnection;
  scope: RuleScope;
  audit: AuditLog;
  /** Resolves with the typed phrase, or null when nobody can answer */
  confirm: (request: ConfirmationRequest) => Promise<string | null>;
  readQuery: (sql: SanitizedSql) => Promise<ExecuteResult>;
  diagnose: (action: ConcreteAction) => Promise<DiagnosticResult>;
  writer?: AdminWriter;
  /** Render schema changes without executing or confirming them */
  dryRun?: boolean;
  customPhrase?: string | null;
}

export interface AdminBatchReport {
  results: AdminLineResult[];
  confirmation: { required: boolean; accepted: boolean; risk: RiskLevel | null };
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function runRawQuery(line: string, deps: AdminBatchDeps): Promise<AdminLineResult> {
  const risk = assessStatementRisk(line);
  const outcome = sanitizeSql(line);
  if (!outcome.ok) {
    const message =
      outcome.reason === 'unsafe' ? `Forbidden keyword ${outcome.keyword}` : 'No SQL statement found';
    return { line, status: 'rejected', message };
  }
  try {
    const result = await deps.readQuery(outcome.sql);
    return { line, status: 'query', sql: outcome.sql.text, risk: risk.risk, result };
  } catch (err: unknown) {
    return { line, status: 'failed', sql: outcome.sql.text, message: messageOf(err) };
  }
}

async function runReadAction(line: string, action: ConcreteAction, deps: AdminBatchDeps): Promise<AdminLineResult> {
  const sql = SanitizedSql.fromAction(action);
  if (!sql) {
    return { line, status: 'failed', message: `${action.intent} does not render to SQL` };
  }
  try {
    const result = await deps.readQuery(sql);
    return { line, status: 'query', sql: sql.text, risk: action.risk, result };
  } catch (err: unknown) {
    return { line, status: 'failed', sql: sql.text, message: messageOf(err) };
  }
}

async function runDiagnostic(line: string, action: ConcreteAction, deps: AdminBatchDeps): Promise<AdminLineResult> {
  try {
    return { line, status: 'diagnostic', result: await deps.diagnose(action) };
  } catch (err: unknown) {
    return { line, status: 'failed', message: messageOf(err) };
  }
}

export async function runAdminBatch(text: string, deps: AdminBatchDeps): Promise<AdminBatchReport> {
  const lines = splitRequests(text);
  const planned = lines.map((line) => ({
    line,
    action: RAW_QUERY_RE.test(line) ? null : classifyRequest(line, { scope: deps.scope }),
  }));

  const changes: ConcreteAction[] = [];
  for (const entry of planned) {
    if (entry.action?.kind === 'action' && isSchemaChangeIntent(entry.action.intent)) {
      changes.push(entry.action);
    }
  }

  const request = deps.dryRun ? null : requestBatchConfirmation(changes, deps.customPhrase);
  let accepted = false;
  if (request) {
    const typed = await deps.confirm(request);
    accepted = typed !== null && verifyConfirmation(typed, request.phrase);
    deps.audit.logAudit(accepted ? 'admin_confirmation_accepted' : 'admin_confirmation_rejected', {
      risk: request.risk,
      statements: changes.length,
    });
  }

  const results: AdminLineResult[] = [];
  for (const { line, action } of planned) {
    if (action === null) {
      results.push(await runRawQuery(line, deps));
      continue;
    }
    if (action.kind === 'unknown') {
      results.push({ line, status: 'unknown', message: 'No matching admin or diagnostic command' });
      continue;
    }
    if (action.kind === 'clarification') {
      results.push({ line, status: 'clarification', question: action.question });
      continue;
    }
    if (isStarIntent(action.intent)) {
      results.push(await runDiagnostic(line, action, deps));
      continue;
    }
    if (!isSchemaChangeIntent(action.intent)) {
      results.push(await runReadAction(line, action, deps));
      continue;
    }

    const sql = renderSql(action) ?? '';
    if (deps.dryRun) {
      results.push({ line, status: 'planned', sql, risk: action.risk, note: action.note });
      continue;
    }
    if (!accepted) {
      results.push({ line, status: 'skipped', sql, risk: action.risk, message: 'Confirmation phrase did not match' });
      continue;
    }
    const outcome = await executeAdminAction(deps.conn, action, deps.audit, deps.writer);
    results.push(
      outcome.success
        ? { line, status: 'executed', sql: outcome.sql, risk: action.risk, execMs: outcome.execMs }
        : { line, status: 'failed', sql: outcome.sql, message: outcome.error ?? 'Execution failed' },
    );
  }

  return {
    results,
    confirmation: { required: request !== null, accepted, risk: request?.risk ?? null },
  };
}

/** Exit status for a batch: policy when a change was refused, runtime when anything failed. */
export function batchOutcome(report: AdminBatchReport): 'ok' | 'failed' | 'refused' {
  if (report.results.some((r) => r.status === 'skipped')) return 'refused';
  if (report.results.some((r) => r.status === 'failed' || r.status === 'rejected')) return 'failed';
  return 'ok';
}
