/**
 * Risk level for SQL typed directly into the admin console.
 * AST kinds decide when the text parses; keyword checks decide when it does not.
 */

import { maxRisk, type RiskLevel } from '../actions/types.js';
import { parseSql, type SqlKind } from './parse.js';

export interface StatementRisk {
  risk: RiskLevel;
  kinds: SqlKind[];
  parsed: boolean;
  summary: string;
}

const KIND_RISK: Record<SqlKind, RiskLevel> = {
  select: 'low',
  insert: 'medium',
  update: 'medium',
  delete: 'medium',
  create: 'medium',
  alter: 'medium',
  drop: 'high',
  truncate: 'high',
  unknown: 'medium',
};

// node-sql-parser does not cover privilege statements
const PRIVILEGE_RE = /^\s*(GRANT|REVOKE)\b/i;

export function riskFromText(sql: string): RiskLevel {
  const upper = sql.toUpperCase();
  if (upper.includes('DROP TABLE') || upper.includes('TRUNCATE TABLE')) {
    return 'high';
  }
  if (upper.includes('DROP COLUMN') || (upper.includes('ALTER TABLE') && (upper.includes('ALTER COLUMN') || upper.includes('DROP')))) {
    return 'medium';
  }
  return 'low';
}

export function assessStatementRisk(sql: string): StatementRisk {
  const privilege = PRIVILEGE_RE.exec(sql);
  if (privilege) {
    return {
      risk: 'high',
      kinds: ['unknown'],
      parsed: false,
      summary: `${privilege[1].toUpperCase()} statement (privilege change)`,
    };
  }

  const parsed = parseSql(sql);
  if (!parsed.ok) {
    const risk = riskFromText(sql);
    return { risk, kinds: ['unknown'], parsed: false, summary: `Unparseable statement, ${risk} risk by keyword scan` };
  }

  const risk = maxRisk(parsed.kinds.map((kind) => KIND_RISK[kind]));
  const kinds = parsed.kinds.map((kind) => kind.toUpperCase()).join(', ');
  return {
    risk,
    kinds: parsed.kinds,
    parsed: true,
    summary: parsed.statementCount > 1 ? `${parsed.statementCount} statements (${kinds})` : kinds,
  };
}
