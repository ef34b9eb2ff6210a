/**
 * Sanitizer for SQL text that arrives from outside the renderer, typically a
 * model response with prose, code fences and typographic quotes around it.
 *
 * Pattern extraction and a keyword denylist only; this does not parse SQL.
 * Any denylisted keyword discards the whole text.
 */

import type { ConcreteAction } from '../actions/types.js';
import { renderSql } from '../render/render.js';

export const FORBIDDEN_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'MERGE',
  'CREATE',
  'ALTER',
  'DROP',
  'TRUNCATE',
  'EXEC',
  'GRANT',
  'REVOKE',
  'DENY',
] as const;

export type ForbiddenKeyword = (typeof FORBIDDEN_KEYWORDS)[number];

export const WARNING_MARKER = '-- [WARNING]';

export const AGGREGATE_SUBQUERY_WARNING =
  'Aggregate applied directly to a subquery; many engines reject this. Move the subquery into a CTE or join.';

const SQL_FENCE_RE = /```sql\b\s*([\s\S]+?)```/i;
const ANY_FENCE_RE = /```(?:[A-Za-z0-9_-]*[ \t]*\n)?([\s\S]+?)```/;
const CTE_START_RE = /\bWITH\b\s+[A-Za-z0-9_[\]]+\s+AS\s*\(/i;
const SELECT_START_RE = /\bSELECT\b/i;
const FORBIDDEN_RE = new RegExp(`\\b(${FORBIDDEN_KEYWORDS.join('|')})\\b`, 'i');
const AGGREGATE_SUBQUERY_RE = /\b(?:SUM|COUNT|AVG|MIN|MAX)\s*\(\s*\(\s*SELECT[\s\S]+?\)\s*\)/i;

export type SqlOrigin = 'renderer' | 'generator';

export type SanitizeOutcome =
  | { ok: true; sql: SanitizedSql; warnings: string[] }
  | { ok: false; reason: 'empty'; extracted: string }
  | { ok: false; reason: 'unsafe'; keyword: ForbiddenKeyword; extracted: string };

/**
 * SQL text that is allowed to reach an executor. There are two ways in: the
 * renderer (trusted origin) and the denylist gate in screen().
 */
export class SanitizedSql {
  readonly text: string;
  readonly origin: SqlOrigin;
  readonly warnings: readonly string[];

  private constructor(text: string, origin: SqlOrigin, warnings: readonly string[]) {
    this.text = text;
    this.origin = origin;
    this.warnings = warnings;
  }

  /** Render an action. Null for intents that do not render to SQL. */
  static fromAction(action: ConcreteAction): SanitizedSql | null {
    const sql = renderSql(action);
    return sql === null ? null : new SanitizedSql(sql, 'renderer', []);
  }

  /** Extract, normalize and screen untrusted text. */
  static screen(raw: string): SanitizeOutcome {
    const extracted = straightenQuotes(extractSql(raw));
    if (!extracted) {
      return { ok: false, reason: 'empty', extracted };
    }

    const keyword = findForbiddenKeyword(extracted);
    if (keyword) {
      return { ok: false, reason: 'unsafe', keyword, extracted };
    }

    const warnings: string[] = [];
    let text = extracted;
    if (AGGREGATE_SUBQUERY_RE.test(text)) {
      warnings.push(AGGREGATE_SUBQUERY_WARNING);
      text = `${text}\n${WARNING_MARKER} ${AGGREGATE_SUBQUERY_WARNING}`;
    }

    return { ok: true, sql: new SanitizedSql(text, 'generator', warnings), warnings };
  }

  hasWarningMarker(): boolean {
    return this.text.includes(WARNING_MARKER);
  }

  toString(): string {
    return this.text;
  }
}

/** Pull the most likely statement out of free text. */
export function extractSql(raw: string): string {
  const tagged = SQL_FENCE_RE.exec(raw);
  if (tagged) return tagged[1].trim();

  const fenced = ANY_FENCE_RE.exec(raw);
  if (fenced) return fenced[1].trim();

  const cte = CTE_START_RE.exec(raw);
  if (cte) return raw.slice(cte.index).trim();

  const select = SELECT_START_RE.exec(raw);
  if (select) return raw.slice(select.index).trim();

  return raw.trim();
}

export function straightenQuotes(text: string): string {
  return text.replace(/[‘’]/g, "'").replace(/[“”]/g, '"');
}

function toForbiddenKeyword(word: string): ForbiddenKeyword | undefined {
  const upper = word.toUpperCase();
  return FORBIDDEN_KEYWORDS.find((kw) => kw === upper);
}

export function findForbiddenKeyword(sql: string): ForbiddenKeyword | null {
  const match = FORBIDDEN_RE.exec(sql);
  if (!match) return null;
  return toForbiddenKeyword(match[1]) ?? null;
}

export function sanitizeSql(raw: string): SanitizeOutcome {
  return SanitizedSql.screen(raw);
}

/** String form: the sanitized text, or '' when nothing is executable. */
export function sanitize(raw: string): string {
  const outcome = sanitizeSql(raw);
  return outcome.ok ? outcome.sql.text : '';
}
