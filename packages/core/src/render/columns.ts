import { isIdentifier } from '../actions/identifiers.js';

export interface ColumnSpec {
  name: string;
  type: string;
}

export const DEFAULT_COLUMN_TYPE = 'VARCHAR(50)';

/** Used when a column list parses to nothing, so CREATE TABLE is never empty. */
export const FALLBACK_COLUMN: ColumnSpec = { name: 'id', type: 'INT' };

const SIMPLE_TYPES = new Set([
  'int',
  'integer',
  'bigint',
  'smallint',
  'date',
  'timestamp',
  'timestamptz',
  'boolean',
  'text',
  'decimal(18,2)',
  'decimal(19,4)',
  'numeric(18,2)',
  'numeric(19,4)',
]);

const VARCHAR_RE = /^varchar\(\d+\)$/;
const TYPE_TOKEN_RE = /^([A-Za-z0-9_]+(?:\s*\([^)]*\))?)/;

/**
 * Map a type token onto the recognized set. Anything else, including a
 * missing token, becomes DEFAULT_COLUMN_TYPE.
 */
export function normalizeColumnType(token: string | undefined): string {
  if (!token) return DEFAULT_COLUMN_TYPE;
  const compact = token.toLowerCase().replace(/\s+/g, '');
  if (SIMPLE_TYPES.has(compact) || VARCHAR_RE.test(compact)) {
    return compact.toUpperCase();
  }
  return DEFAULT_COLUMN_TYPE;
}

/** Split on commas that are not inside parentheses. */
export function splitTopLevel(raw: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of raw) {
    if (ch === '(') depth++;
    if (ch === ')') depth = Math.max(0, depth - 1);
    if (ch === ',' && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts;
}

/**
 * Parse `id int, amount decimal(18,2), notes` into column specs.
 * Segments without a usable column name are skipped.
 */
export function parseColumnList(raw: string): ColumnSpec[] {
  const specs: ColumnSpec[] = [];
  for (const segment of splitTopLevel(raw)) {
    const trimmed = segment.trim();
    if (!trimmed) continue;

    const space = trimmed.search(/\s/);
    const name = space === -1 ? trimmed : trimmed.slice(0, space);
    if (!isIdentifier(name)) continue;

    const rest = space === -1 ? '' : trimmed.slice(space).trim();
    const typeToken = TYPE_TOKEN_RE.exec(rest)?.[1];
    specs.push({ name, type: normalizeColumnType(typeToken) });
  }
  return specs.length > 0 ? specs : [FALLBACK_COLUMN];
}

/** Comma separated identifier list, as captured for CREATE INDEX. */
export function parseIdentifierList(raw: string): string[] {
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
