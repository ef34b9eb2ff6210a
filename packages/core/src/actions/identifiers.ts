/**
 * Identifier and literal handling shared by the classifier and the renderer.
 * Every table or column name that reaches SQL text goes through here.
 */

import type { TableRef } from './types.js';

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isIdentifier(name: string): boolean {
  return IDENTIFIER_RE.test(name);
}

export function isTableRef(ref: string): boolean {
  return ref.split('.').every(isIdentifier);
}

export interface SplitTableRef {
  /** Full dotted form, used in statement bodies */
  qualified: string;
  /** Final segment, used in catalog lookups and derived names */
  bare: string;
  /** Everything before the final segment, when present */
  schema: string | null;
}

export function splitTableRef(ref: TableRef): SplitTableRef {
  if (!isTableRef(ref)) {
    throw new Error(`Invalid table reference: "${ref}"`);
  }
  const lastDot = ref.lastIndexOf('.');
  return {
    qualified: ref,
    bare: lastDot === -1 ? ref : ref.slice(lastDot + 1),
    schema: lastDot === -1 ? null : ref.slice(0, lastDot),
  };
}

export function assertIdentifier(name: string, what: string): string {
  if (!isIdentifier(name)) {
    throw new Error(`Invalid ${what} name: "${name}"`);
  }
  return name;
}

/** Single-quoted SQL string literal. */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/** Double-quoted identifier for names read back from a catalog. */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
