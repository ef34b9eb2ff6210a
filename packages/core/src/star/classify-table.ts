export type TableClass = 'dimension' | 'fact' | 'reference' | 'other';

const FACT_PREFIXES = ['fact_'];
const DIM_PREFIXES = ['dim_'];
const REF_PREFIXES = ['ref_'];

/**
 * Naming first (`fact_`, `dim_`, `ref_` or a `ref` schema), then shape:
 * many foreign keys on a large table reads as a fact, a small table with few
 * foreign keys as a dimension.
 */
export function classifyTable(schema: string, name: string, fkCount: number, rowCount: number): TableClass {
  const lname = name.toLowerCase();
  if (FACT_PREFIXES.some((p) => lname.startsWith(p))) return 'fact';
  if (DIM_PREFIXES.some((p) => lname.startsWith(p))) return 'dimension';
  if (REF_PREFIXES.some((p) => lname.startsWith(p)) || schema.toLowerCase() === 'ref') return 'reference';
  if (fkCount >= 3 && rowCount > 1000) return 'fact';
  if (rowCount < 20_000 && fkCount <= 2) return 'dimension';
  return 'other';
}
