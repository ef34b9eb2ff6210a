/**
 * Star schema diagnostics for PostgreSQL.
 *
 * Answers the analytic intents that the renderer returns null for. Catalog
 * lookups are parameterized; identifiers read back from the catalog are
 * double-quoted before they are spliced into count queries.
 */

import type { ConcreteAction, StarIntent } from '../actions/types.js';
import { isStarIntent } from '../actions/types.js';
import { assertIdentifier, quoteIdent, splitTableRef } from '../actions/identifiers.js';
import type { QueryRunner, Row } from '../db/types.js';
import { classifyTable, type TableClass } from './classify-table.js';

export const DEFAULT_SCHEMA = 'public';
export const DEFAULT_TOP_N = 20;

export interface OverviewEntry {
  table: string;
  class: TableClass;
  rowCount: number;
  fkCount: number;
}

export interface OrphanCheck {
  fk: string;
  fkColumn: string;
  refTable: string;
  refColumn: string;
  orphans: number;
}

export interface OrphanReport {
  factTable: string;
  checks: OrphanCheck[];
}

export interface FactHealth {
  factTable: string;
  rowCount: number;
  orphans: OrphanCheck[];
  totalOrphans: number;
}

export interface NullDensity {
  column: string;
  nulls: number;
  total: number;
  nullPct: number;
}

export interface ValueShare {
  value: unknown;
  count: number;
  pct: number;
}

export type DiagnosticResult =
  | { intent: 'star_overview'; rows: OverviewEntry[] }
  | { intent: 'fact_health'; health: FactHealth }
  | { intent: 'orphan_check'; report: OrphanReport }
  | { intent: 'null_density'; table: string; rows: NullDensity[] }
  | { intent: 'top_distribution'; table: string; column: string; rows: ValueShare[] };

interface ResolvedTable {
  schema: string;
  name: string;
  /** `"schema"."name"` */
  sql: string;
  display: string;
}

function resolveTable(ref: string): ResolvedTable {
  const split = splitTableRef(ref);
  const schema = split.schema ?? DEFAULT_SCHEMA;
  return {
    schema,
    name: split.bare,
    sql: `${quoteIdent(schema)}.${quoteIdent(split.bare)}`,
    display: `${schema}.${split.bare}`,
  };
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}

function toText(value: unknown): string {
  return typeof value === 'string' ? value : String(value ?? '');
}

function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}

const TABLES_SQL = `
  SELECT t.table_schema, t.table_name, COALESCE(c.reltuples, 0)::bigint AS row_count
  FROM information_schema.tables t
  LEFT JOIN pg_namespace n ON n.nspname = t.table_schema
  LEFT JOIN pg_class c ON c.relname = t.table_name AND c.relnamespace = n.oid
  WHERE t.table_type = 'BASE TABLE'
    AND t.table_schema NOT IN ('pg_catalog', 'information_schema')
`;

const FK_COUNTS_SQL = `
  SELECT table_schema, table_name, COUNT(*) AS fk_count
  FROM information_schema.table_constraints
  WHERE constraint_type = 'FOREIGN KEY'
  GROUP BY table_schema, table_name
`;

const TABLE_FKS_SQL = `
  SELECT tc.constraint_name, kcu.column_name AS fk_column,
         ccu.table_schema AS ref_schema, ccu.table_name AS ref_table, ccu.column_name AS ref_column
  FROM information_schema.table_constraints tc
  JOIN information_schema.key_column_usage kcu
    ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
  JOIN information_schema.constraint_column_usage ccu
    ON ccu.constraint_name = tc.constraint_name AND ccu.constraint_schema = tc.table_schema
  WHERE tc.constraint_type = 'FOREIGN KEY'
    AND tc.table_schema = $1
    AND tc.table_name = $2
  ORDER BY tc.constraint_name
`;

const TABLE_COLUMNS_SQL = `
  SELECT column_name
  FROM information_schema.columns
  WHERE table_schema = $1 AND table_name = $2
  ORDER BY ordinal_position
`;

export class StarDiagnostics {
  constructor(private readonly runner: QueryRunner) {}

  async starOverview(): Promise<OverviewEntry[]> {
    const tables = await this.runner.query(TABLES_SQL);
    const fkRows = await this.runner.query(FK_COUNTS_SQL);

    const fkCounts = new Map<string, number>();
    for (const row of fkRows) {
      fkCounts.set(`${toText(row.table_schema)}.${toText(row.table_name)}`, toNumber(row.fk_count));
    }

    const overview = tables.map((row): OverviewEntry => {
      const schema = toText(row.table_schema);
      const name = toText(row.table_name);
      const key = `${schema}.${name}`;
      const rowCount = toNumber(row.row_count);
      const fkCount = fkCounts.get(key) ?? 0;
      return { table: key, class: classifyTable(schema, name, fkCount, rowCount), rowCount, fkCount };
    });

    return overview.sort((a, b) => a.class.localeCompare(b.class) || a.table.localeCompare(b.table));
  }

  async orphanCheck(factTable: string): Promise<OrphanReport> {
    const table = resolveTable(factTable);
    const fks = await this.runner.query(TABLE_FKS_SQL, [table.schema, table.name]);

    const checks: OrphanCheck[] = [];
    for (const fk of fks) {
      const fkColumn = toText(fk.fk_column);
      const refSchema = toText(fk.ref_schema);
      const refTable = toText(fk.ref_table);
      const refColumn = toText(fk.ref_column);
      const sql =
        `SELECT COUNT(*) AS orphans FROM ${table.sql} f ` +
        `LEFT JOIN ${quoteIdent(refSchema)}.${quoteIdent(refTable)} d ON f.${quoteIdent(fkColumn)} = d.${quoteIdent(refColumn)} ` +
        `WHERE f.${quoteIdent(fkColumn)} IS NOT NULL AND d.${quoteIdent(refColumn)} IS NULL`;
      const [result] = await this.runner.query(sql);
      checks.push({
        fk: toText(fk.constraint_name),
        fkColumn,
        refTable: `${refSchema}.${refTable}`,
        refColumn,
        orphans: toNumber(result?.orphans),
      });
    }
    return { factTable: table.display, checks };
  }

  async factHealth(factTable: string): Promise<FactHealth> {
    const table = resolveTable(factTable);
    const [countRow] = await this.runner.query(`SELECT COUNT(*) AS row_count FROM ${table.sql}`);
    const report = await this.orphanCheck(factTable);
    return {
      factTable: table.display,
      rowCount: toNumber(countRow?.row_count),
      orphans: report.checks,
      totalOrphans: report.checks.reduce((sum, check) => sum + check.orphans, 0),
    };
  }

  async nullDensity(tableRef: string): Promise<NullDensity[]> {
    const table = resolveTable(tableRef);
    const columns = await this.runner.query(TABLE_COLUMNS_SQL, [table.schema, table.name]);
    const densities: NullDensity[] = [];
    for (const col of columns) {
      const column = toText(col.column_name);
      const [result] = await this.runner.query(
        `SELECT COUNT(*) - COUNT(${quoteIdent(column)}) AS nulls, COUNT(*) AS total FROM ${table.sql}`,
      );
      const nulls = toNumber(result?.nulls);
      const total = toNumber(result?.total);
      densities.push({ column, nulls, total, nullPct: total ? round4(nulls / total) : 0 });
    }
    return densities;
  }

  /** Share of each value among the top `top` values, not the whole table. */
  async topDistribution(tableRef: string, column: string, top: number = DEFAULT_TOP_N): Promise<ValueShare[]> {
    const table = resolveTable(tableRef);
    const col = quoteIdent(assertIdentifier(column, 'column'));
    const limit = Math.max(1, Math.floor(top));
    const rows: Row[] = await this.runner.query(
      `SELECT ${col} AS value, COUNT(*) AS cnt FROM ${table.sql} GROUP BY ${col} ORDER BY cnt DESC LIMIT ${limit}`,
    );
    const counted = rows.map((row) => ({ value: row.value, count: toNumber(row.cnt) }));
    const total = counted.reduce((sum, r) => sum + r.count, 0) || 1;
    return counted.map((r) => ({ ...r, pct: round4(r.count / total) }));
  }

  async runDiagnostic(action: ConcreteAction): Promise<DiagnosticResult> {
    if (!isStarIntent(action.intent)) {
      throw new Error(`${action.intent} is not a star schema diagnostic`);
    }
    return this.dispatch(action.intent, action);
  }

  private async dispatch(intent: StarIntent, action: ConcreteAction): Promise<DiagnosticResult> {
    const table = (): string => {
      if (!action.table) throw new Error(`${intent} requires a table`);
      return action.table;
    };
    switch (intent) {
      case 'star_overview':
        return { intent, rows: await this.starOverview() };
      case 'fact_health':
        return { intent, health: await this.factHealth(table()) };
      case 'orphan_check':
        return { intent, report: await this.orphanCheck(table()) };
      case 'null_density':
        return { intent, table: table(), rows: await this.nullDensity(table()) };
      case 'top_distribution': {
        if (!action.column) throw new Error('top_distribution requires a column');
        return { intent, table: table(), column: action.column, rows: await this.topDistribution(table(), action.column) };
      }
    }
  }
}
