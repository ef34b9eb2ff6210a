/**
 * Deterministic ConcreteAction → PostgreSQL statement text.
 *
 * Existence guards use DO blocks so every DDL statement is idempotent. Table
 * references are split once: the qualified form goes into the statement body,
 * the bare name into catalog predicates and derived index names.
 */

import type { ConcreteAction } from '../actions/types.js';
import { assertIdentifier, quoteLiteral, splitTableRef, type SplitTableRef } from '../actions/identifiers.js';
import { parseColumnList, parseIdentifierList, normalizeColumnType } from './columns.js';

export const LIST_TABLES_SQL = [
  "SELECT t.table_schema || '.' || t.table_name AS table_name, COUNT(c.column_name) AS column_count",
  'FROM information_schema.tables t',
  'LEFT JOIN information_schema.columns c',
  '  ON c.table_schema = t.table_schema AND c.table_name = t.table_name',
  "WHERE t.table_type = 'BASE TABLE'",
  "  AND t.table_schema NOT IN ('pg_catalog', 'information_schema')",
  'GROUP BY t.table_schema, t.table_name',
  'ORDER BY t.table_schema, t.table_name;',
].join('\n');

type Guard = 'exists' | 'missing';

function guarded(guard: Guard, probe: string, statement: string[]): string {
  const condition = guard === 'exists' ? 'IF EXISTS' : 'IF NOT EXISTS';
  return [
    'DO $$',
    'BEGIN',
    `  ${condition} (${probe}) THEN`,
    ...statement.map((line) => `    ${line}`),
    '  END IF;',
    'END $$;',
  ].join('\n');
}

function tableProbe(ref: SplitTableRef): string {
  return `SELECT 1 FROM information_schema.tables WHERE table_name = ${quoteLiteral(ref.bare)}`;
}

function columnProbe(ref: SplitTableRef, column: string): string {
  return (
    `SELECT 1 FROM information_schema.columns WHERE table_name = ${quoteLiteral(ref.bare)}` +
    ` AND column_name = ${quoteLiteral(column)}`
  );
}

function requireTable(action: ConcreteAction): SplitTableRef {
  if (!action.table) {
    throw new Error(`${action.intent} requires a table`);
  }
  return splitTableRef(action.table);
}

function requireColumn(action: ConcreteAction): string {
  if (!action.column) {
    throw new Error(`${action.intent} requires a column`);
  }
  return assertIdentifier(action.column, 'column');
}

/**
 * Render an action to SQL. Returns null for the star-schema diagnostics,
 * which are answered by StarDiagnostics rather than a single statement.
 */
export function renderSql(action: ConcreteAction): string | null {
  switch (action.intent) {
    case 'list_tables':
      return LIST_TABLES_SQL;

    case 'describe_table': {
      const ref = requireTable(action);
      return [
        'SELECT column_name, data_type, is_nullable, character_maximum_length',
        'FROM information_schema.columns',
        `WHERE table_name = ${quoteLiteral(ref.bare)}`,
        'ORDER BY ordinal_position;',
      ].join('\n');
    }

    case 'row_count': {
      const ref = requireTable(action);
      return `SELECT COUNT(*) AS row_count FROM ${ref.qualified};`;
    }

    case 'drop_table': {
      const ref = requireTable(action);
      return guarded('exists', tableProbe(ref), [`DROP TABLE ${ref.qualified};`]);
    }

    case 'create_table': {
      const ref = requireTable(action);
      const columns = parseColumnList(action.options.columns ?? '');
      const body = columns.map((col, i) => `  ${col.name} ${col.type}${i < columns.length - 1 ? ',' : ''}`);
      return guarded('missing', tableProbe(ref), [`CREATE TABLE ${ref.qualified} (`, ...body, ');']);
    }

    case 'add_column': {
      const ref = requireTable(action);
      const column = requireColumn(action);
      const type = normalizeColumnType(action.options.type);
      return guarded('missing', columnProbe(ref, column), [
        `ALTER TABLE ${ref.qualified} ADD COLUMN ${column} ${type};`,
      ]);
    }

    case 'drop_column': {
      const ref = requireTable(action);
      const column = requireColumn(action);
      return guarded('exists', columnProbe(ref, column), [`ALTER TABLE ${ref.qualified} DROP COLUMN ${column};`]);
    }

    case 'create_index': {
      const ref = requireTable(action);
      const columns = parseIdentifierList(action.options.columns ?? '').map((c) => assertIdentifier(c, 'column'));
      if (columns.length === 0) {
        throw new Error('create_index requires at least one column');
      }
      const indexName = `ix_${ref.bare}_${columns[0]}`;
      return guarded('missing', `SELECT 1 FROM pg_indexes WHERE indexname = ${quoteLiteral(indexName)}`, [
        `CREATE INDEX ${indexName} ON ${ref.qualified} (${columns.join(', ')});`,
      ]);
    }

    case 'star_overview':
    case 'fact_health':
    case 'orphan_check':
    case 'null_density':
    case 'top_distribution':
      return null;
  }
}
