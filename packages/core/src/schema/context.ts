/**
 * Schema snapshot → the plain-text context handed to a SQL generator.
 */

import type { SchemaSnapshot, TableInfo } from '../db/types.js';

const GUIDELINES = [
  'SQL GENERATION GUIDELINES:',
  '- Generate PostgreSQL',
  '- Use schema-qualified names: schema.table (e.g. public.dim_customer, public.fact_loans)',
  '- Star schema: dimension tables are prefixed dim_, fact tables fact_, reference tables ref_',
  '- Return a single SELECT statement (optionally with CTEs)',
  '- No INSERT, UPDATE, DELETE, DROP or other statements that change data or schema',
  '- Handle NULLs appropriately',
];

function qualified(table: TableInfo): string {
  return `${table.schema}.${table.name}`;
}

export function buildSchemaContext(snapshot: SchemaSnapshot): string {
  const lines: string[] = [];
  lines.push(`DATABASE: ${snapshot.database}`);
  lines.push(`Schema cached: ${snapshot.capturedAt}`);
  lines.push('');
  lines.push(...GUIDELINES);
  lines.push('');

  if (snapshot.views.length > 0) {
    lines.push('VIEWS:');
    for (const view of snapshot.views) {
      lines.push(`  ${qualified(view)}: ${view.columns.map((c) => c.name).join(', ')}`);
    }
    lines.push('');
  }

  if (snapshot.tables.length > 0) {
    lines.push('TABLES:');
    for (const table of snapshot.tables) {
      lines.push(`  ${qualified(table)}:`);
      for (const col of table.columns) {
        lines.push(`    ${col.name} (${col.dataType})${col.isPrimaryKey ? ' [PK]' : ''}`);
      }
    }
    lines.push('');
  }

  if (snapshot.relationships.length > 0) {
    lines.push('FOREIGN KEY RELATIONSHIPS:');
    for (const rel of snapshot.relationships) {
      lines.push(`  ${rel.fromTable}.${rel.fromColumn} -> ${rel.toTable}.${rel.toColumn}`);
    }
    lines.push('');
  }

  lines.push(
    `SUMMARY: ${snapshot.tables.length} tables, ${snapshot.views.length} views, ${snapshot.relationships.length} relationships`,
  );
  return lines.join('\n');
}
