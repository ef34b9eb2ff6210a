/**
 * SQLite adapter for local database files.
 * Opened read-only; admin DDL is never executed here.
 */

import Database from 'better-sqlite3';
import { SAFE_DEFAULTS } from '../defaults.js';
import { quoteIdent } from '../../actions/identifiers.js';
import type {
  ExecuteLimits,
  ExecuteResult,
  ForeignKeyInfo,
  Row,
  SchemaSnapshot,
  SqliteConnection,
  TableInfo,
} from '../types.js';

function openDatabase(cfg: Pick<SqliteConnection, 'database'>): Database.Database {
  if (!cfg.database.trim()) {
    throw new Error('SQLite database path is required.');
  }
  return new Database(cfg.database, { readonly: true, fileMustExist: true });
}

export async function testConnection(
  cfg: Pick<SqliteConnection, 'database'>,
): Promise<{ ok: boolean; error?: string; serverVersion?: string }> {
  try {
    const db = openDatabase(cfg);
    try {
      const versionRow = db.prepare<[], { version: string }>('SELECT sqlite_version() AS version').get();
      return { ok: true, serverVersion: versionRow?.version ?? 'sqlite' };
    } finally {
      db.close();
    }
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: message };
  }
}

export async function execute(
  cfg: Pick<SqliteConnection, 'database'>,
  sql: string,
  params: unknown[] = [],
  limits: ExecuteLimits = {},
): Promise<ExecuteResult> {
  const maxRows = limits.maxRows ?? SAFE_DEFAULTS.maxRows;
  const db = openDatabase(cfg);
  try {
    const start = performance.now();
    const stmt = db.prepare<unknown[], Row>(sql);
    if (!stmt.reader) {
      throw new Error('Only statements that return rows can run against SQLite.');
    }

    const allRows = stmt.all(...params);
    const execMs = Math.round(performance.now() - start);
    const columns = stmt.columns().map((column) => column.name);
    const truncated = allRows.length > maxRows;
    return {
      columns,
      rows: truncated ? allRows.slice(0, maxRows) : allRows,
      rowCount: allRows.length,
      truncated,
      execMs,
    };
  } finally {
    db.close();
  }
}

interface PragmaColumn {
  name: string;
  type: string;
  notnull: 0 | 1;
  pk: number;
  dflt_value: string | null;
}

interface PragmaForeignKey {
  id: number;
  table: string;
  from: string;
  to: string | null;
}

export async function introspectSchema(cfg: Pick<SqliteConnection, 'database'>): Promise<SchemaSnapshot> {
  const db = openDatabase(cfg);
  try {
    const objects = db
      .prepare<[], { name: string; type: 'table' | 'view' }>(
        `SELECT name, type
         FROM sqlite_master
         WHERE type IN ('table', 'view')
           AND name NOT LIKE 'sqlite_%'
         ORDER BY name`,
      )
      .all();

    const tables: TableInfo[] = [];
    const views: TableInfo[] = [];
    const relationships: ForeignKeyInfo[] = [];

    for (const object of objects) {
      const ident = quoteIdent(object.name);
      const columns = db.prepare<[], PragmaColumn>(`PRAGMA table_info(${ident})`).all();
      const info: TableInfo = {
        name: object.name,
        schema: 'main',
        columns: columns.map((column) => ({
          name: column.name,
          dataType: column.type || 'TEXT',
          nullable: column.notnull === 0,
          isPrimaryKey: column.pk > 0,
          ...(column.dflt_value !== null ? { defaultValue: column.dflt_value } : {}),
        })),
      };

      if (object.type === 'view') {
        views.push(info);
        continue;
      }

      const countRow = db.prepare<[], { c: number }>(`SELECT COUNT(*) AS c FROM ${ident}`).get();
      info.rowCountEstimate = Number(countRow?.c ?? 0);
      tables.push(info);

      for (const fk of db.prepare<[], PragmaForeignKey>(`PRAGMA foreign_key_list(${ident})`).all()) {
        relationships.push({
          constraintName: `fk_${object.name}_${fk.id}`,
          fromTable: `main.${object.name}`,
          fromColumn: fk.from,
          toTable: `main.${fk.table}`,
          toColumn: fk.to ?? fk.from,
        });
      }
    }

    return {
      database: cfg.database,
      capturedAt: new Date().toISOString(),
      tables,
      views,
      relationships,
    };
  } finally {
    db.close();
  }
}
