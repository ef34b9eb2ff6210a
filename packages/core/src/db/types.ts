/**
 * Database-facing types: connection settings, result sets, schema snapshots
 * and the collaborator contracts the pipeline and diagnostics consume.
 */

import type { SanitizedSql } from '../policy/sanitize.js';

export type DbType = 'postgres' | 'sqlite';

export interface PgConnectionConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  ssl: boolean;
}

export interface PostgresConnection extends PgConnectionConfig {
  dbType: 'postgres';
  password: string;
}

export interface SqliteConnection {
  dbType: 'sqlite';
  /** Path to the database file */
  database: string;
}

export type DbConnection = PostgresConnection | SqliteConnection;

export type Row = Record<string, unknown>;

export interface ExecuteLimits {
  maxRows?: number;
  statementTimeoutMs?: number;
}

export interface ExecuteResult {
  columns: string[];
  rows: Row[];
  rowCount: number;
  truncated: boolean;
  execMs: number;
}

export interface WriteResult {
  rowsAffected: number;
  execMs: number;
}

export interface ColumnInfo {
  name: string;
  dataType: string;
  nullable: boolean;
  isPrimaryKey: boolean;
  maxLength?: number;
  defaultValue?: string;
}

export interface TableInfo {
  name: string;
  schema: string;
  columns: ColumnInfo[];
  rowCountEstimate?: number;
}

export interface ForeignKeyInfo {
  constraintName: string;
  /** Qualified `schema.table` */
  fromTable: string;
  fromColumn: string;
  toTable: string;
  toColumn: string;
}

export interface SchemaSnapshot {
  database: string;
  /** ISO-8601 */
  capturedAt: string;
  tables: TableInfo[];
  views: TableInfo[];
  relationships: ForeignKeyInfo[];
}

/** Runs sanitized statements for the pipeline. */
export interface SqlExecutor {
  executeSqlQuery(sql: SanitizedSql): Promise<Row[]>;
}

/** Fixed catalog and diagnostic queries issued by this package itself. */
export interface QueryRunner {
  query(sql: string, params?: unknown[]): Promise<Row[]>;
}
