/**
 * Execution dispatcher.
 * Selects the adapter for a connection and only accepts sanitized statements.
 */

import * as postgres from './adapters/postgres.js';
import * as sqlite from './adapters/sqlite.js';
import type {
  DbConnection,
  ExecuteLimits,
  ExecuteResult,
  PgConnectionConfig,
  PostgresConnection,
  QueryRunner,
  SchemaSnapshot,
  SqlExecutor,
  WriteResult,
} from './types.js';
import type { SanitizedSql } from '../policy/sanitize.js';

function toPgConfig(conn: PostgresConnection): PgConnectionConfig {
  return { host: conn.host, port: conn.port, database: conn.database, user: conn.user, ssl: conn.ssl };
}

export async function executeQuery(
  conn: DbConnection,
  sql: SanitizedSql,
  limits?: ExecuteLimits,
): Promise<ExecuteResult> {
  switch (conn.dbType) {
    case 'postgres':
      return postgres.execute(toPgConfig(conn), conn.password, sql.text, [], limits);
    case 'sqlite':
      return sqlite.execute(conn, sql.text, [], limits);
  }
}

/**
 * Run a schema-changing statement. Only renderer output is accepted, and only
 * against PostgreSQL.
 */
export async function executeWriteQuery(
  conn: DbConnection,
  sql: SanitizedSql,
  limits?: ExecuteLimits,
): Promise<WriteResult> {
  if (sql.origin !== 'renderer') {
    throw new Error('Only rendered admin statements may run in a read-write transaction.');
  }
  switch (conn.dbType) {
    case 'postgres':
      return postgres.executeWrite(toPgConfig(conn), conn.password, sql.text, limits);
    case 'sqlite':
      throw new Error('Admin statements are rendered for PostgreSQL and cannot run against SQLite.');
  }
}

export async function testDbConnection(
  conn: DbConnection,
): Promise<{ ok: boolean; error?: string; serverVersion?: string }> {
  switch (conn.dbType) {
    case 'postgres':
      return postgres.testConnection(toPgConfig(conn), conn.password);
    case 'sqlite':
      return sqlite.testConnection(conn);
  }
}

export async function introspectSchemaForConnection(conn: DbConnection): Promise<SchemaSnapshot> {
  switch (conn.dbType) {
    case 'postgres':
      return postgres.introspectSchema(toPgConfig(conn), conn.password);
    case 'sqlite':
      return sqlite.introspectSchema(conn);
  }
}

/** SqlExecutor bound to one connection, for the pipeline. */
export function createSqlExecutor(conn: DbConnection, limits?: ExecuteLimits): SqlExecutor {
  return {
    async executeSqlQuery(sql) {
      const result = await executeQuery(conn, sql, limits);
      return result.rows;
    },
  };
}

/**
 * Open one read-only PostgreSQL session and hand `fn` a QueryRunner over it.
 * Star diagnostics issue catalog queries that only PostgreSQL answers.
 */
export async function withQueryRunner<T>(
  conn: DbConnection,
  fn: (runner: QueryRunner) => Promise<T>,
  limits: ExecuteLimits = {},
): Promise<T> {
  if (conn.dbType !== 'postgres') {
    throw new Error('Star schema diagnostics require a PostgreSQL connection.');
  }
  return postgres.withReadOnlyClient(toPgConfig(conn), conn.password, limits, (client) =>
    fn({
      async query(sql, params = []) {
        const result = await client.query<Record<string, unknown>>(sql, params);
        return result.rows;
      },
    }),
  );
}
