/**
 * Postgres adapter.
 * Uses the `pg` driver with strict safety defaults.
 */

import pg from 'pg';
import type { Client as PgClient } from 'pg';
import { SAFE_DEFAULTS } from '../defaults.js';
import type {
  ColumnInfo,
  ExecuteLimits,
  ExecuteResult,
  ForeignKeyInfo,
  PgConnectionConfig,
  Row,
  SchemaSnapshot,
  TableInfo,
  WriteResult,
} from '../types.js';

const { Client } = pg;

function createClient(cfg: PgConnectionConfig, password: string): PgClient {
  return new Client({
    host: cfg.host,
    port: cfg.port,
    database: cfg.database,
    user: cfg.user,
    password,
    ssl: cfg.ssl ? { rejectUnauthorized: false } : false,
    connectionTimeoutMillis: SAFE_DEFAULTS.connectTimeoutMs,
  });
}

function timeoutOf(limits: ExecuteLimits): number {
  const ms = limits.statementTimeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs;
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new Error(`Invalid statement timeout: ${ms}`);
  }
  return ms;
}

/**
 * Test a Postgres connection: connect, read the server version, disconnect.
 */
export async function testConnection(
  cfg: PgConnectionConfig,
  password: string,
): Promise<{ ok: boolean; error?: string; serverVersion?: string }> {
  const client = createClient(cfg, password);
  try {
    await client.connect();
    const res = await client.query<{ version: string }>('SELECT version() AS version');
    return { ok: true, serverVersion: res.rows[0]?.version };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: message };
  } finally {
    await client.end();
  }
}

/**
 * Run `fn` inside a READ ONLY transaction with statement_timeout set.
 * Closing the connection aborts the transaction if `fn` throws.
 */
export async function withReadOnlyClient<T>(
  cfg: PgConnectionConfig,
  password: string,
  limits: ExecuteLimits,
  fn: (client: PgClient) => Promise<T>,
): Promise<T> {
  const timeoutMs = timeoutOf(limits);
  const client = createClient(cfg, password);
  try {
    await client.connect();
    await client.query(`SET statement_timeout = ${timeoutMs}`);
    await client.query('BEGIN READ ONLY');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } finally {
    await client.end();
  }
}

/**
 * Execute a read statement. Returned rows are capped at limits.maxRows.
 */
export async function execute(
  cfg: PgConnectionConfig,
  password: string,
  sql: string,
  params: unknown[] = [],
  limits: ExecuteLimits = {},
): Promise<ExecuteResult> {
  const maxRows = limits.maxRows ?? SAFE_DEFAULTS.maxRows;

  return withReadOnlyClient(cfg, password, limits, async (client) => {
    const start = performance.now();
    const result = await client.query<Row>(sql, params);
    const execMs = Math.round(performance.now() - start);

    const columns = result.fields.map((f) => f.name);
    const allRows = result.rows;
    const truncated = allRows.length > maxRows;
    return {
      columns,
      rows: truncated ? allRows.slice(0, maxRows) : allRows,
      rowCount: allRows.length,
      truncated,
      execMs,
    };
  });
}

/**
 * Execute a schema-changing statement in a read-write transaction.
 * COMMIT only runs after the statement succeeds.
 */
export async function executeWrite(
  cfg: PgConnectionConfig,
  password: string,
  sql: string,
  limits: ExecuteLimits = {},
): Promise<WriteResult> {
  const timeoutMs = timeoutOf(limits);
  const client = createClient(cfg, password);
  try {
    await client.connect();
    await client.query(`SET statement_timeout = ${timeoutMs}`);
    await client.query('BEGIN');

    const start = performance.now();
    const result = await client.query(sql);
    const execMs = Math.round(performance.now() - start);

    await client.query('COMMIT');
    return { rowsAffected: result.rowCount ?? 0, execMs };
  } finally {
    await client.end();
  }
}

// Row shapes are type aliases: pg wants an index-signature-compatible type
type TableRow = {
  table_schema: string;
  table_name: string;
  table_type: string;
  row_estimate: string | null;
};

type ColumnRow = {
  table_schema: string;
  table_name: string;
  column_name: string;
  data_type: string;
  is_nullable: string;
  character_maximum_length: number | null;
  column_default: string | null;
  is_pk: boolean;
};

type ForeignKeyRow = {
  constraint_name: string;
  from_schema: string;
  from_table: string;
  from_column: string;
  to_schema: string;
  to_table: string;
  to_column: string;
};

const TABLES_SQL = `
  SELECT t.table_schema, t.table_name, t.table_type,
         c.reltuples::bigint AS row_estimate
  FROM information_schema.tables t
  LEFT JOIN pg_namespace n ON n.nspname = t.table_schema
  LEFT JOIN pg_class c ON c.relname = t.table_name AND c.relnamespace = n.oid
  WHERE t.table_schema NOT IN ('pg_catalog', 'information_schema')
    AND t.table_type IN ('BASE TABLE', 'VIEW')
  ORDER BY t.table_schema, t.table_name
`;

const COLUMNS_SQL = `
  SELECT c.table_schema, c.table_name, c.column_name, c.data_type,
         c.is_nullable, c.character_maximum_length, c.column_default,
         CASE WHEN pk.column_name IS NOT NULL THEN true ELSE false END AS is_pk
  FROM information_schema.columns c
  LEFT JOIN (
    SELECT ku.table_schema, ku.table_name, ku.column_name
    FROM information_schema.table_constraints tc
    JOIN information_schema.key_column_usage ku
      ON tc.constraint_name = ku.constraint_name
      AND tc.table_schema = ku.table_schema
    WHERE tc.constraint_type = 'PRIMARY KEY'
  ) pk ON pk.table_schema = c.table_schema
      AND pk.table_name = c.table_name
      AND pk.column_name = c.column_name
  WHERE c.table_schema NOT IN ('pg_catalog', 'information_schema')
  ORDER BY c.table_schema, c.table_name, c.ordinal_position
`;

const FOREIGN_KEYS_SQL = `
  SELECT tc.constraint_name,
         kcu.table_schema AS from_schema, kcu.table_name AS from_table, kcu.column_name AS from_column,
         ccu.table_schema AS to_schema, ccu.table_name AS to_table, ccu.column_name AS to_column
  FROM information_schema.table_constraints tc
  JOIN information_schema.key_column_usage kcu
    ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
  JOIN information_schema.constraint_column_usage ccu
    ON ccu.constraint_name = tc.constraint_name AND ccu.constraint_schema = tc.table_schema
  WHERE tc.constraint_type = 'FOREIGN KEY'
  ORDER BY kcu.table_schema, kcu.table_name, tc.constraint_name
`;

/**
 * Introspect tables, views, columns, primary keys and foreign keys.
 */
export async function introspectSchema(cfg: PgConnectionConfig, password: string): Promise<SchemaSnapshot> {
  return withReadOnlyClient(cfg, password, {}, async (client) => {
    const tablesRes = await client.query<TableRow>(TABLES_SQL);
    const colsRes = await client.query<ColumnRow>(COLUMNS_SQL);
    const fksRes = await client.query<ForeignKeyRow>(FOREIGN_KEYS_SQL);

    const tableMap = new Map<string, { info: TableInfo; isView: boolean }>();
    for (const row of tablesRes.rows) {
      const isView = row.table_type === 'VIEW';
      tableMap.set(`${row.table_schema}.${row.table_name}`, {
        isView,
        info: {
          name: row.table_name,
          schema: row.table_schema,
          columns: [],
          ...(isView ? {} : { rowCountEstimate: Math.max(0, Number(row.row_estimate) || 0) }),
        },
      });
    }

    for (const row of colsRes.rows) {
      const entry = tableMap.get(`${row.table_schema}.${row.table_name}`);
      if (!entry) continue;
      const column: ColumnInfo = {
        name: row.column_name,
        dataType: row.data_type,
        nullable: row.is_nullable === 'YES',
        isPrimaryKey: row.is_pk,
      };
      if (row.character_maximum_length !== null) column.maxLength = row.character_maximum_length;
      if (row.column_default !== null) column.defaultValue = row.column_default;
      entry.info.columns.push(column);
    }

    const relationships: ForeignKeyInfo[] = fksRes.rows.map((row) => ({
      constraintName: row.constraint_name,
      fromTable: `${row.from_schema}.${row.from_table}`,
      fromColumn: row.from_column,
      toTable: `${row.to_schema}.${row.to_table}`,
      toColumn: row.to_column,
    }));

    const entries = Array.from(tableMap.values());
    return {
      database: cfg.database,
      capturedAt: new Date().toISOString(),
      tables: entries.filter((e) => !e.isView).map((e) => e.info),
      views: entries.filter((e) => e.isView).map((e) => e.info),
      relationships,
    };
  });
}
