/**
 * @askdb/core — barrel export
 *
 * Core logic used by the CLI.
 */

// Actions and intents
export type {
  IntentTag,
  AdminIntent,
  StarIntent,
  SchemaChangeIntent,
  RiskLevel,
  TableRef,
  ColumnName,
  ConcreteAction,
  UnknownAction,
  ClarificationAction,
  Action,
} from './actions/types.js';
export {
  ADMIN_INTENTS,
  STAR_INTENTS,
  SCHEMA_CHANGE_INTENTS,
  INTENT_RISK,
  compareRisk,
  maxRisk,
  isAdminIntent,
  isStarIntent,
  isSchemaChangeIntent,
} from './actions/types.js';
export { isIdentifier, isTableRef, splitTableRef, quoteIdent, quoteLiteral } from './actions/identifiers.js';

// Intent classifier
export { classifyRequest, classifyRequests, splitRequests } from './intent/classify.js';
export type { RuleScope, ClassifyOptions } from './intent/classify.js';
export { normalizeRequest } from './intent/normalize.js';

// SQL renderer
export { renderSql, LIST_TABLES_SQL } from './render/render.js';
export { parseColumnList, normalizeColumnType, DEFAULT_COLUMN_TYPE } from './render/columns.js';
export type { ColumnSpec } from './render/columns.js';

// Sanitizer and statement analysis
export {
  SanitizedSql,
  sanitizeSql,
  sanitize,
  extractSql,
  findForbiddenKeyword,
  FORBIDDEN_KEYWORDS,
  WARNING_MARKER,
  AGGREGATE_SUBQUERY_WARNING,
} from './policy/sanitize.js';
export type { SanitizeOutcome, ForbiddenKeyword, SqlOrigin } from './policy/sanitize.js';
export { parseSql } from './policy/parse.js';
export type { ParseResult, ParseOutcome, SqlKind } from './policy/parse.js';
export { assessStatementRisk } from './policy/statement-risk.js';
export type { StatementRisk } from './policy/statement-risk.js';

// Database types
export type {
  DbType,
  DbConnection,
  PostgresConnection,
  SqliteConnection,
  PgConnectionConfig,
  Row,
  ExecuteLimits,
  ExecuteResult,
  WriteResult,
  SchemaSnapshot,
  TableInfo,
  ColumnInfo,
  ForeignKeyInfo,
  SqlExecutor,
  QueryRunner,
} from './db/types.js';

// Safe session defaults
export { SAFE_DEFAULTS } from './db/defaults.js';

// Execution layer
export {
  executeQuery,
  executeWriteQuery,
  testDbConnection,
  introspectSchemaForConnection,
  createSqlExecutor,
  withQueryRunner,
} from './db/execute.js';

// Schema context
export { buildSchemaContext } from './schema/context.js';
export { SchemaCache, MemorySnapshotStore, DEFAULT_SCHEMA_TTL_SECONDS } from './schema/cache.js';
export type { SchemaContextSource, SnapshotStore, StoredSnapshot } from './schema/cache.js';

// Pipeline
export { runPipeline, NO_EXEC_PREVIEW, NO_SQL_PREVIEW, UNSUPPORTED_PATTERN_ERROR } from './pipeline/run.js';
export type { PipelineDeps } from './pipeline/run.js';
export { createPipelineState } from './pipeline/state.js';
export type { PipelineState, PipelineFlags, PipelineInput, ExecutionStatus } from './pipeline/state.js';
export { formatTable, formatRows, formatValue, NO_RESULTS } from './pipeline/format.js';

// Star schema diagnostics
export { StarDiagnostics } from './star/diagnostics.js';
export type {
  DiagnosticResult,
  OverviewEntry,
  OrphanCheck,
  OrphanReport,
  FactHealth,
  NullDensity,
  ValueShare,
} from './star/diagnostics.js';
export { classifyTable } from './star/classify-table.js';
export type { TableClass } from './star/classify-table.js';

// Admin confirmation and execution
export {
  requestConfirmation,
  requestBatchConfirmation,
  verifyConfirmation,
  SCHEMA_CHANGE_PHRASE,
  DATA_LOSS_PHRASE,
} from './power/confirm.js';
export type { ConfirmationRequest } from './power/confirm.js';
export { executeAdminAction, hashSql } from './power/execute.js';
export type { AuditLog, AdminExecutionResult, AdminWriter } from './power/execute.js';

// LLM module
export type { SqlGenerator, GenerateSqlInput } from './llm/types.js';
export { OpenAISqlGenerator, DEFAULT_MODEL } from './llm/openai.js';
export type { OpenAIGeneratorOptions, ChatCompletionsClient } from './llm/openai.js';
export { buildMessages } from './llm/prompt.js';

// Configuration
export { loadConfig, defaultConfig, ConfigError, CONFIG_FILE_NAME } from './config/config.js';
export type { AskdbConfig, DbConfig, LoadConfigOptions } from './config/config.js';

// Local storage
export { LocalStore, defaultDbPath } from './storage/sqlite.js';
export type { AuditEvent } from './storage/sqlite.js';

// Query history repository
export { recordPipelineRun, listHistory, getHistoryItem, resolveQueryId } from './storage/repo.js';
export type { QueryKind, HistoryItem, HistoryListItem, HistoryDetail } from './storage/repo.js';

// Ask orchestration
export { AskSession, schemaCacheKey } from './ask.js';
export type { AskInput, AskResult, SessionOptions } from './ask.js';
