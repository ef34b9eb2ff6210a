/**
 * Action model shared by the classifier, renderer and confirmation gate.
 */

export type IntentTag =
  | 'list_tables'
  | 'describe_table'
  | 'row_count'
  | 'drop_table'
  | 'create_table'
  | 'add_column'
  | 'drop_column'
  | 'create_index'
  | 'star_overview'
  | 'fact_health'
  | 'orphan_check'
  | 'null_density'
  | 'top_distribution';

export const ADMIN_INTENTS = [
  'list_tables',
  'describe_table',
  'row_count',
  'drop_table',
  'create_table',
  'add_column',
  'drop_column',
  'create_index',
] as const satisfies readonly IntentTag[];

export const STAR_INTENTS = [
  'star_overview',
  'fact_health',
  'orphan_check',
  'null_density',
  'top_distribution',
] as const satisfies readonly IntentTag[];

/** Admin intents that change the schema; the rest only read the catalog. */
export const SCHEMA_CHANGE_INTENTS = [
  'drop_table',
  'create_table',
  'add_column',
  'drop_column',
  'create_index',
] as const satisfies readonly AdminIntent[];

export type AdminIntent = (typeof ADMIN_INTENTS)[number];
export type SchemaChangeIntent = (typeof SCHEMA_CHANGE_INTENTS)[number];
export type StarIntent = (typeof STAR_INTENTS)[number];

export type RiskLevel = 'low' | 'medium' | 'high';

const RISK_ORDER: Record<RiskLevel, number> = { low: 0, medium: 1, high: 2 };

export function compareRisk(a: RiskLevel, b: RiskLevel): number {
  return RISK_ORDER[a] - RISK_ORDER[b];
}

export function maxRisk(levels: readonly RiskLevel[]): RiskLevel {
  return levels.reduce<RiskLevel>((acc, level) => (compareRisk(level, acc) > 0 ? level : acc), 'low');
}

export const INTENT_RISK: Record<IntentTag, RiskLevel> = {
  list_tables: 'low',
  describe_table: 'low',
  row_count: 'low',
  drop_table: 'high',
  create_table: 'medium',
  add_column: 'medium',
  drop_column: 'medium',
  create_index: 'medium',
  star_overview: 'low',
  fact_health: 'low',
  orphan_check: 'low',
  null_density: 'low',
  top_distribution: 'low',
};

/** Dotted identifier, `schema.table` or bare `table`. */
export type TableRef = string;
export type ColumnName = string;

export interface ConcreteAction {
  kind: 'action';
  intent: IntentTag;
  table?: TableRef;
  column?: ColumnName;
  options: Record<string, string>;
  risk: RiskLevel;
  note: string;
  /** Normalized request text the action was classified from */
  raw: string;
}

export interface UnknownAction {
  kind: 'unknown';
  raw: string;
}

export interface ClarificationAction {
  kind: 'clarification';
  raw: string;
  intent: IntentTag;
  question: string;
}

export type Action = ConcreteAction | UnknownAction | ClarificationAction;

const ADMIN_SET: ReadonlySet<IntentTag> = new Set(ADMIN_INTENTS);
const STAR_SET: ReadonlySet<IntentTag> = new Set(STAR_INTENTS);
const SCHEMA_CHANGE_SET: ReadonlySet<IntentTag> = new Set(SCHEMA_CHANGE_INTENTS);

export function isAdminIntent(intent: IntentTag): intent is AdminIntent {
  return ADMIN_SET.has(intent);
}

export function isStarIntent(intent: IntentTag): intent is StarIntent {
  return STAR_SET.has(intent);
}

export function isSchemaChangeIntent(intent: IntentTag): intent is SchemaChangeIntent {
  return SCHEMA_CHANGE_SET.has(intent);
}
