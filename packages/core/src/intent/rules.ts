/**
 * Static, ordered rule tables for request classification.
 *
 * Rules are tried top to bottom and the first match wins, so a rule that is a
 * prefix of another must come after it. Patterns run against normalized text
 * (see normalize.ts) and are anchored at both ends.
 */

import type { AdminIntent, IntentTag, StarIntent } from '../actions/types.js';

/** Where a capture group lands on the action. */
export type Slot = 'table' | 'column' | `options.${string}`;

export interface OptionBody {
  option: string;
  /** Asked when the option body is empty; `{table}` is filled in */
  question: string;
  /** Reduce the captured text to a clean comma separated identifier list */
  list?: boolean;
}

export interface IntentRule<I extends IntentTag = IntentTag> {
  intent: I;
  pattern: RegExp;
  /** One slot per capture group, in group order */
  slots: readonly Slot[];
  body?: OptionBody;
  /** Human readable note; `{table}`, `{column}` and `{options.x}` are filled in */
  note: string;
}

const TABLE = '([a-z0-9_.]+)';

export const ADMIN_RULES: readonly IntentRule<AdminIntent>[] = [
  {
    intent: 'list_tables',
    pattern: /^(?:list|show)(?: all)? tables$/,
    slots: [],
    note: 'List all base tables with column counts',
  },
  {
    intent: 'list_tables',
    pattern: /^show schema(?: of (?:the )?(?:db|database))?$/,
    slots: [],
    note: 'List all base tables with column counts',
  },
  {
    intent: 'describe_table',
    pattern: new RegExp(`^describe table ${TABLE}$`),
    slots: ['table'],
    note: 'Describe columns of {table}',
  },
  {
    intent: 'row_count',
    pattern: new RegExp(`^(?:row count (?:for|of)|count rows in) ${TABLE}$`),
    slots: ['table'],
    note: 'Count rows in {table}',
  },
  {
    intent: 'drop_table',
    pattern: new RegExp(`^drop table ${TABLE}$`),
    slots: ['table'],
    note: 'Drop table {table} if it exists',
  },
  {
    intent: 'create_table',
    pattern: new RegExp(`^create table ${TABLE}(?: with columns?\\s*(.*))?$`),
    slots: ['table', 'options.columns'],
    body: {
      option: 'columns',
      question: 'Which columns should {table} have? Try "create table {table} with columns id int, name varchar(100)".',
    },
    note: 'Create table {table} if it does not exist',
  },
  {
    intent: 'add_column',
    pattern: new RegExp(`^add column ([a-z0-9_]+)(?: ([a-z0-9_]+(?:\\(\\d+(?:,\\s*\\d+)?\\))?))? to ${TABLE}$`),
    slots: ['column', 'options.type', 'table'],
    note: 'Add column {column} to {table}',
  },
  {
    intent: 'drop_column',
    pattern: new RegExp(`^drop column ([a-z0-9_]+) from ${TABLE}$`),
    slots: ['column', 'table'],
    note: 'Drop column {column} from {table}',
  },
  {
    intent: 'create_index',
    pattern: new RegExp(`^create index on ${TABLE}\\s*\\(([^)]*)\\)$`),
    slots: ['table', 'options.columns'],
    body: {
      option: 'columns',
      question: 'Which columns should the index on {table} cover? Try "create index on {table}(id)".',
      list: true,
    },
    note: 'Create index on {table}({options.columns})',
  },
];

export const STAR_RULES: readonly IntentRule<StarIntent>[] = [
  {
    intent: 'star_overview',
    pattern: /^list star(?: schema)? overview$/,
    slots: [],
    note: 'List star schema classification',
  },
  {
    intent: 'fact_health',
    pattern: new RegExp(`^diagnose fact ${TABLE}$`),
    slots: ['table'],
    note: 'Fact health diagnostics for {table}',
  },
  {
    intent: 'orphan_check',
    pattern: new RegExp(`^orphan check (?:for )?${TABLE}$`),
    slots: ['table'],
    note: 'FK orphan check for {table}',
  },
  {
    intent: 'null_density',
    pattern: new RegExp(`^null density (?:for |of )?${TABLE}$`),
    slots: ['table'],
    note: 'Null density for {table}',
  },
  {
    intent: 'top_distribution',
    pattern: /^top distribution (?:for |of )?([a-z0-9_.]+)\.([a-z0-9_]+)$/,
    slots: ['table', 'column'],
    note: 'Top value distribution for {table}.{column}',
  },
];
