#!/usr/bin/env -S node --import tsx

/**
 * askdb CLI entrypoint.
 */

import { Command } from 'commander';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { createInterface } from 'node:readline';
import {
  AskSession,
  CONFIG_FILE_NAME,
  StarDiagnostics,
  assessStatementRisk,
  buildSchemaContext,
  classifyRequests,
  executeQuery,
  getHistoryItem,
  listHistory,
  resolveQueryId,
  sanitizeSql,
  schemaCacheKey,
  testDbConnection,
  withQueryRunner,
  type AskResult,
  type AskdbConfig,
  type DiagnosticResult,
  type RuleScope,
} from '@askdb/core';
import { normalizeArgv } from './argv.js';
import { batchOutcome, runAdminBatch, type AdminLineResult } from './commands/admin.js';
import { createGenerator, openStore, requirePostgres, resolveConfig, resolveConnection } from './context.js';
import { EXIT_CODE_SUCCESS, policyError, runtimeError, toExitCode, usageError } from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  printWarning,
  withOutputFlags,
  type OutputOptions,
} from './output.js';

const VERSION = '0.1.0';

interface PipelineOpts {
  exec: boolean;
  explainOnly: boolean;
  refreshSchema: boolean;
  session?: string;
}

interface AdminOpts {
  dryRun: boolean;
  confirmPhrase?: string;
  scope?: string;
}

interface HistoryListOpts {
  limit: string;
  session?: string;
}

// ── Helpers ──────────────────────────────────────────────────────────

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    process.stdin.setEncoding('utf-8');
    process.stdin.on('data', (chunk) => (data += chunk));
    process.stdin.on('end', () => resolve(data.trim()));
    process.stdin.on('error', reject);
  });
}

async function textArgOrStdin(parts: string[], what: string): Promise<string> {
  const joined = parts.join(' ').trim();
  if (joined) return joined;
  if (process.stdin.isTTY) {
    throw usageError(`Expected ${what} as an argument or on stdin.`);
  }
  const fromStdin = await readStdin();
  if (!fromStdin) {
    throw usageError(`Expected ${what} on stdin, but received empty input.`);
  }
  return fromStdin;
}

function configFor(command: Command): AskdbConfig {
  const opts = command.optsWithGlobals();
  return resolveConfig({ config: typeof opts.config === 'string' ? opts.config : undefined });
}

function parseScope(value: string | undefined, fallback: RuleScope): RuleScope {
  if (value === undefined) return fallback;
  if (value === 'admin' || value === 'star' || value === 'both') return value;
  throw usageError(`Invalid scope "${value}". Expected admin, star or both.`);
}

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void> | void): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n !== 1 ? 's' : ''}`;
}

function printDiagnostic(result: DiagnosticResult, output: OutputOptions): void {
  switch (result.intent) {
    case 'star_overview':
      printHumanTable(
        ['table', 'class', 'row_count', 'fk_count'],
        result.rows.map((r) => ({ table: r.table, class: r.class, row_count: r.rowCount, fk_count: r.fkCount })),
        output,
      );
      return;
    case 'fact_health':
      printHuman(`${result.health.factTable}: ${plural(result.health.rowCount, 'row')}, ${plural(result.health.totalOrphans, 'orphan')}`, output);
      printHumanTable(
        ['fk', 'column', 'references', 'orphans'],
        result.health.orphans.map((o) => ({ fk: o.fk, column: o.fkColumn, references: `${o.refTable}.${o.refColumn}`, orphans: o.orphans })),
        output,
      );
      return;
    case 'orphan_check':
      printHumanTable(
        ['fk', 'column', 'references', 'orphans'],
        result.report.checks.map((o) => ({ fk: o.fk, column: o.fkColumn, references: `${o.refTable}.${o.refColumn}`, orphans: o.orphans })),
        output,
      );
      return;
    case 'null_density':
      printHumanTable(
        ['column', 'nulls', 'total', 'null_pct'],
        result.rows.map((r) => ({ column: r.column, nulls: r.nulls, total: r.total, null_pct: r.nullPct })),
        output,
      );
      return;
    case 'top_distribution':
      printHumanTable(
        ['value', 'count', 'pct'],
        result.rows.map((r) => ({ value: r.value, count: r.count, pct: r.pct })),
        output,
      );
      return;
  }
}

function printAdminLine(result: AdminLineResult, output: OutputOptions): void {
  printHuman(`> ${result.line}`, output);
  switch (result.status) {
    case 'unknown':
      printWarning(result.message, output);
      break;
    case 'clarification':
      printHuman(`  ? ${result.question}`, output);
      break;
    case 'rejected':
      printWarning(`Rejected: ${result.message}`, output);
      break;
    case 'query':
      printHumanTable(result.result.columns, result.result.rows, output);
      printHuman(
        `${plural(result.result.rowCount, 'row')}` +
          (result.result.truncated ? ` (truncated to ${result.result.rows.length})` : '') +
          ` in ${result.result.execMs}ms`,
        output,
      );
      break;
    case 'diagnostic':
      printDiagnostic(result.result, output);
      break;
    case 'planned':
      printHuman(`-- ${result.note} [${result.risk} risk]`, output);
      printHuman(result.sql, output);
      break;
    case 'executed':
      printHuman(result.sql, output);
      printHuman(`Executed in ${result.execMs}ms.`, output);
      break;
    case 'skipped':
      printHuman(result.sql, output);
      printWarning(`Skipped: ${result.message}`, output);
      break;
    case 'failed':
      printWarning(`Failed: ${result.message}`, output);
      break;
  }
  printHuman('', output);
}

function printAskResult(result: AskResult, output: OutputOptions): void {
  const { state } = result;
  if (state.sanitized) {
    printHuman('SQL:', output);
    printHuman(state.sanitized.text, output);
    printHuman('', output);
  }
  printHuman(state.preview, output);
  if (state.execution === 'ok') {
    printHuman(`\n${plural(state.rows.length, 'row')} in ${state.execMs ?? 0}ms`, output);
  }
  for (const error of state.errors) {
    printWarning(error, output);
  }
  printHuman(`Query ID: ${result.queryId}`, output);
}

/** Unsafe SQL is a policy failure; a failed execution is a runtime failure. */
function assertAskSucceeded(result: AskResult): void {
  const { state } = result;
  const details = { queryId: result.queryId, errors: state.errors };
  if (state.rejection?.reason === 'unsafe') {
    throw policyError(state.errors[0] ?? 'SQL rejected.', details);
  }
  if (state.execution === 'failed') {
    throw runtimeError(state.errors[state.errors.length - 1] ?? 'SQL execution failed.', 'DB_QUERY_FAILED', details);
  }
}

function promptUser(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('askdb')
  .description('askdb — natural-language admin console and SQL assistant')
  .option('--config <path>', `Config file (defaults to ./${CONFIG_FILE_NAME} or ASKDB_CONFIG)`)
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Setup:    doctor, schema
  Admin:    classify, admin
  Query:    sanitize, run, ask
  History:  history
`,
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check environment, configuration and connectivity')
      .option('--check-db', 'Also open a connection to the configured database', false)
      .action(async function (this: Command, opts: { checkDb: boolean }) {
        await runCommand(this, async (output) => {
          const nodeVersion = process.version;
          const nodeOk = parseInt(nodeVersion.slice(1), 10) >= 20;
          const config = configFor(this);

          let database: { ok: boolean; error?: string; serverVersion?: string } | null = null;
          if (opts.checkDb) {
            database = await testDbConnection(await resolveConnection(config));
          }

          const payload = {
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            openAiKeySet: Boolean(process.env.OPENAI_API_KEY),
            model: config.model,
            db: { type: config.db.type, host: config.db.host, port: config.db.port, database: config.db.database },
            paths: {
              configFile: join(process.cwd(), CONFIG_FILE_NAME),
              configFileExists: existsSync(join(process.cwd(), CONFIG_FILE_NAME)),
              storePath: config.storePath,
              storeExists: existsSync(config.storePath),
            },
            database,
          };

          if (output.json) {
            printCommandSuccess(payload, output);
          } else {
            printHuman(`Node.js:      ${nodeVersion} ${nodeOk ? 'ok' : '(>= 20 required)'}`, output);
            printHuman(`OpenAI key:   ${payload.openAiKeySet ? 'set' : 'not set'}`, output);
            printHuman(`Model:        ${config.model}`, output);
            printHuman(`Database:     ${config.db.type} ${config.db.database}`, output);
            printHuman(`Store:        ${config.storePath}${payload.paths.storeExists ? '' : ' (not created yet)'}`, output);
            if (database) {
              printHuman(
                `Connection:   ${database.ok ? `ok (${database.serverVersion ?? 'unknown version'})` : `failed: ${database.error ?? 'unknown error'}`}`,
                output,
              );
            }
          }
          if (!nodeOk || (database && !database.ok)) {
            process.exitCode = 2;
          }
        });
      }),
  ),
  ['askdb doctor', 'askdb doctor --check-db --json'],
);

// ── classify ─────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('classify')
      .description('Classify admin requests without touching the database')
      .argument('[text...]', 'Requests, one per line or separated by ";" (reads stdin when omitted)')
      .option('--scope <scope>', 'Rule set: admin, star or both')
      .action(async function (this: Command, text: string[], opts: { scope?: string }) {
        await runCommand(this, async (output) => {
          const config = configFor(this);
          const input = await textArgOrStdin(text, 'requests');
          const actions = classifyRequests(input, { scope: parseScope(opts.scope, config.scope) });

          if (output.json) {
            printCommandSuccess(actions, output);
            return;
          }
          for (const action of actions) {
            if (action.kind === 'unknown') {
              printHuman(`${action.raw}\n  unknown`, output);
            } else if (action.kind === 'clarification') {
              printHuman(`${action.raw}\n  ${action.intent}: needs clarification\n  ? ${action.question}`, output);
            } else {
              printHuman(`${action.raw}\n  ${action.intent} [${action.risk} risk] ${action.note}`, output);
            }
          }
        });
      }),
  ),
  ['askdb classify "create table users with columns id int, email varchar(200)"', 'askdb classify "list tables; describe table orders" --json'],
);

// ── admin ────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('admin')
      .description('Run admin requests: inspect, change the schema, or diagnose a star schema')
      .argument('[text...]', 'Requests, one per line or separated by ";" (reads stdin when omitted)')
      .option('--dry-run', 'Render schema changes without executing them', false)
      .option('--confirm-phrase <phrase>', 'Confirmation phrase for non-interactive use')
      .option('--scope <scope>', 'Rule set: admin, star or both')
      .action(async function (this: Command, text: string[], opts: AdminOpts) {
        await runCommand(this, async (output) => {
          const config = configFor(this);
          const input = await textArgOrStdin(text, 'requests');
          const conn = await resolveConnection(config);
          requirePostgres(conn, 'The admin console');
          const limits = { maxRows: config.maxRows, statementTimeoutMs: config.statementTimeoutMs };

          const store = openStore(config);
          try {
            const report = await runAdminBatch(input, {
              conn,
              scope: parseScope(opts.scope, config.scope),
              audit: store,
              dryRun: opts.dryRun,
              confirm: async (request) => {
                if (opts.confirmPhrase !== undefined) return opts.confirmPhrase;
                if (!process.stdin.isTTY || output.json) return null;
                printHuman(`\n${request.message}\n`, output);
                return promptUser('> ');
              },
              readQuery: (sql) => executeQuery(conn, sql, limits),
              diagnose: (action) => withQueryRunner(conn, (runner) => new StarDiagnostics(runner).runDiagnostic(action), limits),
            });

            const outcome = batchOutcome(report);
            if (output.json) {
              printCommandSuccess(report, output);
            } else {
              for (const result of report.results) {
                printAdminLine(result, output);
              }
            }
            if (outcome === 'refused') {
              process.exitCode = 3;
            } else if (outcome === 'failed') {
              process.exitCode = 2;
            }
          } finally {
            store.close();
          }
        });
      }),
  ),
  [
    'askdb admin "list tables"',
    'askdb admin "add column email varchar(200) to users" --dry-run',
    'askdb admin "drop table tmp_import" --confirm-phrase "I ACCEPT THE RISK OF DATA LOSS"',
    'askdb admin "diagnose fact fact_sales; null density for dim_customer"',
  ],
);

// ── sanitize ─────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('sanitize')
      .description('Extract and screen SQL from free text (reads stdin when no argument is given)')
      .argument('[text...]', 'Text containing SQL')
      .action(async function (this: Command, text: string[]) {
        await runCommand(this, async (output) => {
          const input = await textArgOrStdin(text, 'SQL text');
          const outcome = sanitizeSql(input);
          if (!outcome.ok) {
            if (outcome.reason === 'unsafe') {
              throw policyError(`SQL rejected: forbidden keyword ${outcome.keyword}`, { extracted: outcome.extracted });
            }
            throw usageError('No SQL statement found in input.');
          }
          const risk = assessStatementRisk(outcome.sql.text);
          const payload = { sql: outcome.sql.text, warnings: outcome.warnings, risk: risk.risk, summary: risk.summary };
          if (output.json) {
            printCommandSuccess(payload, output);
            return;
          }
          printHuman(outcome.sql.text, output);
          if (output.verbose) {
            printHuman(`-- ${risk.summary} [${risk.risk} risk]`, output);
          }
          for (const warning of outcome.warnings) {
            printWarning(warning, output);
          }
        });
      }),
  ),
  ['askdb sanitize "```sql SELECT 1 ```"', 'cat answer.txt | askdb sanitize --json'],
);

// ── run / ask ────────────────────────────────────────────────────────

async function runPipelineCommand(
  command: Command,
  output: OutputOptions,
  input: { question?: string; sql?: string },
  opts: PipelineOpts,
): Promise<void> {
  const config = configFor(command);
  const generator = input.sql ? undefined : createGenerator(config);
  const conn = await resolveConnection(config);
  const store = openStore(config);
  try {
    const session = new AskSession({ conn, config, store, generator });
    if (output.verbose && input.question) {
      printHuman(`Question: "${input.question}"`, output);
    }
    const result = await session.ask({
      ...input,
      sessionId: opts.session,
      flags: { noExec: !opts.exec, explainOnly: opts.explainOnly, refreshSchema: opts.refreshSchema },
    });
    assertAskSucceeded(result);

    if (output.json) {
      const { state } = result;
      printCommandSuccess(
        {
          queryId: result.queryId,
          sql: state.sanitized?.text ?? null,
          execution: state.execution,
          rows: state.rows,
          execMs: state.execMs,
          errors: state.errors,
          preview: state.preview,
        },
        output,
      );
      return;
    }
    printAskResult(result, output);
  } finally {
    store.close();
  }
}

withExamples(
  withOutputFlags(
    program
      .command('run')
      .description('Sanitize and execute a SQL statement read-only')
      .requiredOption('--sql <sql>', 'SQL statement to execute')
      .option('--no-exec', 'Sanitize only, do not execute')
      .option('--explain-only', 'Show the sanitized SQL without executing', false)
      .option('--refresh-schema', 'Rebuild the schema cache first', false)
      .option('--session <id>', 'Session id recorded with the history entry')
      .action(async function (this: Command, opts: PipelineOpts & { sql: string }) {
        await runCommand(this, async (output) => {
          await runPipelineCommand(this, output, { sql: opts.sql }, opts);
        });
      }),
  ),
  ['askdb run --sql "SELECT id, email FROM public.users LIMIT 10"', 'askdb run --sql "SELECT 1" --json'],
);

withExamples(
  withOutputFlags(
    program
      .command('ask')
      .description('Ask a question: generate SQL, sanitize it, and run it read-only')
      .argument('<question>', 'Natural language question')
      .option('--no-exec', 'Generate and sanitize only, do not execute')
      .option('--explain-only', 'Stop before execution', false)
      .option('--refresh-schema', 'Rebuild the schema cache first', false)
      .option('--session <id>', 'Session id recorded with the history entry')
      .action(async function (this: Command, question: string, opts: PipelineOpts) {
        await runCommand(this, async (output) => {
          await runPipelineCommand(this, output, { question }, opts);
        });
      }),
  ),
  ['askdb ask "top 10 customers by revenue"', 'askdb ask "orders per month in 2024" --no-exec', 'askdb ask "active users" --json'],
);

// ── schema ───────────────────────────────────────────────────────────

const schema = program.command('schema').description('Schema cache commands');

withExamples(
  withOutputFlags(
    schema
      .command('refresh')
      .description('Introspect the database and replace the cached schema')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const config = configFor(this);
          const conn = await resolveConnection(config);
          const store = openStore(config);
          try {
            const session = new AskSession({ conn, config, store });
            try {
              await session.schema.refreshSchemaCache();
            } catch (err: unknown) {
              throw runtimeError(
                `Schema refresh failed: ${err instanceof Error ? err.message : String(err)}`,
                'SCHEMA_UNAVAILABLE',
              );
            }
            const entry = session.schema.peek();
            const tables = entry?.snapshot.tables.length ?? 0;
            const views = entry?.snapshot.views.length ?? 0;
            const columns = entry?.snapshot.tables.reduce((sum, t) => sum + t.columns.length, 0) ?? 0;
            store.logAudit('schema_refreshed', { key: schemaCacheKey(conn), tables, views, columns });

            printCommandSuccess(
              { tables, views, columns, capturedAt: entry?.snapshot.capturedAt ?? null },
              output,
              `Schema refreshed (${plural(tables, 'table')}, ${plural(views, 'view')}, ${plural(columns, 'column')}).`,
            );
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['askdb schema refresh', 'ASKDB_PASSWORD=... askdb schema refresh --json'],
);

withExamples(
  withOutputFlags(
    schema
      .command('show')
      .description('Print the cached schema context')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const config = configFor(this);
          // The cache key never includes the password
          const conn = await resolveConnection(config, async () => '');
          const store = openStore(config);
          try {
            const entry = store.loadSnapshot(schemaCacheKey(conn));
            if (!entry) {
              printCommandSuccess(
                { hasSnapshot: false },
                output,
                'No cached schema. Run "askdb schema refresh".',
              );
              return;
            }
            const ageSeconds = Math.round((Date.now() - entry.storedAtMs) / 1000);
            const stale = ageSeconds > config.schemaTtlSeconds;
            const context = buildSchemaContext(entry.snapshot);
            if (output.json) {
              printCommandSuccess({ hasSnapshot: true, ageSeconds, stale, context }, output);
              return;
            }
            printHuman(context, output);
            if (stale) {
              printWarning(`Cached schema is ${ageSeconds}s old and will be reloaded on the next query.`, output);
            }
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['askdb schema show', 'askdb schema show --json'],
);

// ── history ──────────────────────────────────────────────────────────

const history = program.command('history').description('Query history');

withExamples(
  withOutputFlags(
    history
      .command('list')
      .description('List recent queries')
      .option('--limit <n>', 'Number of items', '20')
      .option('--session <id>', 'Only entries recorded with this session id')
      .action(async function (this: Command, opts: HistoryListOpts) {
        await runCommand(this, async (output) => {
          const store = openStore(configFor(this));
          try {
            const limit = parseInt(opts.limit, 10) || 20;
            const items = listHistory(store.getDb(), { limit, sessionId: opts.session });

            if (output.json) {
              printCommandSuccess(items, output);
              return;
            }
            if (items.length === 0) {
              printHuman('No queries in history. Use "askdb ask" or "askdb run" first.', output);
              return;
            }
            printHumanTable(
              ['id', 'kind', 'question', 'asked_at', 'status', 'exec_ms', 'row_count'],
              items.map((item) => ({
                id: item.id.slice(0, 8),
                kind: item.kind,
                question: item.question.length > 50 ? item.question.slice(0, 47) + '...' : item.question,
                asked_at: item.askedAt,
                status: item.status ?? '-',
                exec_ms: item.execMs ?? '-',
                row_count: item.rowCount ?? '-',
              })),
              output,
            );
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['askdb history list --limit 20', 'askdb history list --session demo --json'],
);

withExamples(
  withOutputFlags(
    history
      .command('show <id>')
      .description('Show details for a query (full id or unique prefix)')
      .action(async function (this: Command, id: string) {
        await runCommand(this, async (output) => {
          const store = openStore(configFor(this));
          try {
            const db = store.getDb();
            const fullId = resolveQueryId(db, id);
            const detail = fullId ? getHistoryItem(db, fullId) : null;
            if (!detail) throw usageError(`Query "${id}" not found.`, 'NOT_FOUND');

            if (output.json) {
              printCommandSuccess(detail, output);
              return;
            }
            printHuman(`Query ID:  ${detail.query.id}`, output);
            printHuman(`Kind:      ${detail.query.kind}`, output);
            printHuman(`Question:  ${detail.query.question}`, output);
            printHuman(`Asked at:  ${detail.query.askedAt}`, output);
            if (detail.query.sessionId) {
              printHuman(`Session:   ${detail.query.sessionId}`, output);
            }
            if (detail.run) {
              printHuman('\nExecution:', output);
              printHuman(`  Status:      ${detail.run.status}`, output);
              printHuman(`  SQL:         ${detail.run.sanitizedSql ?? '-'}`, output);
              printHuman(`  Exec time:   ${detail.run.execMs ?? '-'}ms`, output);
              printHuman(`  Row count:   ${detail.run.rowCount ?? '-'}`, output);
              for (const error of detail.run.errors) {
                printHuman(`  Error:       ${error}`, output);
              }
            }
            printHuman('\nNote: Result rows are not stored in history.', output);
          } finally {
            store.close();
          }
        });
      }),
  ),
  ['askdb history show <query-id>', 'askdb history show <query-id-prefix> --json'],
);

// ── parse ────────────────────────────────────────────────────────────

function commanderCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

async function main(): Promise<void> {
  const normalizedArgv = normalizeArgv(process.argv);
  try {
    await program.parseAsync(normalizedArgv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    const code = commanderCode(error);
    // Commander signals help and version output as errors under exitOverride
    if (code === 'commander.helpDisplayed' || code === 'commander.version') {
      process.exitCode = EXIT_CODE_SUCCESS;
      return;
    }
    if (code?.startsWith('commander.')) {
      printError(usageError(error instanceof Error ? error.message : String(error)), output);
      process.exitCode = 1;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
