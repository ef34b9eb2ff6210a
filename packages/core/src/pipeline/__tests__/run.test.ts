import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  NO_EXEC_PREVIEW,
  NO_SQL_PREVIEW,
  UNSUPPORTED_PATTERN_ERROR,
  runPipeline,
  type PipelineDeps,
} from '../run.js';
import { createPipelineState, type PipelineInput } from '../state.js';
import { NO_RESULTS } from '../format.js';
import { SchemaCache, type SchemaContextSource } from '../../schema/cache.js';
import { buildSchemaContext } from '../../schema/context.js';
import { demoSnapshot } from '../../schema/__tests__/fixtures.js';
import type { Row, SqlExecutor } from '../../db/types.js';
import type { GenerateSqlInput, SqlGenerator } from '../../llm/types.js';
import type { SanitizedSql } from '../../policy/sanitize.js';

class FakeSchema implements SchemaContextSource {
  readonly ttls: number[] = [];
  refreshes = 0;

  constructor(
    private readonly context: string,
    private readonly failures: { get?: string; refresh?: string } = {},
  ) {}

  async getSchemaContext(ttlSeconds = 60): Promise<string> {
    this.ttls.push(ttlSeconds);
    if (this.failures.get) throw new Error(this.failures.get);
    return this.context;
  }

  async refreshSchemaCache(): Promise<string> {
    this.refreshes++;
    if (this.failures.refresh) throw new Error(this.failures.refresh);
    return this.context;
  }
}

class FakeExecutor implements SqlExecutor {
  readonly executed: string[] = [];

  constructor(private readonly result: Row[] | Error) {}

  async executeSqlQuery(sql: SanitizedSql): Promise<Row[]> {
    this.executed.push(sql.text);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

class FakeGenerator implements SqlGenerator {
  readonly model = 'fake-model';
  readonly inputs: GenerateSqlInput[] = [];

  constructor(private readonly reply: string | Error) {}

  async generateSql(input: GenerateSqlInput): Promise<string> {
    this.inputs.push(input);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

function run(input: PipelineInput, deps: PipelineDeps) {
  return runPipeline(createPipelineState(input), deps);
}

describe('runPipeline', () => {
  it('sanitizes, executes and formats supplied SQL', async () => {
    const executor = new FakeExecutor([{ n: 1 }]);
    const state = await run({ sqlRaw: '```sql\nSELECT 1 AS n\n```' }, { schema: new FakeSchema('ctx'), executor });

    assert.equal(state.sanitized?.text, 'SELECT 1 AS n');
    assert.deepEqual(executor.executed, ['SELECT 1 AS n']);
    assert.equal(state.execution, 'ok');
    assert.deepEqual(state.rows, [{ n: 1 }]);
    assert.equal(state.preview, 'n\n-\n1');
    assert.deepEqual(state.errors, []);
    assert.equal(state.schemaContext, 'ctx');
  });

  it('passes the configured TTL to the schema source', async () => {
    const schema = new FakeSchema('ctx');
    await run({ sqlRaw: 'SELECT 1' }, { schema, executor: new FakeExecutor([]), schemaTtlSeconds: 300 });
    assert.deepEqual(schema.ttls, [300]);
  });

  it('records an error for the aggregate-over-subquery pattern', async () => {
    const state = await run(
      { sqlRaw: 'SELECT SUM((SELECT val FROM t))' },
      { schema: new FakeSchema('ctx'), executor: new FakeExecutor([{ sum: 3 }]) },
    );
    assert.equal(state.sanitized?.hasWarningMarker(), true);
    assert.deepEqual(state.errors, [UNSUPPORTED_PATTERN_ERROR]);
    assert.equal(state.execution, 'ok');
  });

  it('never executes rejected SQL', async () => {
    const executor = new FakeExecutor([{ n: 1 }]);
    const state = await run({ sqlRaw: 'SELECT 1; DROP TABLE x' }, { schema: new FakeSchema('ctx'), executor });

    assert.equal(state.sanitized, null);
    assert.deepEqual(state.rejection, { reason: 'unsafe', keyword: 'DROP', extracted: 'SELECT 1; DROP TABLE x' });
    assert.deepEqual(state.errors, ['SQL rejected: forbidden keyword DROP']);
    assert.deepEqual(executor.executed, []);
    assert.equal(state.execution, 'skipped');
    assert.equal(state.preview, NO_SQL_PREVIEW);
  });

  it('skips execution under noExec', async () => {
    const executor = new FakeExecutor([{ n: 1 }]);
    const state = await run({ sqlRaw: 'SELECT 1', flags: { noExec: true } }, { schema: new FakeSchema('ctx'), executor });
    assert.deepEqual(executor.executed, []);
    assert.equal(state.sanitized?.text, 'SELECT 1');
    assert.equal(state.preview, NO_EXEC_PREVIEW);
  });

  it('measures execution time with the injected clock', async () => {
    const ticks = [100, 130];
    const state = await run(
      { sqlRaw: 'SELECT 1' },
      { schema: new FakeSchema('ctx'), executor: new FakeExecutor([]), now: () => ticks.shift() ?? 0 },
    );
    assert.equal(state.execMs, 30);
    assert.equal(state.preview, NO_RESULTS);
  });

  it('generates SQL from the question and schema context', async () => {
    const generator = new FakeGenerator('Sure:\n```sql\nSELECT 2 AS two\n```');
    const state = await run(
      { question: 'what is two?' },
      { schema: new FakeSchema('DATABASE: demo'), executor: new FakeExecutor([{ two: 2 }]), generator },
    );
    assert.deepEqual(generator.inputs, [{ question: 'what is two?', schemaContext: 'DATABASE: demo' }]);
    assert.equal(state.sqlRaw, 'Sure:\n```sql\nSELECT 2 AS two\n```');
    assert.equal(state.sanitized?.text, 'SELECT 2 AS two');
    assert.equal(state.preview, 'two\n---\n2  ');
  });

  it('does not call the generator when SQL is supplied', async () => {
    const generator = new FakeGenerator('SELECT 99');
    const state = await run(
      { question: 'ignored', sqlRaw: 'SELECT 1' },
      { schema: new FakeSchema('ctx'), executor: new FakeExecutor([]), generator },
    );
    assert.deepEqual(generator.inputs, []);
    assert.equal(state.sanitized?.text, 'SELECT 1');
  });

  it('records generator failures and stops before execution', async () => {
    const executor = new FakeExecutor([]);
    const state = await run(
      { question: 'anything' },
      { schema: new FakeSchema('ctx'), executor, generator: new FakeGenerator(new Error('quota exceeded')) },
    );
    assert.deepEqual(state.errors, ['SQL generation failed: quota exceeded']);
    assert.deepEqual(state.rejection, { reason: 'empty' });
    assert.deepEqual(executor.executed, []);
    assert.equal(state.preview, NO_SQL_PREVIEW);
  });

  it('introspects once when a refresh is requested', async () => {
    let loads = 0;
    const cache = new SchemaCache({
      key: 'postgres://analyst@localhost:5432/demo',
      loader: async () => {
        loads++;
        return demoSnapshot();
      },
    });
    const state = await run(
      { sqlRaw: 'SELECT 1', flags: { refreshSchema: true, noExec: true } },
      { schema: cache, executor: new FakeExecutor([]) },
    );
    assert.equal(loads, 1);
    assert.equal(state.schemaContext, buildSchemaContext(demoSnapshot()));
    assert.deepEqual(state.errors, []);
  });

  it('uses the refreshed context without reading the cache again', async () => {
    const schema = new FakeSchema('fresh');
    const state = await run(
      { sqlRaw: 'SELECT 1', flags: { refreshSchema: true } },
      { schema, executor: new FakeExecutor([]) },
    );
    assert.equal(schema.refreshes, 1);
    assert.deepEqual(schema.ttls, []);
    assert.equal(state.schemaContext, 'fresh');
  });

  it('reloads with a zero TTL after a failed refresh', async () => {
    const schema = new FakeSchema('ctx', { refresh: 'introspection timed out' });
    const state = await run(
      { sqlRaw: 'SELECT 1', flags: { refreshSchema: true } },
      { schema, executor: new FakeExecutor([]) },
    );
    assert.equal(schema.refreshes, 1);
    assert.deepEqual(schema.ttls, [0]);
    assert.deepEqual(state.errors, ['Schema refresh failed: introspection timed out']);
    assert.equal(state.schemaContext, 'ctx');
  });

  it('always resolves with a preview when every collaborator fails', async () => {
    const state = await run(
      { sqlRaw: 'SELECT 1' },
      { schema: new FakeSchema('', { get: 'catalog unavailable' }), executor: new FakeExecutor(new Error('db down')) },
    );
    assert.deepEqual(state.errors, ['Schema context error: catalog unavailable', 'SQL execution failed: db down']);
    assert.equal(state.execution, 'failed');
    assert.deepEqual(state.rows, []);
    assert.equal(state.preview, NO_RESULTS);
  });

  it('resolves with a preview for text the sanitizer empties', async () => {
    const state = await run(
      { sqlRaw: '   ' },
      { schema: new FakeSchema('', { get: 'boom' }), executor: new FakeExecutor(new Error('unused')) },
    );
    assert.equal(state.preview, NO_SQL_PREVIEW);
    assert.deepEqual(state.errors, ['Schema context error: boom']);
  });
});
