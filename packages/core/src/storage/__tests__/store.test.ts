import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { LocalStore } from '../sqlite.js';
import { getHistoryItem, listHistory, recordPipelineRun, resolveQueryId } from '../repo.js';
import { createPipelineState, type PipelineState } from '../../pipeline/state.js';
import { sanitizeSql } from '../../policy/sanitize.js';
import type { SchemaSnapshot } from '../../db/types.js';

const SNAPSHOT: SchemaSnapshot = {
  database: 'demo',
  capturedAt: '2026-01-01T00:00:00.000Z',
  tables: [{ schema: 'public', name: 'dim_date', columns: [] }],
  views: [],
  relationships: [],
};

function succeeded(question: string, sessionId?: string): PipelineState {
  const outcome = sanitizeSql('SELECT 1 AS n');
  if (!outcome.ok) throw new Error('fixture SQL rejected');
  return {
    ...createPipelineState({ question, sessionId }),
    sanitized: outcome.sql,
    execution: 'ok',
    rows: [{ n: 1 }, { n: 1 }],
    execMs: 12,
    preview: 'n\n-\n1\n1',
  };
}

describe('LocalStore', () => {
  let store: LocalStore;

  beforeEach(() => {
    store = new LocalStore(':memory:');
    store.migrate();
  });

  afterEach(() => {
    store.close();
  });

  it('applies migrations once', () => {
    store.migrate();
    const rows = store
      .getDb()
      .prepare<[], { version: number }>('SELECT version FROM migrations ORDER BY version')
      .all();
    assert.deepEqual(
      rows.map((r) => r.version),
      [1, 2, 3, 4, 5],
    );
  });

  it('stores and overwrites settings', () => {
    assert.equal(store.getSetting('last_session'), null);
    store.setSetting('last_session', 'a');
    store.setSetting('last_session', 'b');
    assert.equal(store.getSetting('last_session'), 'b');
  });

  it('lists audit events newest first with optional type filter', () => {
    store.logAudit('schema_refreshed', { tables: 4 });
    store.logAudit('admin_executed');
    store.logAudit('schema_refreshed', { tables: 5 });

    assert.deepEqual(
      store.listAuditEvents().map((e) => e.type),
      ['schema_refreshed', 'admin_executed', 'schema_refreshed'],
    );

    const refreshed = store.listAuditEvents({ type: 'schema_refreshed' });
    assert.deepEqual(
      refreshed.map((e) => e.payload),
      [{ tables: 5 }, { tables: 4 }],
    );
    assert.equal(store.listAuditEvents({ type: 'admin_executed' })[0].payload, null);
    assert.equal(store.listAuditEvents({ limit: 1 }).length, 1);
  });

  it('keeps one snapshot per cache key', () => {
    store.saveSnapshot('sqlite:/tmp/a.db', SNAPSHOT, 1000);
    store.saveSnapshot('sqlite:/tmp/a.db', { ...SNAPSHOT, database: 'renamed' }, 2000);

    assert.deepEqual(store.loadSnapshot('sqlite:/tmp/a.db'), {
      snapshot: { ...SNAPSHOT, database: 'renamed' },
      storedAtMs: 2000,
    });
    assert.equal(store.loadSnapshot('sqlite:/tmp/other.db'), undefined);
  });

  it('treats unreadable snapshot rows as missing', () => {
    const insert = store
      .getDb()
      .prepare('INSERT INTO schema_snapshots (cache_key, stored_at_ms, snapshot_json) VALUES (?, ?, ?)');
    insert.run('wrong-shape', 1, '{"tables": 3}');
    insert.run('not-json', 1, '{tables');

    assert.equal(store.loadSnapshot('wrong-shape'), undefined);
    assert.equal(store.loadSnapshot('not-json'), undefined);
  });
});

describe('file-backed LocalStore', () => {
  it('creates the parent directory', () => {
    const dir = mkdtempSync(join(tmpdir(), 'askdb-store-test-'));
    try {
      const store = new LocalStore(join(dir, 'nested', 'askdb.db'));
      store.migrate();
      store.setSetting('k', 'v');
      store.close();

      const reopened = new LocalStore(join(dir, 'nested', 'askdb.db'));
      assert.equal(reopened.getSetting('k'), 'v');
      reopened.close();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('query history', () => {
  let store: LocalStore;

  beforeEach(() => {
    store = new LocalStore(':memory:');
    store.migrate();
  });

  afterEach(() => {
    store.close();
  });

  it('records a successful run with its row count', () => {
    const state = succeeded('how many loans?', 'session-1');
    const id = recordPipelineRun(store.getDb(), state, 'ask');

    const item = getHistoryItem(store.getDb(), id);
    assert.ok(item);
    assert.ok(item.run);

    const { ranAt, ...run } = item.run;
    assert.deepEqual(item.query, {
      id,
      sessionId: 'session-1',
      question: 'how many loans?',
      kind: 'ask',
      askedAt: state.startedAt,
    });
    assert.deepEqual(run, {
      id: state.runId,
      sanitizedSql: 'SELECT 1 AS n',
      status: 'ok',
      execMs: 12,
      rowCount: 2,
      errors: [],
    });
    assert.match(ranAt, /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });

  it('uses the raw SQL as the question for failed runs', () => {
    const state: PipelineState = {
      ...createPipelineState({ sqlRaw: 'SELECT * FROM missing' }),
      execution: 'failed',
      errors: ['SQL execution failed: no such table'],
    };
    const id = recordPipelineRun(store.getDb(), state, 'run');
    const item = getHistoryItem(store.getDb(), id);

    assert.equal(item?.query.question, 'SELECT * FROM missing');
    assert.equal(item?.query.kind, 'run');
    assert.equal(item?.query.sessionId, null);
    assert.equal(item?.run?.sanitizedSql, null);
    assert.equal(item?.run?.rowCount, null);
    assert.deepEqual(item?.run?.errors, ['SQL execution failed: no such table']);
  });

  it('returns null for unknown ids', () => {
    assert.equal(getHistoryItem(store.getDb(), 'no-such-id'), null);
  });

  it('lists newest first and filters by session', () => {
    recordPipelineRun(store.getDb(), succeeded('first', 'a'), 'ask');
    recordPipelineRun(store.getDb(), succeeded('second', 'b'), 'ask');
    recordPipelineRun(store.getDb(), succeeded('third', 'a'), 'ask');

    assert.deepEqual(
      listHistory(store.getDb()).map((h) => h.question),
      ['third', 'second', 'first'],
    );
    assert.deepEqual(
      listHistory(store.getDb(), { sessionId: 'a' }).map((h) => h.question),
      ['third', 'first'],
    );
    const [latest] = listHistory(store.getDb(), { limit: 1 });
    assert.equal(latest.status, 'ok');
    assert.equal(latest.rowCount, 2);
    assert.equal(latest.execMs, 12);
  });

  it('resolves unique id prefixes only', () => {
    const db = store.getDb();
    const first = recordPipelineRun(db, succeeded('one'), 'ask');
    recordPipelineRun(db, succeeded('two'), 'ask');

    assert.equal(resolveQueryId(db, first), first);
    assert.equal(resolveQueryId(db, ''), null);
    assert.equal(resolveQueryId(db, '%'), null);
    assert.equal(resolveQueryId(db, 'zzzz'), null);
  });
});
