import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { LIST_TABLES_SQL, renderSql } from '../render.js';
import { DEFAULT_COLUMN_TYPE, normalizeColumnType, parseColumnList, splitTopLevel } from '../columns.js';
import { INTENT_RISK, type ConcreteAction, type IntentTag } from '../../actions/types.js';

function action(intent: IntentTag, fields: Partial<ConcreteAction> = {}): ConcreteAction {
  return { kind: 'action', intent, options: {}, risk: INTENT_RISK[intent], note: '', raw: '', ...fields };
}

describe('column parsing', () => {
  it('splits only on top-level commas', () => {
    assert.deepEqual(splitTopLevel('id int, amount decimal(18,2)'), ['id int', ' amount decimal(18,2)']);
  });

  it('normalizes recognized types and defaults the rest', () => {
    assert.equal(normalizeColumnType('decimal(18, 2)'), 'DECIMAL(18,2)');
    assert.equal(normalizeColumnType('VarChar(120)'), 'VARCHAR(120)');
    assert.equal(normalizeColumnType('money'), DEFAULT_COLUMN_TYPE);
    assert.equal(normalizeColumnType(undefined), 'VARCHAR(50)');
  });

  it('parses names and types, skipping unusable names', () => {
    assert.deepEqual(parseColumnList('id int, amount decimal(18,2), notes, 9bad text'), [
      { name: 'id', type: 'INT' },
      { name: 'amount', type: 'DECIMAL(18,2)' },
      { name: 'notes', type: 'VARCHAR(50)' },
    ]);
  });

  it('falls back to a synthetic id column when nothing parses', () => {
    assert.deepEqual(parseColumnList('  ,  '), [{ name: 'id', type: 'INT' }]);
  });
});

describe('renderSql', () => {
  it('renders list_tables from the information schema', () => {
    assert.equal(renderSql(action('list_tables')), LIST_TABLES_SQL);
    assert.ok(LIST_TABLES_SQL.startsWith("SELECT t.table_schema || '.' || t.table_name AS table_name"));
  });

  it('looks up describe_table by the bare table name', () => {
    assert.equal(
      renderSql(action('describe_table', { table: 'mart.dim_customer' })),
      [
        'SELECT column_name, data_type, is_nullable, character_maximum_length',
        'FROM information_schema.columns',
        "WHERE table_name = 'dim_customer'",
        'ORDER BY ordinal_position;',
      ].join('\n'),
    );
  });

  it('counts rows on the qualified name', () => {
    assert.equal(
      renderSql(action('row_count', { table: 'mart.fact_loans' })),
      'SELECT COUNT(*) AS row_count FROM mart.fact_loans;',
    );
  });

  it('renders a guarded create table with every column', () => {
    const sql = renderSql(action('create_table', { table: 'staging.pay', options: { columns: 'id int, amount decimal(18,2)' } }));
    assert.equal(
      sql,
      [
        'DO $$',
        'BEGIN',
        "  IF NOT EXISTS (SELECT 1 FROM information_schema.tables WHERE table_name = 'pay') THEN",
        '    CREATE TABLE staging.pay (',
        '      id INT,',
        '      amount DECIMAL(18,2)',
        '    );',
        '  END IF;',
        'END $$;',
      ].join('\n'),
    );
  });

  it('renders create table deterministically', () => {
    const create = action('create_table', { table: 'staging.pay', options: { columns: 'id int, amount decimal(18,2)' } });
    assert.equal(renderSql(create), renderSql(create));
  });

  it('guards drop table on existence', () => {
    assert.equal(
      renderSql(action('drop_table', { table: 'tmp_import' })),
      [
        'DO $$',
        'BEGIN',
        "  IF EXISTS (SELECT 1 FROM information_schema.tables WHERE table_name = 'tmp_import') THEN",
        '    DROP TABLE tmp_import;',
        '  END IF;',
        'END $$;',
      ].join('\n'),
    );
  });

  it('guards add column on the column being missing', () => {
    const sql = renderSql(action('add_column', { table: 'users', column: 'email', options: { type: 'varchar(200)' } }));
    assert.equal(
      sql,
      [
        'DO $$',
        'BEGIN',
        "  IF NOT EXISTS (SELECT 1 FROM information_schema.columns WHERE table_name = 'users' AND column_name = 'email') THEN",
        '    ALTER TABLE users ADD COLUMN email VARCHAR(200);',
        '  END IF;',
        'END $$;',
      ].join('\n'),
    );
  });

  it('uses the default type when add column has none', () => {
    const sql = renderSql(action('add_column', { table: 'users', column: 'notes' }));
    assert.ok(sql?.includes('ALTER TABLE users ADD COLUMN notes VARCHAR(50);'));
  });

  it('drops a column only when it exists', () => {
    const sql = renderSql(action('drop_column', { table: 'users', column: 'legacy_flag' }));
    assert.ok(sql?.includes("  IF EXISTS (SELECT 1 FROM information_schema.columns WHERE table_name = 'users' AND column_name = 'legacy_flag') THEN"));
    assert.ok(sql?.includes('    ALTER TABLE users DROP COLUMN legacy_flag;'));
  });

  it('names indexes after the bare table and first column', () => {
    const sql = renderSql(action('create_index', { table: 'sales.orders', options: { columns: 'customer_id, created_at' } }));
    assert.equal(
      sql,
      [
        'DO $$',
        'BEGIN',
        "  IF NOT EXISTS (SELECT 1 FROM pg_indexes WHERE indexname = 'ix_orders_customer_id') THEN",
        '    CREATE INDEX ix_orders_customer_id ON sales.orders (customer_id, created_at);',
        '  END IF;',
        'END $$;',
      ].join('\n'),
    );
  });

  it('returns null for star diagnostics', () => {
    assert.equal(renderSql(action('fact_health', { table: 'fact_sales' })), null);
    assert.equal(renderSql(action('star_overview')), null);
  });

  it('throws when a required field is missing', () => {
    assert.throws(() => renderSql(action('row_count')), /row_count requires a table/);
    assert.throws(() => renderSql(action('drop_column', { table: 'users' })), /drop_column requires a column/);
    assert.throws(() => renderSql(action('create_index', { table: 'users', options: { columns: '' } })), /at least one column/);
  });
});
