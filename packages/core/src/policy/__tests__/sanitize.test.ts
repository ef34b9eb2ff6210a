import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  AGGREGATE_SUBQUERY_WARNING,
  SanitizedSql,
  WARNING_MARKER,
  extractSql,
  findForbiddenKeyword,
  sanitize,
  sanitizeSql,
} from '../sanitize.js';
import { INTENT_RISK } from '../../actions/types.js';

describe('extractSql', () => {
  it('prefers a sql-tagged fence', () => {
    assert.equal(extractSql('Here you go:\n```sql\nSELECT 1\n```\nEnjoy'), 'SELECT 1');
  });

  it('falls back to an untagged fence', () => {
    assert.equal(extractSql('```\nSELECT 2\n```'), 'SELECT 2');
  });

  it('starts at a CTE before a bare SELECT', () => {
    assert.equal(
      extractSql('Try this: WITH recent AS (SELECT 1) SELECT * FROM recent'),
      'WITH recent AS (SELECT 1) SELECT * FROM recent',
    );
  });

  it('starts at the first SELECT in prose', () => {
    assert.equal(extractSql('The answer is SELECT name FROM users'), 'SELECT name FROM users');
  });
});

describe('sanitize', () => {
  it('strips fence markers and surrounding whitespace', () => {
    assert.equal(sanitize('```sql\n  SELECT 1  \n```'), 'SELECT 1');
  });

  it('rejects a denylisted keyword anywhere in the text', () => {
    assert.equal(sanitize('DROP TABLE x'), '');
    assert.equal(sanitize('SELECT * FROM t WHERE id IN (SELECT id FROM x); DROP TABLE x'), '');
  });

  it('reports the keyword and the extracted text on rejection', () => {
    assert.deepEqual(sanitizeSql('```sql\nselect 1; delete from t\n```'), {
      ok: false,
      reason: 'unsafe',
      keyword: 'DELETE',
      extracted: 'select 1; delete from t',
    });
  });

  it('does not match keywords inside longer identifiers', () => {
    assert.equal(findForbiddenKeyword('SELECT updated_at, last_update FROM t'), null);
    assert.equal(sanitize('SELECT updated_at FROM t'), 'SELECT updated_at FROM t');
  });

  it('reports empty input as empty', () => {
    assert.deepEqual(sanitizeSql('   '), { ok: false, reason: 'empty', extracted: '' });
  });

  it('straightens typographic quotes', () => {
    assert.equal(sanitize('SELECT ‘a’ AS “label”'), 'SELECT \'a\' AS "label"');
  });

  it('appends a warning marker for aggregates over a subquery', () => {
    const outcome = sanitizeSql('SELECT SUM((SELECT val FROM t))');
    assert.equal(outcome.ok, true);
    if (outcome.ok) {
      assert.deepEqual(outcome.warnings, [AGGREGATE_SUBQUERY_WARNING]);
      assert.equal(outcome.sql.text, `SELECT SUM((SELECT val FROM t))\n${WARNING_MARKER} ${AGGREGATE_SUBQUERY_WARNING}`);
      assert.equal(outcome.sql.hasWarningMarker(), true);
      assert.equal(outcome.sql.origin, 'generator');
    }
  });
});

describe('SanitizedSql.fromAction', () => {
  it('marks rendered statements with the renderer origin', () => {
    const sql = SanitizedSql.fromAction({
      kind: 'action',
      intent: 'row_count',
      table: 'users',
      options: {},
      risk: INTENT_RISK.row_count,
      note: '',
      raw: 'row count for users',
    });
    assert.equal(sql?.origin, 'renderer');
    assert.equal(sql?.text, 'SELECT COUNT(*) AS row_count FROM users;');
  });

  it('returns null for intents without SQL', () => {
    const sql = SanitizedSql.fromAction({
      kind: 'action',
      intent: 'star_overview',
      options: {},
      risk: 'low',
      note: '',
      raw: 'list star overview',
    });
    assert.equal(sql, null);
  });
});
