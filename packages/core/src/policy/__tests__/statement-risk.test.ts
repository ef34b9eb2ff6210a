import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseSql } from '../parse.js';
import { assessStatementRisk, riskFromText } from '../statement-risk.js';

describe('parseSql', () => {
  it('parses a CTE SELECT', () => {
    const result = parseSql('WITH cte AS (SELECT 1) SELECT * FROM cte;');
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.deepEqual(result.kinds, ['select']);
      assert.equal(result.statementCount, 1);
      assert.equal(result.normalizedSql, 'WITH cte AS (SELECT 1) SELECT * FROM cte');
    }
  });

  it('reports empty input', () => {
    assert.deepEqual(parseSql('  ;  '), { ok: false, error: 'Empty SQL statement' });
  });
});

describe('assessStatementRisk', () => {
  it('rates a SELECT as low risk', () => {
    assert.deepEqual(assessStatementRisk('SELECT 1'), {
      risk: 'low',
      kinds: ['select'],
      parsed: true,
      summary: 'SELECT',
    });
  });

  it('rates data changes as medium and drops as high', () => {
    assert.equal(assessStatementRisk("UPDATE users SET name = 'x'").risk, 'medium');
    const drop = assessStatementRisk('DROP TABLE users');
    assert.equal(drop.risk, 'high');
    assert.equal(drop.summary, 'DROP');
  });

  it('summarizes several statements', () => {
    const risk = assessStatementRisk('SELECT 1; SELECT 2');
    assert.equal(risk.summary, '2 statements (SELECT, SELECT)');
    assert.equal(risk.risk, 'low');
  });

  it('treats privilege changes as high risk', () => {
    assert.deepEqual(assessStatementRisk('grant select on users to analyst'), {
      risk: 'high',
      kinds: ['unknown'],
      parsed: false,
      summary: 'GRANT statement (privilege change)',
    });
  });

  it('falls back to a keyword scan for unparseable text', () => {
    const risk = assessStatementRisk('this is not sql but DROP TABLE x appears');
    assert.equal(risk.parsed, false);
    assert.equal(risk.risk, 'high');
    assert.equal(risk.summary, 'Unparseable statement, high risk by keyword scan');
  });
});

describe('riskFromText', () => {
  it('scans for destructive keywords', () => {
    assert.equal(riskFromText('truncate table staging.pay'), 'high');
    assert.equal(riskFromText('ALTER TABLE t ALTER COLUMN c TYPE int'), 'medium');
    assert.equal(riskFromText('alter table t drop column c'), 'medium');
    assert.equal(riskFromText('VACUUM ANALYZE'), 'low');
  });
});
