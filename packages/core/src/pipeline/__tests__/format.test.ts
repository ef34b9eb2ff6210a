import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { NO_RESULTS, formatRows, formatTable, formatValue } from '../format.js';

describe('formatValue', () => {
  it('renders nulls, dates, bigints and objects', () => {
    assert.equal(formatValue(null), 'NULL');
    assert.equal(formatValue(undefined), 'NULL');
    assert.equal(formatValue(new Date('2024-01-02T03:04:05.000Z')), '2024-01-02T03:04:05.000Z');
    assert.equal(formatValue(12n), '12');
    assert.equal(formatValue({ a: 1 }), '{"a":1}');
    assert.equal(formatValue(true), 'true');
  });
});

describe('formatTable', () => {
  it('pads every column to its widest cell', () => {
    const text = formatTable(['id', 'name'], [
      { id: 1, name: 'alice' },
      { id: 10, name: null },
    ]);
    assert.equal(text, ['id | name ', '---+------', '1  | alice', '10 | NULL '].join('\n'));
  });

  it('returns the no-results message for empty input', () => {
    assert.equal(formatTable(['id'], []), NO_RESULTS);
    assert.equal(formatRows([]), 'No results returned.');
  });

  it('takes columns from the first row', () => {
    assert.equal(formatRows([{ n: 1 }]), ['n', '-', '1'].join('\n'));
  });
});
