import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { isRawQuery, splitList, temperatureParam } from '../src/utils/query.utils.js';

describe('isRawQuery', () => {
  it('accepts plain text', () => {
    for (const query of ['search term', 'search-with-hyphens', 'search_with_underscores', '123 numbers', 'url: not a filter']) {
      assert.equal(isRawQuery(query), true, query);
    }
  });

  it('rejects code search filters anywhere in the query', () => {
    for (const query of ['ext:py', 'file:utils.py', 'hello path:src/utils.py world', 'function definition def:parse', 'namespace:src', 'type:function']) {
      assert.equal(isRawQuery(query), false, query);
    }
  });

  it('ignores case', () => {
    for (const query of ['EXT:py', 'File:utils.py', 'PATH:src/utils.py', 'DEF:function']) {
      assert.equal(isRawQuery(query), false, query);
    }
  });
});

describe('splitList', () => {
  it('splits on commas and drops blanks', () => {
    assert.deepEqual(splitList(' billing-api, ,billing-db ,'), ['billing-api', 'billing-db']);
  });

  it('returns nothing for a missing value', () => {
    assert.deepEqual(splitList(undefined), []);
  });
});

describe('temperatureParam', () => {
  const schema = temperatureParam(0.7);

  it('takes the default for a missing or blank value', () => {
    assert.equal(schema.parse(undefined), 0.7);
    assert.equal(schema.parse(''), 0.7);
    assert.equal(schema.parse('  '), 0.7);
  });

  it('reads a number from the query string', () => {
    assert.equal(schema.parse('0'), 0);
    assert.equal(schema.parse('1.5'), 1.5);
  });

  it('rejects values out of range', () => {
    assert.equal(schema.safeParse('3').success, false);
    assert.equal(schema.safeParse('warm').success, false);
  });
});
