import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ResultAggregator } from '../src/index.js';
import type { FanOutResult, SearchHit } from '../src/index.js';

const hit = (repository: string, identifier: string, round = 0, query = 'q'): SearchHit => ({
  repository,
  identifier,
  snippet: identifier,
  provenance: { round, query },
});

describe('ResultAggregator', () => {
  it('keeps the first occurrence of a (repository, identifier) pair', () => {
    const existing = [hit('core', 'a.ts', 0, 'first')];
    const { merged, newlyAdded } = ResultAggregator.merge(existing, [
      hit('core', 'a.ts', 1, 'second'),
      hit('core', 'b.ts', 1, 'second'),
      hit('billing', 'a.ts', 1, 'second'),
    ]);

    assert.equal(newlyAdded, 2);
    assert.deepEqual(merged.map((item) => `${item.repository}:${item.identifier}`), ['core:a.ts', 'core:b.ts', 'billing:a.ts']);
    assert.deepEqual(merged[0]?.provenance, { round: 0, query: 'first' });
  });

  it('is idempotent', () => {
    const first = ResultAggregator.merge([], [hit('core', 'a.ts'), hit('core', 'b.ts')]);
    const second = ResultAggregator.merge(first.merged, [hit('core', 'b.ts'), hit('core', 'a.ts')]);

    assert.equal(second.newlyAdded, 0);
    assert.deepEqual(second.merged, first.merged);
  });

  it('orders fan-out results by query then repository regardless of arrival', () => {
    const results: FanOutResult[] = [
      { round: 2, queryOrder: 1, repositoryOrder: 1, query: 'beta', repository: 'billing', hits: [{ repository: 'billing', identifier: 'd.ts', snippet: '' }] },
      { round: 2, queryOrder: 0, repositoryOrder: 1, query: 'alpha', repository: 'billing', hits: [{ repository: 'billing', identifier: 'b.ts', snippet: '' }] },
      { round: 2, queryOrder: 1, repositoryOrder: 0, query: 'beta', repository: 'core', hits: [{ repository: '', identifier: 'c.ts', snippet: '' }] },
      { round: 2, queryOrder: 0, repositoryOrder: 0, query: 'alpha', repository: 'core', hits: [{ repository: 'core', identifier: 'a.ts', snippet: '' }] },
    ];

    const forward = ResultAggregator.orderFanOut(results);
    const reversed = ResultAggregator.orderFanOut([...results].reverse());

    assert.deepEqual(forward.map((item) => item.identifier), ['a.ts', 'b.ts', 'c.ts', 'd.ts']);
    assert.deepEqual(reversed, forward);
    assert.equal(forward[2]?.repository, 'core');
    assert.deepEqual(forward[3]?.provenance, { round: 2, query: 'beta' });
  });
});
