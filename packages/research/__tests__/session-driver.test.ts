import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { startResearch } from '../src/index.js';
import type { ProgressEvent, SearchHitCandidate } from '../src/index.js';
import { FakeCompletion, FakeSearch, byKind, collect, finding } from './fakes.js';

const assertWellFormed = (events: ProgressEvent[]) => {
  assert.deepEqual(events.map((event) => event.seq), events.map((_, index) => index));
  assert.equal(byKind(events, 'done').length, 1);
  assert.equal(events.at(-1)?.event, 'done');
};

describe('SessionDriver', () => {
  it('follows an unresolved term into a second round and streams the answer', async () => {
    const search = new FakeSearch({
      'account schema': { core: ['db/account.sql'], billing: [] },
      'foreign key': { core: ['db/account.sql', 'db/fk.sql'], billing: ['invoice.sql'] },
    });
    const completion = new FakeCompletion(
      [finding('Accounts live in the account table.', ['foreign key']), finding('Invoices reference accounts.', ['invoice index'])],
      ['The account ', 'schema.'],
    );

    const session = startResearch(
      { query: 'account schema', repositories: ['core', 'billing'], maxRounds: 2 },
      { search, completion },
    );
    const [events, outcome] = await Promise.all([collect(session.events), session.outcome]);

    assertWellFormed(events);
    assert.equal(outcome.status, 'success');
    assert.equal(outcome.state, 'done');
    assert.equal(outcome.answer, 'The account schema.');
    assert.deepEqual(outcome.rounds.map((round) => round.index), [0, 1]);
    assert.deepEqual(outcome.rounds.map((round) => round.newlyAdded), [1, 2]);
    assert.deepEqual(outcome.hits.map((hit) => hit.identifier), ['db/account.sql', 'db/fk.sql', 'invoice.sql']);
    assert.deepEqual(outcome.hits[1]?.provenance, { round: 1, query: 'foreign key' });
    assert.deepEqual(outcome.issuedQueries, ['account schema', 'foreign key']);
    assert.deepEqual(outcome.findings[0]?.references, ['core/db/account.sql']);
    assert.equal(search.calls.length, 4);
    assert.ok(search.calls.every((call) => call.agentSearch === true));

    assert.equal(
      byKind(events, 'prompt')[0]?.data.content,
      'Context from codebase:\n\nFile: core/db/account.sql\n```\n// db/account.sql\n```',
    );
    assert.deepEqual(byKind(events, 'message').map((event) => event.data.content), ['The account ', 'schema.']);
    assert.deepEqual(
      byKind(events, 'processing').flatMap((event) => (event.data.state ? [event.data.state] : [])),
      ['seeded', 'searching', 'synthesizing', 'expanding', 'searching', 'synthesizing', 'expanding', 'finalizing'],
    );
    assert.deepEqual(events.at(-1)?.data, { status: 'success', message: 'Research complete', done: true });

    const secondRound = completion.requests[1]?.messages.at(-1)?.content ?? '';
    assert.ok(secondRound.startsWith('Research round 1. Question: account schema'));
  });

  it('stops when a finding only repeats issued queries', async () => {
    const search = new FakeSearch({ 'account schema': { core: ['db/account.sql'] } });
    const completion = new FakeCompletion([finding('Done.', ['Account Schema', '`account schema`'])]);

    const session = startResearch({ query: 'account schema', repositories: ['core'], maxRounds: 5 }, { search, completion });
    const [events, outcome] = await Promise.all([collect(session.events), session.outcome]);

    assertWellFormed(events);
    assert.equal(outcome.rounds.length, 1);
    assert.equal(search.calls.length, 1);
    assert.deepEqual(outcome.issuedQueries, ['account schema']);
  });

  it('continues on new queries even when a round adds no hits', async () => {
    const search = new FakeSearch({ 'account schema': { core: [] }, ledger: { core: ['ledger.ts'] } });
    const completion = new FakeCompletion([finding('Nothing yet.', ['ledger'])]);

    const session = startResearch({ query: 'account schema', repositories: ['core'], maxRounds: 3 }, { search, completion });
    const [, outcome] = await Promise.all([collect(session.events), session.outcome]);

    assert.deepEqual(outcome.rounds.map((round) => round.newlyAdded), [0, 1]);
  });

  it('stops on an empty round when asked to', async () => {
    const search = new FakeSearch({ 'account schema': { core: [] } });
    const completion = new FakeCompletion([finding('Nothing yet.', ['ledger'])]);

    const session = startResearch(
      { query: 'account schema', repositories: ['core'], maxRounds: 3 },
      { search, completion, stopOnNoNewHits: true },
    );
    const [, outcome] = await Promise.all([collect(session.events), session.outcome]);

    assert.equal(outcome.rounds.length, 1);
    assert.equal(outcome.status, 'success');
  });

  it('records a failed repository and keeps the round going', async () => {
    const search = new FakeSearch({
      'account schema': { core: ['db/account.sql'], billing: new Error('boom') },
    });
    const completion = new FakeCompletion([finding('Partial answer.')]);

    const session = startResearch({ query: 'account schema', repositories: ['core', 'billing'] }, { search, completion });
    const [events, outcome] = await Promise.all([collect(session.events), session.outcome]);

    assertWellFormed(events);
    assert.equal(outcome.status, 'success');
    assert.deepEqual(outcome.rounds[0]?.failures, [{
      round: 0,
      query: 'account schema',
      repository: 'billing',
      reason: 'Search for "account schema" in billing failed: boom',
    }]);
    assert.ok(byKind(events, 'processing').some((event) => event.data.message === 'Search for "account schema" in billing failed: boom'));
  });

  it('cancels during round two without starting round three', async () => {
    const search = new FakeSearch({ 'account schema': { core: ['db/account.sql'] } });
    const completion = new FakeCompletion([finding('First.', ['foreign key']), finding('Second.', ['ledger'])]);
    let cancel: (reason?: string) => void = () => undefined;

    search.onCall = (request) => {
      if (request.query !== 'foreign key') {
        return undefined;
      }

      cancel('user stopped');
      return new Promise<SearchHitCandidate[]>((resolve) => {
        setTimeout(() => resolve([{ repository: 'core', identifier: 'late.sql', snippet: '' }]), 10);
      });
    };

    const session = startResearch({ query: 'account schema', repositories: ['core'], maxRounds: 5 }, { search, completion });
    cancel = session.cancel;
    const [events, outcome] = await Promise.all([collect(session.events), session.outcome]);

    assertWellFormed(events);
    assert.equal(outcome.status, 'cancelled');
    assert.equal(outcome.state, 'cancelled');
    assert.deepEqual(search.calls.map((call) => call.query), ['account schema', 'foreign key']);
    assert.equal(completion.requests.length, 1);
    assert.equal(completion.streamed.length, 0);
    assert.ok(outcome.hits.every((hit) => hit.identifier !== 'late.sql'));
    assert.equal(byKind(events, 'message').length, 0);
    assert.deepEqual(events.at(-1)?.data, { status: 'cancelled', message: 'Research cancelled: user stopped', done: true });
  });

  it('treats an already aborted signal as a client disconnect', async () => {
    const search = new FakeSearch();
    const completion = new FakeCompletion([]);
    const controller = new AbortController();
    controller.abort();

    const session = startResearch(
      { query: 'account schema', repositories: ['core'] },
      { search, completion, signal: controller.signal },
    );
    const [events, outcome] = await Promise.all([collect(session.events), session.outcome]);

    assert.equal(outcome.status, 'cancelled');
    assert.equal(search.calls.length, 0);
    assert.deepEqual(events, [{
      seq: 0,
      event: 'done',
      data: { status: 'cancelled', message: 'Research cancelled: client disconnected', done: true },
    }]);
  });

  it('cancels a session that outlives its timeout', async () => {
    const search = new FakeSearch();
    search.onCall = () => new Promise<SearchHitCandidate[]>((resolve) => {
      setTimeout(() => resolve([]), 200);
    });
    const completion = new FakeCompletion([]);

    const session = startResearch({ query: 'account schema', repositories: ['core'] }, { search, completion, timeoutMs: 20 });
    const [events, outcome] = await Promise.all([collect(session.events), session.outcome]);

    assertWellFormed(events);
    assert.equal(outcome.status, 'cancelled');
    assert.equal(outcome.error, 'Research cancelled: session timed out after 20ms');
  });

  it('runs to completion when the configured timeout exceeds the timer range', async () => {
    const search = new FakeSearch();
    search.onCall = () => new Promise<SearchHitCandidate[]>((resolve) => {
      setTimeout(() => resolve([{ repository: 'core', identifier: 'db/account.sql', snippet: 'create table account' }]), 30);
    });
    const completion = new FakeCompletion([finding('Done.')]);

    const session = startResearch({ query: 'account schema', repositories: ['core'] }, { search, completion, timeoutMs: 3_000_000_000 });
    const [events, outcome] = await Promise.all([collect(session.events), session.outcome]);

    assertWellFormed(events);
    assert.equal(outcome.status, 'success');
    assert.equal(outcome.error, undefined);
  });

  it('ends the research once a structured finding has nothing unresolved', async () => {
    const search = new FakeSearch({ 'account schema': { core: ['db/account.sql'] } });
    const completion = new FakeCompletion([finding('The `Account` table has an `id` column.', [])]);

    const session = startResearch({ query: 'account schema', repositories: ['core'], maxRounds: 5 }, { search, completion });
    const [events, outcome] = await Promise.all([collect(session.events), session.outcome]);

    assertWellFormed(events);
    assert.equal(outcome.status, 'success');
    assert.equal(outcome.rounds.length, 1);
    assert.deepEqual(outcome.issuedQueries, ['account schema']);
    assert.equal(search.calls.length, 1);
  });

  it('mines free-text findings for backticked follow-up terms', async () => {
    const search = new FakeSearch({ 'account schema': { core: ['db/account.sql'] }, AccountRepository: { core: ['repo.ts'] } });
    const completion = new FakeCompletion(['Rows are written by `AccountRepository`.']);

    const session = startResearch({ query: 'account schema', repositories: ['core'], maxRounds: 2 }, { search, completion });
    const [, outcome] = await Promise.all([collect(session.events), session.outcome]);

    assert.deepEqual(outcome.issuedQueries, ['account schema', 'AccountRepository']);
    assert.equal(outcome.findings[0]?.structured, false);
  });

  it('ends with an error event when synthesis fails', async () => {
    const search = new FakeSearch({ 'account schema': { core: ['db/account.sql'] } });
    const completion = new FakeCompletion([new Error('model unavailable')]);

    const session = startResearch({ query: 'account schema', repositories: ['core'] }, { search, completion });
    const [events, outcome] = await Promise.all([collect(session.events), session.outcome]);

    assertWellFormed(events);
    assert.equal(outcome.status, 'error');
    assert.equal(outcome.state, 'failed');
    assert.equal(outcome.error, 'Synthesis failed in round 1: model unavailable');
    assert.deepEqual(events.at(-1)?.data, { status: 'error', error: 'Synthesis failed in round 1: model unavailable', done: true });
  });
});
