import { v4 as uuid } from 'uuid';
import type { Logger } from '@codescout/httpkit';

import {
  CancelledByClientError,
  GatewayFailureError,
  PartialGatewayFailure,
  describeError,
  toResearchError,
} from '../errors.js';
import { DEFAULT_MAX_ROUNDS, DEFAULT_TEMPERATURE } from '../types/research.types.js';
import type {
  Finding,
  PartialFailure,
  ResearchOutcome,
  ResearchRequest,
  SearchHit,
  SearchRound,
  SessionState,
} from '../types/research.types.js';
import type { CompletionGateway, SearchGateway } from '../types/gateway.types.js';
import { ResultAggregator } from './result-aggregator.service.js';
import type { FanOutResult } from './result-aggregator.service.js';
import { KeywordExpander, normalizeQuery, queryKey } from './keyword-expander.service.js';
import { ProgressEmitter } from './progress-emitter.service.js';
import { FINDING_RESPONSE_FORMAT, PromptBuilder } from './prompt-builder.service.js';

/** Longest delay `setTimeout` honours; larger values fire after 1ms. */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface SessionDriverOptions {
  search: SearchGateway;
  completion: CompletionGateway;
  emitter: ProgressEmitter;
  expander?: KeywordExpander;
  logger?: Logger;
  /** Client disconnect or explicit cancellation. */
  signal?: AbortSignal;
  /** Wall-clock bound for the whole session; 0 disables it. */
  timeoutMs?: number;
  /** Stop as soon as a round adds no new unique hit, even if new queries exist. */
  stopOnNoNewHits?: boolean;
  sessionId?: string;
}

type SearchCall = {
  query: string;
  queryOrder: number;
  repository: string;
  repositoryOrder: number;
};

/**
 * Owns one deep research session: seeds round 0 with the user's question, loops
 * search → synthesize → expand until the round budget or the supply of new queries
 * runs out, then streams a final consolidated answer.
 */
export class SessionDriver {
  readonly sessionId: string;
  private readonly search: SearchGateway;
  private readonly completion: CompletionGateway;
  private readonly emitter: ProgressEmitter;
  private readonly expander: KeywordExpander;
  private readonly logger?: Logger;
  private readonly externalSignal?: AbortSignal;
  private readonly timeoutMs: number;
  private readonly stopOnNoNewHits: boolean;
  private readonly controller = new AbortController();

  private currentState: SessionState = 'seeded';
  private started = false;
  private readonly rounds: SearchRound[] = [];
  private readonly findings: Finding[] = [];
  private hits: SearchHit[] = [];
  private readonly issued = new Map<string, string>();

  constructor(options: SessionDriverOptions) {
    this.sessionId = options.sessionId ?? uuid();
    this.search = options.search;
    this.completion = options.completion;
    this.emitter = options.emitter;
    this.expander = options.expander ?? new KeywordExpander();
    this.logger = options.logger?.child({ sessionId: this.sessionId });
    this.externalSignal = options.signal;
    this.timeoutMs = Math.min(Math.max(0, options.timeoutMs ?? 0), MAX_TIMER_DELAY_MS);
    this.stopOnNoNewHits = options.stopOnNoNewHits ?? false;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** Cancels the session; in-flight gateway results are discarded. */
  cancel(reason = 'cancelled by caller'): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new CancelledByClientError(reason));
    }
  }

  async run(request: ResearchRequest): Promise<ResearchOutcome> {
    if (this.started) {
      throw new Error(`Research session ${this.sessionId} has already run`);
    }

    this.started = true;
    const detach = this.linkCancellation();

    try {
      const answer = await this.loop(request);
      this.currentState = 'done';
      this.logger?.info('research session completed', { rounds: this.rounds.length, hits: this.hits.length });
      await this.emitter.done({ status: 'success', message: 'Research complete' });
      return this.outcome('success', { answer });
    }
    catch (error) {
      if (this.controller.signal.aborted || error instanceof CancelledByClientError) {
        const cancelled = error instanceof CancelledByClientError ? error : this.cancellationReason();
        this.currentState = 'cancelled';
        this.logger?.info('research session cancelled', { reason: cancelled.reason, rounds: this.rounds.length });
        await this.emitter.done({ status: 'cancelled', message: cancelled.message });
        return this.outcome('cancelled', { error: cancelled.message });
      }

      const failure = toResearchError(error);
      this.currentState = 'failed';
      this.logger?.error('research session failed', { code: failure.code, error: failure.message });
      await this.emitter.done({ status: 'error', error: failure.message });
      return this.outcome('error', { error: failure.message });
    }
    finally {
      detach();
    }
  }

  private async loop(request: ResearchRequest): Promise<string> {
    const maxRounds = Math.max(1, Math.floor(request.maxRounds ?? DEFAULT_MAX_ROUNDS));
    const temperature = request.temperature ?? DEFAULT_TEMPERATURE;
    const repositories = [...new Set(request.repositories.map((repository) => repository.trim()).filter(Boolean))];
    const seed = normalizeQuery(request.query);

    await this.transition('seeded', `Starting deep research across ${repositories.length} repositor${repositories.length === 1 ? 'y' : 'ies'}...`, {
      maxRounds,
      queries: [seed],
    });

    let queries = seed ? [seed] : [];

    for (let index = 0; index < maxRounds; index += 1) {
      this.markIssued(queries);
      await this.checkpoint();
      await this.emitter.processing(`Deep research round ${index + 1}/${maxRounds}...`, {
        round: index,
        maxRounds,
        queries,
      });

      const round = await this.searchRound(index, maxRounds, queries, repositories, request.branch);
      const finding = await this.synthesize(request, round, temperature);

      await this.transition('expanding', 'Deriving follow-up queries...', { round: index, maxRounds });
      const next = this.expander.expand(finding, this.issued.values());

      await this.emitter.processing(`Round ${index + 1}/${maxRounds} complete`, {
        round: index,
        maxRounds,
        discovered: round.discovered,
        merged: round.newlyAdded,
        queries: next,
      });

      if (!this.shouldContinue(index, maxRounds, round, next)) {
        break;
      }

      await this.emitter.processing(`Searching for keywords: ${next.join(', ')}`, { round: index, maxRounds, queries: next });
      queries = next;
    }

    return this.finalize(request, maxRounds, temperature);
  }

  private shouldContinue(index: number, maxRounds: number, round: SearchRound, next: string[]): boolean {
    if (index + 1 >= maxRounds) {
      this.logger?.debug('round budget exhausted', { round: index, maxRounds });
      return false;
    }

    if (next.length === 0) {
      this.logger?.debug('no new queries produced', { round: index, newHits: round.newlyAdded });
      return false;
    }

    if (this.stopOnNoNewHits && round.newlyAdded === 0) {
      this.logger?.debug('round added no new hits', { round: index });
      return false;
    }

    return true;
  }

  private async searchRound(
    index: number,
    maxRounds: number,
    queries: string[],
    repositories: string[],
    branch?: string,
  ): Promise<SearchRound & { discovered: number }> {
    const calls: SearchCall[] = queries.flatMap((query, queryOrder) => repositories.map((repository, repositoryOrder) => ({
      query,
      queryOrder,
      repository,
      repositoryOrder,
    })));

    await this.transition('searching', `Searching ${repositories.length} repositor${repositories.length === 1 ? 'y' : 'ies'} for: ${queries.join(', ')}`, {
      round: index,
      maxRounds,
      queries,
    });

    const settled = await this.guard(Promise.allSettled(calls.map((call) => this.search.search({
      query: call.query,
      repository: call.repository,
      branch,
      agentSearch: true,
    }))));

    const results: FanOutResult[] = [];
    const failures: PartialFailure[] = [];

    settled.forEach((outcome, position) => {
      const call = calls[position];

      if (!call) {
        return;
      }

      if (outcome.status === 'fulfilled') {
        results.push({ ...call, round: index, hits: outcome.value });
        return;
      }

      const failure = new PartialGatewayFailure(call.repository, call.query, outcome.reason);
      this.logger?.warn('search call failed; continuing with remaining results', {
        round: index,
        repository: call.repository,
        query: call.query,
        error: describeError(outcome.reason),
      });
      failures.push({ round: index, query: call.query, repository: call.repository, reason: failure.message });
    });

    for (const failure of failures) {
      await this.emitter.processing(failure.reason, { round: index, maxRounds });
    }

    const ordered = ResultAggregator.orderFanOut(results);
    const before = this.hits.length;
    const { merged, newlyAdded } = ResultAggregator.merge(this.hits, ordered);
    this.hits = merged;

    const round: SearchRound = Object.freeze({
      index,
      queries: Object.freeze([...queries]),
      hits: Object.freeze(merged.slice(before)),
      newlyAdded,
      failures: Object.freeze(failures),
    });
    this.rounds.push(round);

    this.logger?.info('search round merged', { round: index, discovered: ordered.length, newlyAdded, failures: failures.length });

    if (round.hits.length > 0) {
      await this.emitter.emit('prompt', {
        content: PromptBuilder.formatContext(round.hits),
        round: index,
        maxRounds,
        discovered: ordered.length,
        merged: newlyAdded,
      });
    }

    return { ...round, discovered: ordered.length };
  }

  private async synthesize(request: ResearchRequest, round: SearchRound, temperature: number): Promise<Finding> {
    await this.transition('synthesizing', `Synthesizing findings for round ${round.index + 1}...`, { round: round.index });

    const messages = PromptBuilder.roundMessages({
      query: request.query,
      round: round.index,
      hits: round.hits,
      findings: this.findings,
      history: request.history,
      customPrompt: request.customPrompt,
    });

    let raw: string;

    try {
      raw = await this.guard(this.completion.complete({ messages, temperature, responseFormat: FINDING_RESPONSE_FORMAT }));
    }
    catch (error) {
      throw this.asGatewayFailure(error, `Synthesis failed in round ${round.index + 1}`);
    }

    const finding = PromptBuilder.parseFinding(raw, round.index, round.hits);
    this.findings.push(finding);
    return finding;
  }

  private async finalize(request: ResearchRequest, maxRounds: number, temperature: number): Promise<string> {
    await this.transition('finalizing', 'Research complete. Generating final answer...', {
      maxRounds,
      merged: this.hits.length,
    });

    const messages = PromptBuilder.finalMessages({
      query: request.query,
      hits: this.hits,
      findings: this.findings,
      history: request.history,
      customPrompt: request.customPrompt,
    });

    const iterator = this.completion.stream({ messages, temperature })[Symbol.asyncIterator]();
    let answer = '';

    try {
      while (true) {
        const next = await this.guard(iterator.next());

        if (next.done) {
          break;
        }

        if (next.value) {
          answer += next.value;
          await this.emitter.emit('message', { content: next.value });
        }
      }
    }
    catch (error) {
      iterator.return?.()?.catch((reason: unknown) => {
        this.logger?.debug('completion stream did not close cleanly', { error: describeError(reason) });
      });
      throw this.asGatewayFailure(error, 'Final synthesis failed');
    }

    return answer;
  }

  private async transition(state: SessionState, message: string, data: { round?: number; maxRounds?: number; merged?: number; queries?: string[] } = {}) {
    await this.checkpoint();
    this.currentState = state;
    this.logger?.debug('research state entered', { state, ...data });
    await this.emitter.processing(message, { ...data, state });
  }

  /** Cooperative cancellation point. */
  private async checkpoint(): Promise<void> {
    if (this.controller.signal.aborted) {
      throw this.cancellationReason();
    }
  }

  /** Resolves with `work` unless the session is cancelled first; a late result is discarded. */
  private guard<T>(work: Promise<T>): Promise<T> {
    const signal = this.controller.signal;

    if (signal.aborted) {
      work.catch(() => undefined);
      return Promise.reject(this.cancellationReason());
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(this.cancellationReason());
      signal.addEventListener('abort', onAbort, { once: true });
      work.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );
    });
  }

  private asGatewayFailure(error: unknown, context: string): Error {
    if (error instanceof CancelledByClientError || this.controller.signal.aborted) {
      return this.cancellationReason();
    }

    return new GatewayFailureError(`${context}: ${describeError(error)}`, { cause: error });
  }

  private cancellationReason(): CancelledByClientError {
    const reason: unknown = this.controller.signal.reason;
    return reason instanceof CancelledByClientError ? reason : new CancelledByClientError();
  }

  private linkCancellation(): () => void {
    const external = this.externalSignal;
    const onExternalAbort = () => {
      const reason: unknown = external?.reason;
      this.cancel(reason instanceof CancelledByClientError ? reason.reason : 'client disconnected');
    };

    if (external?.aborted) {
      onExternalAbort();
    }
    else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }

    const timer = this.timeoutMs > 0
      ? setTimeout(() => this.cancel(`session timed out after ${this.timeoutMs}ms`), this.timeoutMs)
      : undefined;
    timer?.unref?.();

    return () => {
      external?.removeEventListener('abort', onExternalAbort);

      if (timer) {
        clearTimeout(timer);
      }
    };
  }

  private markIssued(queries: string[]): void {
    for (const query of queries) {
      this.issued.set(queryKey(query), query);
    }
  }

  private outcome(status: ResearchOutcome['status'], extra: { answer?: string; error?: string }): ResearchOutcome {
    return {
      sessionId: this.sessionId,
      status,
      state: this.currentState,
      ...extra,
      rounds: [...this.rounds],
      findings: [...this.findings],
      hits: [...this.hits],
      issuedQueries: [...this.issued.values()],
    };
  }
}
