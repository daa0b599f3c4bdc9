import type { Logger } from '@codescout/httpkit';
import {
  GatewayFailureError,
  NoContentFoundError,
  PromptBuilder,
  ResultAggregator,
  describeError,
} from '@codescout/research';
import type { ChatMessage, FanOutResult, SearchGateway, SearchHit, SearchHitCandidate, SearchQuery } from '@codescout/research';

import { isRawQuery } from '../utils/query.utils.js';

export interface SearchSource {
  query: string;
  repositories: string[];
}

export interface PreparedAnswer {
  /** Formatted code context handed to the model. */
  context: string;
  messages: ChatMessage[];
  hits: SearchHit[];
}

export interface ScopeRequest {
  repository: string;
  query: string;
  branch: string;
  maxResults: number;
  customPrompt?: string | null;
}

/** Retrieval half of the single-shot search and scope endpoints; the answer is streamed elsewhere. */
export class SearchFlowService {
  constructor(
    private readonly search: SearchGateway,
    private readonly logger?: Logger,
  ) {}

  /** Every (source, repository) pair is searched concurrently; hits keep source then repository order. */
  async prepareSearch(sources: SearchSource[], customPrompt?: string | null): Promise<PreparedAnswer> {
    const calls = sources.flatMap((source, queryOrder) => source.repositories.map((repository, repositoryOrder) => ({
      queryOrder,
      repositoryOrder,
      request: {
        query: source.query,
        repository,
        // filter syntax is sent as typed, plain text gets the repository prefix
        rawQuery: !isRawQuery(source.query),
      } satisfies SearchQuery,
    })));

    const hits = await this.gather(calls);
    const context = PromptBuilder.formatContext(hits);
    return { context, hits, messages: PromptBuilder.searchMessages(context, customPrompt) };
  }

  async prepareScope(request: ScopeRequest): Promise<PreparedAnswer> {
    const hits = await this.gather([{
      queryOrder: 0,
      repositoryOrder: 0,
      request: {
        query: request.query,
        repository: request.repository,
        branch: request.branch,
        maxResults: request.maxResults,
        rawQuery: true,
      },
    }]);
    const context = PromptBuilder.formatContext(hits);
    return { context, hits, messages: PromptBuilder.scopeMessages(request.query, context, request.customPrompt) };
  }

  private async gather(calls: Array<{ queryOrder: number; repositoryOrder: number; request: SearchQuery }>): Promise<SearchHit[]> {
    type Call = { queryOrder: number; repositoryOrder: number; request: SearchQuery };
    const settled = await Promise.all(calls.map(async (call): Promise<{ call: Call; hits: SearchHitCandidate[] } | { call: Call; error: string }> => {
      try {
        return { call, hits: await this.search.search(call.request) };
      }
      catch (error) {
        return { call, error: describeError(error) };
      }
    }));
    const results: FanOutResult[] = [];
    const failures: string[] = [];

    for (const outcome of settled) {
      const { queryOrder, repositoryOrder, request } = outcome.call;

      if ('error' in outcome) {
        this.logger?.warn('search call failed', { repository: request.repository, query: request.query, error: outcome.error });
        failures.push(outcome.error);
        continue;
      }

      results.push({ round: 0, queryOrder, repositoryOrder, query: request.query, repository: request.repository, hits: outcome.hits });
    }

    const { merged } = ResultAggregator.merge([], ResultAggregator.orderFanOut(results));
    this.logger?.info('search gathered', { calls: calls.length, failed: failures.length, hits: merged.length });

    if (merged.length > 0) {
      return merged;
    }

    if (failures.length > 0 && failures.length === calls.length) {
      throw new GatewayFailureError(`Search failed: ${failures.join('; ')}`);
    }

    throw new NoContentFoundError();
  }
}
