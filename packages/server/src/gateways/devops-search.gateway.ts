import type { Logger } from '@codescout/httpkit';
import { SearchError, describeError } from '@codescout/research';
import type { SearchGateway, SearchHitCandidate, SearchQuery } from '@codescout/research';
import * as z from 'zod';

import type { RepositoryConfigs } from '../config/repository.config.js';
import type { ContentCache } from '../services/content-cache.service.js';

const codeSearchResponseSchema = z.object({
  count: z.number().default(0),
  results: z.array(z.object({
    fileName: z.string().optional(),
    path: z.string(),
    matches: z.object({ content: z.array(z.unknown()).optional() }).partial().optional(),
    repository: z.object({ name: z.string() }).optional(),
    versions: z.array(z.object({ branchName: z.string().optional() })).optional(),
  })).default([]),
});

const itemResponseSchema = z.object({
  content: z.string().default(''),
});

type CodeSearchResult = z.infer<typeof codeSearchResponseSchema>['results'][number];

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface DevOpsSearchOptions {
  organization: string;
  project: string;
  pat: string;
  repositories: RepositoryConfigs;
  cache?: ContentCache;
  logger?: Logger;
  maxAttempts?: number;
  /** Base of the linear backoff between attempts. */
  retryDelayMs?: number;
  requestTimeoutMs?: number;
  fetch?: FetchLike;
  searchBaseUrl?: string;
  apiBaseUrl?: string;
}

const API_VERSION = '7.1';
const DEFAULT_TOP = 1000;
const AGENT_RESULT_LIMIT = 50;
const MAX_FILE_LENGTH = 200_000;
const MAX_TOTAL_LENGTH = 3_000_000;
const MAX_AGENT_TOTAL_LENGTH = 1_000_000;

class HttpStatusError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
  }
}

/**
 * Azure DevOps code search. One call searches one repository, then pulls the content of every
 * matching file (through the content cache) until the per-call length budget is spent.
 */
export class DevOpsSearchGateway implements SearchGateway {
  private readonly fetchImpl: FetchLike;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly requestTimeoutMs: number;
  private readonly searchBaseUrl: string;
  private readonly apiBaseUrl: string;
  private readonly authorization: string;

  constructor(private readonly options: DevOpsSearchOptions) {
    if (!options.organization || !options.project || !options.pat) {
      throw new Error('AZURE_DEVOPS_ORG, AZURE_DEVOPS_PROJECT and AZURE_DEVOPS_PAT are required for code search');
    }

    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.searchBaseUrl = (options.searchBaseUrl ?? 'https://almsearch.dev.azure.com').replace(/\/+$/, '');
    this.apiBaseUrl = (options.apiBaseUrl ?? 'https://dev.azure.com').replace(/\/+$/, '');
    this.authorization = `Basic ${Buffer.from(`:${options.pat}`).toString('base64')}`;
  }

  get organization(): string {
    return this.options.organization;
  }

  get project(): string {
    return this.options.project;
  }

  async search(request: SearchQuery): Promise<SearchHitCandidate[]> {
    const { repositories, logger } = this.options;
    const config = repositories.get(request.repository);
    const searchText = request.rawQuery ? request.query : repositories.applyPrefix(request.repository, request.query);
    const location = {
      organization: config.organization ?? this.options.organization,
      project: config.project ?? this.options.project,
    };
    const meta = { repository: request.repository, query: request.query };
    logger?.info('devops.search', { ...meta, searchText });

    let results: CodeSearchResult[];

    try {
      results = await this.withRetry(() => this.searchCode(location, searchText, request), { operation: 'search', ...meta });
    }
    catch (error) {
      throw new SearchError(`Code search for "${request.query}" in ${request.repository} failed: ${describeError(error)}`, { cause: error });
    }

    const filtered = request.rawQuery
      ? results
      : results.filter((result) => !repositories.shouldExcludePath(request.repository, result.path, request.agentSearch));
    const ranked = this.rank(filtered, request.query);
    const selected = request.agentSearch ? ranked.slice(0, AGENT_RESULT_LIMIT) : ranked;
    logger?.debug('devops.search.results', { ...meta, found: results.length, kept: selected.length });

    return this.collectContents(selected, request, location);
  }

  /** Files whose path contains the query first, then by number of content matches. */
  private rank(results: CodeSearchResult[], query: string): CodeSearchResult[] {
    const needle = query.toLowerCase();
    const score = (result: CodeSearchResult) => ({
      inPath: result.path.toLowerCase().includes(needle) ? 1 : 0,
      matches: result.matches?.content?.length ?? 0,
    });

    return results
      .map((result, position) => ({ result, position, ...score(result) }))
      .sort((a, b) => (b.inPath - a.inPath) || (b.matches - a.matches) || (a.position - b.position))
      .map(({ result }) => result);
  }

  private async collectContents(
    results: CodeSearchResult[],
    request: SearchQuery,
    location: { organization: string; project: string },
  ): Promise<SearchHitCandidate[]> {
    const { logger } = this.options;
    const budget = request.agentSearch ? MAX_AGENT_TOTAL_LENGTH : MAX_TOTAL_LENGTH;
    const hits: SearchHitCandidate[] = [];
    let total = 0;

    for (const result of results) {
      const repository = result.repository?.name ?? request.repository;
      const branch = result.versions?.[0]?.branchName?.replace(/^refs\/heads\//, '') || request.branch;
      let content: string;

      try {
        content = await this.fileContent(location, repository, result.path, branch);
      }
      catch (error) {
        logger?.warn('devops.content.error', { repository, path: result.path, error: describeError(error) });
        continue;
      }

      if (content.length > MAX_FILE_LENGTH) {
        logger?.debug('devops.content.skipped', { path: result.path, length: content.length });
        continue;
      }

      if (total + content.length > budget) {
        logger?.info('devops.content.budget', { total, budget });
        break;
      }

      total += content.length;
      hits.push({ repository, identifier: result.path, snippet: content, ...(branch ? { branch } : {}) });
    }

    return hits;
  }

  private async fileContent(
    location: { organization: string; project: string },
    repository: string,
    path: string,
    branch?: string,
  ): Promise<string> {
    const cacheKey = `${repository}:${branch ?? ''}:${path}`;
    const cached = await this.options.cache?.get(cacheKey);

    if (cached !== undefined) {
      return cached;
    }

    const url = new URL(`${this.apiBaseUrl}/${encodeURIComponent(location.organization)}/${encodeURIComponent(location.project)}/_apis/git/repositories/${encodeURIComponent(repository)}/items`);
    url.searchParams.set('path', path);
    url.searchParams.set('includeContent', 'true');
    url.searchParams.set('$format', 'json');
    url.searchParams.set('api-version', API_VERSION);

    if (branch) {
      url.searchParams.set('versionDescriptor.version', branch);
      url.searchParams.set('versionDescriptor.versionType', 'branch');
    }

    const body = await this.withRetry(() => this.requestJson(url.toString(), { method: 'GET' }), { operation: 'content', repository, path });
    const { content } = itemResponseSchema.parse(body);
    await this.options.cache?.set(cacheKey, content);
    return content;
  }

  private async searchCode(
    location: { organization: string; project: string },
    searchText: string,
    request: SearchQuery,
  ): Promise<CodeSearchResult[]> {
    const url = `${this.searchBaseUrl}/${encodeURIComponent(location.organization)}/${encodeURIComponent(location.project)}/_apis/search/codesearchresults?api-version=${API_VERSION}`;
    const filters: Record<string, string[]> = { Repository: [request.repository] };

    if (request.branch) {
      filters.Branch = [request.branch];
    }

    const body = await this.requestJson(url, {
      method: 'POST',
      body: JSON.stringify({
        searchText,
        $skip: 0,
        $top: request.maxResults ?? DEFAULT_TOP,
        filters,
        includeFacets: false,
      }),
    });

    return codeSearchResponseSchema.parse(body).results;
  }

  private async requestJson(url: string, init: RequestInit): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      ...init,
      headers: {
        Authorization: this.authorization,
        Accept: 'application/json',
        ...(init.body ? { 'Content-Type': 'application/json' } : {}),
      },
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new HttpStatusError(response.status, `HTTP ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`);
    }

    return response.json();
  }

  private async withRetry<T>(operation: () => Promise<T>, meta?: Record<string, unknown>): Promise<T> {
    let attempt = 0;

    while (attempt < this.maxAttempts) {
      attempt += 1;

      try {
        return await operation();
      }
      catch (error) {
        // client errors other than throttling will not improve on retry
        const permanent = error instanceof HttpStatusError && error.status < 500 && error.status !== 429;

        if (permanent || attempt >= this.maxAttempts) {
          throw error;
        }

        const delay = this.computeDelay(attempt);
        this.options.logger?.warn('devops.retry', { attempt, delay, error: describeError(error), ...(meta || {}) });
        await this.wait(delay);
      }
    }

    throw new Error('Retry logic exhausted without executing operation');
  }

  private computeDelay(attempt: number): number {
    return this.retryDelayMs * attempt;
  }

  private async wait(ms: number): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, ms));
  }
}
