import type { ChatMessage, SearchHitCandidate } from './research.types.js';

export interface SearchQuery {
  query: string;
  repository: string;
  branch?: string;
  maxResults?: number;
  /** Skip repository-specific query prefixes and path rules. */
  rawQuery?: boolean;
  /** Searches issued by the research loop ignore included-path restrictions. */
  agentSearch?: boolean;
}

export interface SearchGateway {
  search(request: SearchQuery): Promise<SearchHitCandidate[]>;
}

export type CompletionResponseFormat =
  | { type: 'text' }
  | { type: 'json_object' }
  | { type: 'json_schema'; name: string; schema: Record<string, unknown> };

export interface CompletionRequest {
  messages: ChatMessage[];
  temperature: number;
  responseFormat?: CompletionResponseFormat;
  maxTokens?: number;
}

export interface CompletionGateway {
  complete(request: CompletionRequest): Promise<string>;
  stream(request: CompletionRequest): AsyncIterable<string>;
}
