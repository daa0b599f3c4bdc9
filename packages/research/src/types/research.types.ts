export type ProgressEventKind = 'prompt' | 'processing' | 'message' | 'systemprompt' | 'done';

export type SessionState =
  | 'seeded'
  | 'searching'
  | 'synthesizing'
  | 'expanding'
  | 'finalizing'
  | 'done'
  | 'cancelled'
  | 'failed';

export type SessionOutcomeStatus = 'success' | 'error' | 'cancelled';

export interface HitProvenance {
  round: number;
  query: string;
}

/** A hit as returned by a SearchGateway, before the session stamps provenance on it. */
export interface SearchHitCandidate {
  repository: string;
  identifier: string;
  snippet: string;
  branch?: string;
}

export interface SearchHit extends SearchHitCandidate {
  provenance: HitProvenance;
}

export interface PartialFailure {
  round: number;
  query: string;
  repository: string;
  reason: string;
}

export interface SearchRound {
  readonly index: number;
  readonly queries: readonly string[];
  readonly hits: readonly SearchHit[];
  readonly newlyAdded: number;
  readonly failures: readonly PartialFailure[];
}

export interface Finding {
  round: number;
  text: string;
  references: string[];
  suggestedQueries: string[];
  /** The model answered in the finding schema, so `suggestedQueries` is its complete list of open terms. */
  structured: boolean;
}

export interface ProgressPayload {
  content?: string;
  message?: string;
  done: boolean;
  state?: SessionState;
  round?: number;
  maxRounds?: number;
  discovered?: number;
  merged?: number;
  queries?: string[];
  status?: SessionOutcomeStatus;
  error?: string;
}

export interface ProgressEvent {
  seq: number;
  event: ProgressEventKind;
  data: ProgressPayload;
}

export interface ResearchRequest {
  query: string;
  repositories: string[];
  maxRounds?: number;
  customPrompt?: string;
  temperature?: number;
  branch?: string;
  history?: ChatMessage[];
}

export type ChatRole = 'user' | 'assistant' | 'system';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ResearchOutcome {
  sessionId: string;
  status: SessionOutcomeStatus;
  state: SessionState;
  answer?: string;
  error?: string;
  rounds: SearchRound[];
  findings: Finding[];
  hits: SearchHit[];
  issuedQueries: string[];
}

export const DEFAULT_MAX_ROUNDS = 5;
export const DEFAULT_KEYWORD_LIMIT = 5;
export const DEFAULT_TEMPERATURE = 0.7;
