import type { Logger } from '@codescout/httpkit';

import type { ProgressEvent, ResearchOutcome, ResearchRequest } from './types/research.types.js';
import type { CompletionGateway, SearchGateway } from './types/gateway.types.js';
import { KeywordExpander } from './services/keyword-expander.service.js';
import { ProgressChannel } from './services/progress-channel.service.js';
import { ProgressEmitter } from './services/progress-emitter.service.js';
import { SessionDriver } from './services/session-driver.service.js';

export interface ResearchSessionOptions {
  search: SearchGateway;
  completion: CompletionGateway;
  logger?: Logger;
  signal?: AbortSignal;
  /** Events buffered before the driver waits on the consumer. */
  bufferSize?: number;
  keywordLimit?: number;
  timeoutMs?: number;
  stopOnNoNewHits?: boolean;
}

export interface ResearchSession {
  sessionId: string;
  events: ProgressChannel<ProgressEvent>;
  outcome: Promise<ResearchOutcome>;
  cancel: (reason?: string) => void;
}

/**
 * Starts a deep research session in the background. The caller drains `events`;
 * breaking out of that loop detaches the channel, so the caller should also `cancel()`.
 */
export function startResearch(request: ResearchRequest, options: ResearchSessionOptions): ResearchSession {
  const events = new ProgressChannel<ProgressEvent>(options.bufferSize);
  const emitter = new ProgressEmitter(events, options.logger);
  const driver = new SessionDriver({
    search: options.search,
    completion: options.completion,
    emitter,
    expander: new KeywordExpander({ limit: options.keywordLimit }),
    logger: options.logger,
    signal: options.signal,
    timeoutMs: options.timeoutMs,
    stopOnNoNewHits: options.stopOnNoNewHits,
  });

  return {
    sessionId: driver.sessionId,
    events,
    outcome: driver.run(request),
    cancel: (reason?: string) => driver.cancel(reason),
  };
}
