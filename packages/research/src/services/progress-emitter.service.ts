import type { Logger } from '@codescout/httpkit';

import type {
  ProgressEvent,
  ProgressEventKind,
  ProgressPayload,
  SessionOutcomeStatus,
} from '../types/research.types.js';

/** Where sequenced events are delivered. `ProgressChannel` is the usual sink. */
export interface ProgressSink {
  send(event: ProgressEvent): Promise<void>;
  close(): void;
}

export type ProgressData = Omit<ProgressPayload, 'done'>;

export interface TerminalOutcome {
  status: SessionOutcomeStatus;
  message?: string;
  content?: string;
  error?: string;
}

/**
 * Append-only, single-writer event stream for one session. Assigns sequence numbers,
 * delivers in order, and guarantees exactly one trailing `done` event.
 */
export class ProgressEmitter {
  private seq = 0;
  private terminated = false;
  private closed = false;

  constructor(
    private readonly sink: ProgressSink,
    private readonly logger?: Logger,
  ) {}

  get isTerminated(): boolean {
    return this.terminated;
  }

  get emitted(): number {
    return this.seq;
  }

  async emit(event: Exclude<ProgressEventKind, 'done'>, data: ProgressData = {}): Promise<void> {
    if (this.terminated) {
      this.logger?.debug('progress event after terminal marker dropped', { event });
      return;
    }

    await this.deliver(event, { ...data, done: false });
  }

  processing(message: string, data: Omit<ProgressData, 'message'> = {}): Promise<void> {
    return this.emit('processing', { ...data, message });
  }

  /** Emits the terminal `done` marker once and closes the sink; repeat calls are no-ops. */
  async done(outcome: TerminalOutcome): Promise<void> {
    if (this.terminated) {
      return;
    }

    this.terminated = true;

    try {
      await this.deliver('done', {
        status: outcome.status,
        ...(outcome.message !== undefined ? { message: outcome.message } : {}),
        ...(outcome.content !== undefined ? { content: outcome.content } : {}),
        ...(outcome.error !== undefined ? { error: outcome.error } : {}),
        done: true,
      });
    }
    finally {
      this.closeSink();
    }
  }

  /** Marks the stream terminal. A stream closed before `done` ends as cancelled. */
  async close(): Promise<void> {
    if (!this.terminated) {
      await this.done({ status: 'cancelled', message: 'Stream closed' });
    }
  }

  private closeSink(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.sink.close();
  }

  private async deliver(event: ProgressEventKind, data: ProgressPayload): Promise<void> {
    const seq = this.seq;
    this.seq += 1;
    await this.sink.send({ seq, event, data });
  }
}
