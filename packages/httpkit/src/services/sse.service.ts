import { once } from 'node:events';
import type { Response } from 'express';
import type { ZodTypeAny } from 'zod';

import type { Logger } from '../types/logger.types.js';
import type { RPCSSEStream, SSESendOptions } from '../types/rpc.types.js';

/**
 * Writes `text/event-stream` frames and tracks the client connection for one request.
 * Headers go out with the first frame, so a handler can still answer with JSON until then.
 */
export class SSEService {
  private streamClosed = false;
  private sseRoute = false;
  private readonly disconnect = new AbortController();

  constructor(
    private readonly res: Response,
    private readonly logger: Logger,
    private readonly schema?: ZodTypeAny,
  ) {}

  get isSseRoute(): boolean {
    return this.sseRoute;
  }

  get closed(): boolean {
    return this.streamClosed || this.res.writableEnded || this.res.destroyed;
  }

  get signal(): AbortSignal {
    return this.disconnect.signal;
  }

  /** Aborts `signal` if the client goes away before the response is finished. */
  watchDisconnect() {
    this.res.once('close', () => {
      if (!this.res.writableFinished) {
        this.disconnect.abort();
      }

      this.streamClosed = true;
    });
  }

  /** Opens the event stream; a no-op once open. */
  sendSSEHeaders() {
    if (this.sseRoute) {
      return;
    }

    this.res.statusCode = 200;
    this.res.setHeader('Content-Type', 'text/event-stream');
    this.res.setHeader('Cache-Control', 'no-cache, no-transform');
    this.res.setHeader('Connection', 'keep-alive');
    this.res.setHeader('X-Accel-Buffering', 'no');
    this.res.flushHeaders();
    this.sseRoute = true;
  }

  stream(): RPCSSEStream {
    const isClosed = () => this.closed;

    return {
      send: (payload, options) => this.emitSsePayload(payload, options),
      error: (payload, options) => this.emitSseError(payload, options),
      signal: this.signal,
      get closed() {
        return isClosed();
      },
    };
  }

  closeStream() {
    if (this.streamClosed) {
      return;
    }

    this.streamClosed = true;

    if (!this.res.writableEnded) {
      this.res.end();
    }
  }

  emitSseError(reason: unknown, options?: SSESendOptions) {
    if (this.closed) {
      return;
    }

    this.sendSSEHeaders();

    const message = reason instanceof Error ? reason.message : `${reason}`;
    const lines = this.buildSSELines(options ?? { event: 'error' });
    lines.push(`data: ${JSON.stringify({ error: message })}`);
    this.res.write(`${lines.join('\n')}\n\n`);
    this.closeStream();
  }

  async emitSsePayload(payload: unknown, options?: SSESendOptions): Promise<void> {
    if (this.closed) {
      return;
    }

    let value: string;

    try {
      const parsed: unknown = this.schema ? this.schema.parse(payload) : payload;
      value = typeof parsed === 'string' ? parsed : JSON.stringify(parsed);
    }
    catch (reason) {
      this.emitSseError(reason, options);
      throw new Error(`SSE payload validation failed: ${reason}`);
    }

    this.sendSSEHeaders();
    const lines = this.buildSSELines(options);
    value
      .split(/\r?\n/)
      .forEach((line) => lines.push(`data: ${line}`));

    if (!this.res.write(`${lines.join('\n')}\n\n`)) {
      await this.drain();
    }
  }

  private async drain(): Promise<void> {
    if (this.closed) {
      return;
    }

    try {
      await once(this.res, 'drain', { signal: this.signal });
    }
    catch (error) {
      this.logger.debug('SSE client left while waiting for drain', { error: `${error}` });
    }
  }

  private buildSSELines(options?: SSESendOptions) {
    const lines: string[] = [];

    if (options?.id !== undefined) {
      lines.push(`id: ${options.id}`);
    }

    lines.push(`event: ${options?.event || 'message'}`);

    if (typeof options?.retry === 'number') {
      lines.push(`retry: ${options.retry}`);
    }

    return lines;
  }
}
