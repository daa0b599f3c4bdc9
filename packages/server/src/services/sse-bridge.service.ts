import type { Logger, RPCSSEStream } from '@codescout/httpkit';
import type { ProgressChannel, ProgressEvent } from '@codescout/research';

/**
 * Writes progress events as SSE frames (`id` = seq, `event` = kind) until the channel ends.
 * A client disconnect cancels the producer and detaches the channel so it never blocks.
 */
export async function pipeProgress(param: {
  events: ProgressChannel<ProgressEvent>;
  stream: RPCSSEStream;
  cancel?: (reason: string) => void;
  logger?: Logger;
}): Promise<number> {
  const { events, stream, cancel, logger } = param;
  let written = 0;

  const onAbort = () => {
    logger?.info('client disconnected, cancelling stream producer');
    cancel?.('client disconnected');
    events.detach();
  };

  if (stream.signal.aborted) {
    onAbort();
  }
  else {
    stream.signal.addEventListener('abort', onAbort, { once: true });
  }

  try {
    for await (const event of events) {
      if (stream.closed) {
        break;
      }

      await stream.send({ event: event.event, data: event.data }, { id: event.seq, event: event.event });
      written += 1;
    }
  }
  finally {
    stream.signal.removeEventListener('abort', onAbort);
  }

  return written;
}
