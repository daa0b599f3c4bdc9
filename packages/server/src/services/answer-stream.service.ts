import type { Logger } from '@codescout/httpkit';
import { CancelledByClientError, ProgressChannel, ProgressEmitter, describeError } from '@codescout/research';
import type { ChatMessage, CompletionGateway, ProgressEvent } from '@codescout/research';

export interface AnswerStream {
  events: ProgressChannel<ProgressEvent>;
  /** Settles after the terminal `done` event has been handed to the channel. Never rejects. */
  finished: Promise<void>;
}

/**
 * Streams one completion as `message` events, after whatever `opening` emits first
 * (the `prompt` or `systemprompt` event of a search flow).
 */
export function streamAnswer(param: {
  completion: CompletionGateway;
  messages: ChatMessage[];
  temperature: number;
  opening?: (emitter: ProgressEmitter) => Promise<void>;
  signal?: AbortSignal;
  logger?: Logger;
  bufferSize?: number;
}): AnswerStream {
  const { completion, messages, temperature, opening, signal, logger } = param;
  const events = new ProgressChannel<ProgressEvent>(param.bufferSize);
  const emitter = new ProgressEmitter(events, logger);

  const run = async () => {
    try {
      await opening?.(emitter);
      let length = 0;

      for await (const chunk of completion.stream({ messages, temperature })) {
        if (signal?.aborted) {
          throw new CancelledByClientError();
        }

        length += chunk.length;
        await emitter.emit('message', { content: chunk });
      }

      logger?.debug('answer streamed', { length });
      await emitter.done({ status: 'success', message: 'Response complete' });
    }
    catch (error) {
      if (error instanceof CancelledByClientError || signal?.aborted) {
        logger?.info('answer stream cancelled');
        await emitter.done({ status: 'cancelled', message: new CancelledByClientError().message });
        return;
      }

      logger?.error('answer stream failed', { error: describeError(error) });
      await emitter.done({ status: 'error', error: `Response generation failed: ${describeError(error)}` });
    }
  };

  return { events, finished: run() };
}
