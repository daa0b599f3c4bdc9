import type { RPCConfig } from '@codescout/httpkit';
import { DEFAULT_TEMPERATURE, RequestValidationError, startResearch } from '@codescout/research';
import type { ChatMessage } from '@codescout/research';
import * as z from 'zod';

import { ServiceRegistry } from '../services/registry.js';
import { streamAnswer } from '../services/answer-stream.service.js';
import { pipeProgress } from '../services/sse-bridge.service.js';
import { splitList, temperatureParam } from '../utils/query.utils.js';
import { errorResult, parseRequest } from '../utils/request.utils.js';

const querySchema = z.object({
  repositories: z.string().optional().transform(splitList),
  is_deep_research: z
    .string()
    .optional()
    .transform((value) => (value ?? '').trim().toLowerCase() === 'true'),
  temperature: temperatureParam(DEFAULT_TEMPERATURE),
  api_provider: z.string().optional(),
});

const bodySchema = z.object({
  messages: z.array(z.object({
    role: z.enum(['user', 'assistant', 'system']),
    content: z.string(),
  })).min(1, 'Message is required in request body'),
  stream_response: z.boolean().default(true),
}).strict();

const lastUserQuestion = (messages: ChatMessage[]): { question: string; history: ChatMessage[] } => {
  const index = messages.map((message) => message.role).lastIndexOf('user');
  const question = messages[index]?.content.trim();

  if (index < 0 || !question) {
    throw new RequestValidationError('The conversation must end with a user question');
  }

  return { question, history: messages.slice(0, index) };
};

const handler: RPCConfig = {
  type: 'sse',
  method: 'POST',
  path: '/api/chat',
  name: 'Chat',
  description: 'Chat over the conversation, or run multi-round deep research across repositories',
  handler: async (req, { stream, logger }) => {
    const requestLogger = logger.child({ route: 'chat' });

    try {
      const query = parseRequest(querySchema, req.query);
      const body = parseRequest(bodySchema, req.body);
      const completion = ServiceRegistry.completion(query.api_provider);
      const { config, search } = ServiceRegistry.get();

      if (!query.is_deep_research) {
        if (!body.stream_response) {
          const content = await completion.complete({ messages: body.messages, temperature: query.temperature });
          return { body: { status: 'success', content } };
        }

        const answer = streamAnswer({
          completion,
          messages: body.messages,
          temperature: query.temperature,
          signal: stream.signal,
          logger: requestLogger,
          bufferSize: config.research.bufferSize,
          opening: (emitter) => emitter.emit('prompt', { message: 'Generating response...' }),
        });
        await Promise.all([pipeProgress({ events: answer.events, stream, logger: requestLogger }), answer.finished]);
        return;
      }

      if (query.repositories.length === 0) {
        throw new RequestValidationError('At least one repository is required for deep research');
      }

      const { question, history } = lastUserQuestion(body.messages);
      const session = startResearch({
        query: question,
        repositories: query.repositories,
        history,
        temperature: query.temperature,
        maxRounds: config.research.maxRounds,
      }, {
        search,
        completion,
        logger: requestLogger,
        signal: stream.signal,
        bufferSize: config.research.bufferSize,
        keywordLimit: config.research.keywordLimit,
        timeoutMs: config.research.timeoutMs,
        stopOnNoNewHits: config.research.stopOnNoNewHits,
      });
      requestLogger.info('deep research started', { sessionId: session.sessionId, repositories: query.repositories });

      if (!body.stream_response) {
        for await (const _event of session.events) {
          // drained; only the outcome is answered
        }

        const outcome = await session.outcome;
        const status = outcome.status === 'success' ? 200 : outcome.status === 'cancelled' ? 499 : 502;
        return {
          status,
          body: {
            status: outcome.status === 'success' ? 'success' : 'error',
            content: outcome.answer,
            error: outcome.error,
            rounds: outcome.rounds.length,
            queries: outcome.issuedQueries,
          },
        };
      }

      const [, outcome] = await Promise.all([
        pipeProgress({ events: session.events, stream, cancel: session.cancel, logger: requestLogger }),
        session.outcome,
      ]);
      requestLogger.info('deep research finished', { sessionId: session.sessionId, status: outcome.status, rounds: outcome.rounds.length });
      return;
    }
    catch (error) {
      requestLogger.warn('chat request failed', { error: `${error}` });
      return errorResult(error);
    }
  },
};

export default handler;
