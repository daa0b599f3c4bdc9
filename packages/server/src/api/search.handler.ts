import type { RPCConfig } from '@codescout/httpkit';
import { DEFAULT_TEMPERATURE } from '@codescout/research';
import * as z from 'zod';

import { ServiceRegistry } from '../services/registry.js';
import { streamAnswer } from '../services/answer-stream.service.js';
import { pipeProgress } from '../services/sse-bridge.service.js';
import { temperatureParam } from '../utils/query.utils.js';
import { errorResult, parseRequest } from '../utils/request.utils.js';

const querySchema = z.object({
  api_provider: z.string().optional(),
  temperature: temperatureParam(DEFAULT_TEMPERATURE),
});

const bodySchema = z.object({
  sources: z.array(z.object({
    query: z.string().trim().min(1),
    repositories: z.array(z.string().trim().min(1)).min(1),
  })).min(1),
  stream_response: z.boolean().default(true),
  custom_prompt: z.string().nullish(),
}).strict();

const handler: RPCConfig = {
  type: 'sse',
  method: 'POST',
  path: '/api/search',
  name: 'Search',
  description: 'Search repositories once and answer over the matching code',
  handler: async (req, { stream, logger }) => {
    const requestLogger = logger.child({ route: 'search' });

    try {
      const query = parseRequest(querySchema, req.query);
      const body = parseRequest(bodySchema, req.body);
      const completion = ServiceRegistry.completion(query.api_provider);
      const { config, flows } = ServiceRegistry.get();
      const prepared = await flows.prepareSearch(body.sources, body.custom_prompt);

      if (!body.stream_response) {
        const content = await completion.complete({ messages: prepared.messages, temperature: query.temperature });
        return { body: { status: 'success', codes: prepared.context, content } };
      }

      const answer = streamAnswer({
        completion,
        messages: prepared.messages,
        temperature: query.temperature,
        signal: stream.signal,
        logger: requestLogger,
        bufferSize: config.research.bufferSize,
        opening: (emitter) => emitter.emit('prompt', { message: 'Generating response...', content: prepared.context }),
      });
      await Promise.all([pipeProgress({ events: answer.events, stream, logger: requestLogger }), answer.finished]);
      return;
    }
    catch (error) {
      requestLogger.warn('search request failed', { error: `${error}` });
      return errorResult(error);
    }
  },
};

export default handler;
