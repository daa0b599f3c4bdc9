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
  repository: z.string().trim().min(1).default('AdsAppsMT'),
  query: z.string().trim().min(1).default('(ext:script)'),
  branch: z.string().trim().min(1).default('master'),
  max_results: z.number().int().min(1).max(1000).default(1000),
  stream_response: z.boolean().default(true),
  custom_prompt: z.string().nullish(),
}).strict();

const handler: RPCConfig = {
  type: 'sse',
  method: 'POST',
  path: '/api/search/scope',
  name: 'Scope search',
  description: 'Raw code search in one repository branch, analysed by the model',
  handler: async (req, { stream, logger }) => {
    const requestLogger = logger.child({ route: 'search/scope' });

    try {
      const query = parseRequest(querySchema, req.query);
      const body = parseRequest(bodySchema, req.body ?? {});
      const completion = ServiceRegistry.completion(query.api_provider);
      const { config, flows } = ServiceRegistry.get();
      const prepared = await flows.prepareScope({
        repository: body.repository,
        query: body.query,
        branch: body.branch,
        maxResults: body.max_results,
        customPrompt: body.custom_prompt,
      });

      if (!body.stream_response) {
        const content = await completion.complete({ messages: prepared.messages, temperature: query.temperature });
        return { body: { status: 'success', scope_knowledge: prepared.context, content } };
      }

      const answer = streamAnswer({
        completion,
        messages: prepared.messages,
        temperature: query.temperature,
        signal: stream.signal,
        logger: requestLogger,
        bufferSize: config.research.bufferSize,
        opening: async (emitter) => {
          await emitter.processing('Analyzing search results...');
          await emitter.emit('systemprompt', { content: prepared.context });
        },
      });
      await Promise.all([pipeProgress({ events: answer.events, stream, logger: requestLogger }), answer.finished]);
      return;
    }
    catch (error) {
      requestLogger.warn('scope search failed', { error: `${error}` });
      return errorResult(error);
    }
  },
};

export default handler;
