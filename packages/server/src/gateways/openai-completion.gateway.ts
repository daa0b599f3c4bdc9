import OpenAI, { AzureOpenAI } from 'openai';
import type { Logger } from '@codescout/httpkit';
import { CompletionError, describeError } from '@codescout/research';
import type {
  ChatMessage,
  CompletionGateway,
  CompletionRequest,
  CompletionResponseFormat,
} from '@codescout/research';

import type { CompletionProvider, ServerConfig } from '../config/server.config.js';

type MessageParam = OpenAI.Chat.ChatCompletionMessageParam;
type ResponseFormatParam = OpenAI.Chat.ChatCompletionCreateParams['response_format'];

const toMessageParam = (message: ChatMessage): MessageParam => {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
};

const toResponseFormat = (format?: CompletionResponseFormat): ResponseFormatParam => {
  if (!format) {
    return undefined;
  }

  switch (format.type) {
    case 'json_schema':
      return { type: 'json_schema', json_schema: { name: format.name, schema: format.schema, strict: true } };
    case 'json_object':
      return { type: 'json_object' };
    case 'text':
      return { type: 'text' };
  }
};

/** Chat completions through the official SDK; works for OpenAI and Azure OpenAI clients alike. */
export class OpenAICompletionGateway implements CompletionGateway {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly options: { maxTokens?: number; logger?: Logger; provider?: CompletionProvider } = {},
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    const { logger, provider } = this.options;
    logger?.debug('completion.request', { provider, model: this.model, messages: request.messages.length });

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: request.messages.map(toMessageParam),
        temperature: request.temperature,
        max_tokens: request.maxTokens ?? this.options.maxTokens,
        response_format: toResponseFormat(request.responseFormat),
      });
      const content = response.choices[0]?.message?.content;

      if (!content) {
        throw new Error('model returned no content');
      }

      return content;
    }
    catch (error) {
      logger?.error('completion.failed', { provider, error: describeError(error) });
      throw new CompletionError(`Completion request failed: ${describeError(error)}`, { cause: error });
    }
  }

  async *stream(request: CompletionRequest): AsyncIterable<string> {
    const { logger, provider } = this.options;
    logger?.debug('completion.stream', { provider, model: this.model, messages: request.messages.length });

    try {
      const stream = await this.client.chat.completions.create({
        model: this.model,
        messages: request.messages.map(toMessageParam),
        temperature: request.temperature,
        max_tokens: request.maxTokens ?? this.options.maxTokens,
        response_format: toResponseFormat(request.responseFormat),
        stream: true,
      });

      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;

        if (delta) {
          yield delta;
        }
      }
    }
    catch (error) {
      logger?.error('completion.stream.failed', { provider, error: describeError(error) });
      throw new CompletionError(`Completion stream failed: ${describeError(error)}`, { cause: error });
    }
  }
}

/** Builds a gateway for every provider the configuration has credentials for. */
export function createCompletionGateways(
  config: ServerConfig['completion'],
  logger?: Logger,
): Partial<Record<CompletionProvider, CompletionGateway>> {
  const gateways: Partial<Record<CompletionProvider, CompletionGateway>> = {};
  const { openai, azure, maxTokens } = config;

  if (openai.apiKey) {
    const client = new OpenAI({ apiKey: openai.apiKey, baseURL: openai.baseURL });
    gateways.OpenAI = new OpenAICompletionGateway(client, openai.model, {
      maxTokens,
      provider: 'OpenAI',
      logger: logger?.child({ provider: 'OpenAI' }),
    });
  }

  if (azure.endpoint && azure.apiKey && azure.deployment) {
    const client = new AzureOpenAI({
      endpoint: azure.endpoint,
      apiKey: azure.apiKey,
      apiVersion: azure.apiVersion,
      deployment: azure.deployment,
    });
    gateways['Azure OpenAI'] = new OpenAICompletionGateway(client, azure.deployment, {
      maxTokens,
      provider: 'Azure OpenAI',
      logger: logger?.child({ provider: 'Azure OpenAI' }),
    });
  }

  return gateways;
}
