import { RequestValidationError } from '@codescout/research';
import type { CompletionGateway, SearchGateway } from '@codescout/research';

import type { CompletionProvider, ServerConfig } from '../config/server.config.js';
import type { NoteService } from './note.service.js';
import type { SearchFlowService } from './search-flow.service.js';

export interface ServerServices {
  config: ServerConfig;
  search: SearchGateway;
  completions: Partial<Record<CompletionProvider, CompletionGateway>>;
  notes: NoteService;
  flows: SearchFlowService;
  /** Shown by the health endpoint. */
  devops: { organization?: string; project?: string };
}

const isProvider = (value: string): value is CompletionProvider => value === 'OpenAI' || value === 'Azure OpenAI';

/** Services shared by the route handlers, wired once at startup. */
export namespace ServiceRegistry {
  let current: ServerServices | null = null;

  export function configure(services: ServerServices): void {
    current = services;
  }

  export function reset(): void {
    current = null;
  }

  export function get(): ServerServices {
    if (!current) {
      throw new Error('ServiceRegistry.configure() must be called before handling requests.');
    }

    return current;
  }

  /** The requested provider, else the configured default. */
  export function completion(provider?: string): CompletionGateway {
    const { config, completions } = get();
    const name = provider?.trim() || config.completion.provider;

    if (!isProvider(name)) {
      throw new RequestValidationError(`Unknown api_provider "${name}", expected "OpenAI" or "Azure OpenAI"`);
    }

    const gateway = completions[name];

    if (!gateway) {
      throw new RequestValidationError(`Completion provider "${name}" is not configured`);
    }

    return gateway;
  }
}
