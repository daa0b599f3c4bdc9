import { join } from 'node:path';
import { ConfigService, httpkit } from '@codescout/httpkit';
import type { KVBase, Logger } from '@codescout/httpkit';

import type { ServerConfig } from './config/server.config.js';
import { RepositoryConfigs } from './config/repository.config.js';
import { DevOpsSearchGateway } from './gateways/devops-search.gateway.js';
import { createCompletionGateways } from './gateways/openai-completion.gateway.js';
import { ContentCache } from './services/content-cache.service.js';
import { KvNoteRepository, NoteService } from './services/note.service.js';
import { SearchFlowService } from './services/search-flow.service.js';
import { ServiceRegistry } from './services/registry.js';
import type { ServerServices } from './services/registry.js';
import { createRefererCheck } from './middleware/referer-check.middleware.js';

const DEFAULT_REPOSITORY_FILE = 'packages/server/config/repositories.json';

/** Wires the production gateways from configuration. Throws when a required credential is missing. */
export function createServices(config: ServerConfig, logger: Logger, kv: KVBase): ServerServices {
  const repositories = RepositoryConfigs.fromFile(config.repositoryConfigFile ?? ConfigService.resolveFromRootDir(DEFAULT_REPOSITORY_FILE));
  const search = new DevOpsSearchGateway({
    organization: config.devops.organization ?? '',
    project: config.devops.project ?? '',
    pat: config.devops.pat ?? '',
    repositories,
    cache: new ContentCache(kv, config.devops.cacheTtlSeconds),
    maxAttempts: config.devops.maxRetries,
    logger: logger.child({ gateway: 'devops' }),
  });
  const completions = createCompletionGateways(config.completion, logger);
  const fallback = completions[config.completion.provider];

  if (!fallback) {
    throw new Error(`Completion provider "${config.completion.provider}" is selected but has no credentials configured`);
  }

  logger.info('services configured', {
    repositories: repositories.names().length,
    providers: Object.keys(completions),
  });

  return {
    config,
    search,
    completions,
    notes: new NoteService(new KvNoteRepository(kv), fallback, logger.child({ service: 'notes' })),
    flows: new SearchFlowService(search, logger.child({ service: 'search' })),
    devops: { organization: search.organization, project: search.project },
  };
}

export async function startServer(param: {
  config: ServerConfig;
  services: ServerServices;
  logger: Logger;
  kv: KVBase;
  port?: number;
  processHandlers?: boolean;
}) {
  const { config, services, logger, kv } = param;
  ServiceRegistry.configure(services);

  httpkit.init({
    config: {
      port: param.port ?? config.port,
      hostname: config.hostname,
      loadEnv: false,
      processHandlers: param.processHandlers ?? false,
      cors: true,
      helmet: { contentSecurityPolicy: false },
      json: { limit: '5mb' },
    },
    logger,
    kv,
  });

  httpkit.use(createRefererCheck({
    allowedOrigins: config.referer.allowedOrigins,
    strict: config.referer.strict,
    environment: config.environment,
    logger,
  }));

  return httpkit.start({ handlerDir: join(ConfigService.getDirname(import.meta.url), 'api') });
}

export async function stopServer(): Promise<void> {
  await httpkit.stop();
  ServiceRegistry.reset();
}
