import { ConfigService, createMemoryKv, createSimpleLogger } from '@codescout/httpkit';
import type { Logger } from '@codescout/httpkit';

import { loadServerConfig } from './config/server.config.js';
import { createConsoleLogListener, createFileLogListener } from './logging/log.listeners.js';
import { createServices, startServer, stopServer } from './app.js';

let logger: Logger = createSimpleLogger({ meta: { service: 'codescout' } });

async function bootstrap() {
  ConfigService.loadEnv();
  const config = loadServerConfig();
  logger = createSimpleLogger({ level: config.logLevel, meta: { service: 'codescout' }, console: false });
  logger.addListener(createConsoleLogListener());

  if (config.logFile) {
    logger.addListener(createFileLogListener(config.logFile));
  }

  const kv = createMemoryKv('codescout', config.persistKv);
  const services = createServices(config, logger, kv);
  const { port } = await startServer({ config, services, logger, kv, processHandlers: true });
  logger.info(`codescout server running on http://${config.hostname}:${port}`, { environment: config.environment });
}

bootstrap().catch(async (error: unknown) => {
  logger.error('Fatal error starting codescout server', { error: `${error}` });
  await stopServer();
  process.exit(1);
});
