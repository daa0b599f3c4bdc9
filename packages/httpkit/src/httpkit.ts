import express, { type ErrorRequestHandler, type RequestHandler } from 'express';
import http from 'node:http';
import { pathToFileURL } from 'node:url';
import { globSync } from 'glob';
import helmet from 'helmet';
import cors from 'cors';

import type { HttpkitConfig, HttpkitStartConfig, KVBase, Logger, RPCConfig } from './types/index.js';
import { ConfigService } from './services/config.service.js';
import { RouteService } from './services/route.service.js';
import { installProcessHandlers } from './helpers/process-handlers.js';

const HANDLER_GLOB = '**/*.handler.{ts,js}';

const isRPCConfig = (value: unknown): value is RPCConfig => {
  return !!value
    && typeof value === 'object'
    && 'type' in value
    && 'method' in value
    && 'path' in value
    && 'handler' in value
    && typeof value.handler === 'function';
};

type Runtime = {
  app: express.Express;
  logger: Logger;
  kv: KVBase;
  config: HttpkitConfig;
};

export namespace httpkit {
  let runtime: Runtime | null = null;
  let server: http.Server | null = null;
  let processHandlersAdded = false;

  const ensureInitialized = (): Runtime => {
    if (!runtime) {
      throw new Error('httpkit.init() must be called before invoking this function.');
    }

    return runtime;
  };

  export function init(param: { config: HttpkitConfig; logger: Logger; kv: KVBase }): void {
    const { config, logger, kv } = param;

    if (config.rootDir) {
      ConfigService.setRootDir(config.rootDir);
    }

    if (config.loadEnv !== false) {
      ConfigService.loadEnv(config.envFiles);
    }

    if (config.processHandlers) {
      addProcessHandlers(logger);
    }

    RouteService.start();
    const app = express();

    if (config.servername) {
      app.set('x-powered-by', config.servername);
    }
    else {
      app.disable('x-powered-by');
    }

    if (config.cors) {
      app.use(cors(config.cors === true ? undefined : config.cors));
    }

    if (config.helmet) {
      app.use(helmet(config.helmet));
    }

    app.use(express.json(config.json));
    runtime = { app, logger, kv, config };
  }

  export function app(): express.Express {
    return ensureInitialized().app;
  }

  export function use(...handlers: Array<RequestHandler | ErrorRequestHandler>): void {
    ensureInitialized().app.use(...handlers);
  }

  export function addHandlers(handlers: RPCConfig | RPCConfig[]) {
    const { app, logger, kv } = ensureInitialized();
    const entries = Array.isArray(handlers) ? handlers : [handlers];

    for (const handler of entries) {
      logger.debug('route registered', { name: handler.name ?? `${handler.method} ${handler.path}`, type: handler.type });
      app.use(RouteService.addHandler(handler, logger, kv));
    }
  }

  async function registerHandler(file: string) {
    const module: unknown = await import(pathToFileURL(file).href);
    const route = module && typeof module === 'object' && 'default' in module ? module.default : undefined;

    if (!isRPCConfig(route)) {
      throw new Error(`(HANDLER) Missing configuration export: ${file}`);
    }

    addHandlers(route);
  }

  export async function loadHandlers(handlerDir: string) {
    const files = globSync(HANDLER_GLOB, { cwd: handlerDir, absolute: true, ignore: ['**/*.d.ts', '**/*.test.*'] }).sort();

    // sequential so registration order follows file order
    for (const file of files) {
      await registerHandler(file);
    }
  }

  export async function load(param: { handlerDir?: string | string[] }) {
    const dirs = param.handlerDir === undefined ? [] : [param.handlerDir].flat();

    for (const dir of dirs) {
      await loadHandlers(dir);
    }
  }

  export function createServer(port = 3000): Promise<{ server: http.Server; port: number }> {
    const { app, config } = ensureInitialized();
    const listenPort = config.port ?? port;
    const hostname = config.hostname ?? '0.0.0.0';

    return new Promise((resolve, reject) => {
      const created = http.createServer(app);
      created.once('error', reject);
      created.once('listening', () => {
        const address = created.address();
        resolve({ server: created, port: address && typeof address === 'object' ? address.port : listenPort });
      });
      server = created;
      created.listen(listenPort, hostname);
    });
  }

  export async function start(param: HttpkitStartConfig = {}) {
    const { app, logger } = ensureInitialized();
    await load(param);
    const onError: ErrorRequestHandler = (error: unknown, req, res, _next) => {
      const status = RouteService.statusOf(error);
      logger.warn(`request failed before reaching a handler: ${req.method} ${req.path}`, { status, error: `${error}` });

      if (!res.headersSent) {
        res.status(status).json({ error: error instanceof Error ? error.message : `${error}` });
      }
    };

    app.use((_req, res) => {
      res.status(404).json({ error: 'Not found' });
    });
    app.use(onError);

    return createServer(param.port);
  }

  export async function stop(): Promise<void> {
    RouteService.close();
    const closing = server;
    server = null;
    runtime = null;

    if (!closing) {
      return;
    }

    closing.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      closing.close((error) => (error ? reject(error) : resolve()));
    });
  }

  function addProcessHandlers(logger: Logger) {
    if (processHandlersAdded) {
      return;
    }

    processHandlersAdded = true;
    installProcessHandlers({ logger, stop });
  }
}
