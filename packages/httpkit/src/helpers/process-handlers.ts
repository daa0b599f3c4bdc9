import type { Logger } from '../types/index.js';

export type ProcessLike = {
  on(event: string, listener: (...args: unknown[]) => void): unknown;
};

export type ProcessHandlerOptions = {
  logger: Logger;
  stop: () => Promise<void>;
  exit?: (code: number) => void;
  target?: ProcessLike;
};

/**
 * SIGTERM and SIGINT stop the server gracefully. An uncaught exception or unhandled
 * rejection stops it too, then exits non-zero.
 */
export function installProcessHandlers(options: ProcessHandlerOptions): void {
  const { logger, stop } = options;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const target = options.target ?? process;

  const shutdown = (signal: string) => {
    logger.info(`received ${signal}, shutting down`);
    stop().catch((error: unknown) => {
      logger.error('error during shutdown', { error: `${error}` });
    });
  };

  const fatal = (kind: string, reason: unknown) => {
    logger.error(kind, { reason: reason instanceof Error ? reason.stack ?? reason.message : `${reason}` });
    stop()
      .catch((error: unknown) => {
        logger.error('error during shutdown', { error: `${error}` });
      })
      .finally(() => exit(1));
  };

  target.on('SIGTERM', () => shutdown('SIGTERM'));
  target.on('SIGINT', () => shutdown('SIGINT'));
  target.on('uncaughtException', (error) => fatal('uncaught exception', error));
  target.on('unhandledRejection', (reason) => fatal('unhandled rejection', reason));
}
