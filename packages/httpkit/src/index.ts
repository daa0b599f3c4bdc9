import type { Request as expressRequest } from 'express';

export type Request = expressRequest;

export * from './httpkit.js';
export * from './types/index.js';
export * from './services/config.service.js';
export { HttpError, RouteService } from './services/route.service.js';
export { SimpleLogger, createSimpleLogger, isLogLevel } from './helpers/simple-logger.service.js';
export type { SimpleLoggerOptions } from './helpers/simple-logger.service.js';
export { MemoryKVService, createMemoryKv } from './helpers/memory-kv.service.js';
export { installProcessHandlers } from './helpers/process-handlers.js';
export type { ProcessHandlerOptions, ProcessLike } from './helpers/process-handlers.js';
