import type { NextFunction, Request, Response } from 'express';
import type { ZodTypeAny } from 'zod';
import type { Span } from '@opentelemetry/api';

import type { KVBase } from './kv.types.js';
import type { Logger } from './logger.types.js';

export type RPCTypes = 'api' | 'sse';
export type RPCMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
export type HttpkitRequest = Request & { _httpkit: { trace: { initiated: number; start: number } } };
export type RPCContext = { req: HttpkitRequest; res: Response };
export type RPCApiResult = { status?: number; body: object };
export type RPCResult = RPCApiResult;
type MaybePromise<T> = T | Promise<T>;

export type SSESendOptions = {
  event?: string;
  id?: string | number;
  retry?: number;
};

export interface RPCSSEStream<T = unknown> {
  /** Resolves once the frame is flushed to the socket buffer; waits for `drain` when it is full. */
  send: (payload: T, options?: SSESendOptions) => Promise<void>;
  error: (payload: unknown, options?: SSESendOptions) => void;
  /** Aborted when the client disconnects. */
  signal: AbortSignal;
  readonly closed: boolean;
}

type HandlerContextBase = {
  kv: KVBase;
  logger: Logger;
  span?: Span;
};

export type HandlerContext<T extends RPCTypes = RPCTypes> = HandlerContextBase & (T extends 'sse'
  ? { stream: RPCSSEStream }
  : { stream?: RPCSSEStream });

export type RPCFunction<T extends RPCTypes = RPCTypes> = (
  req: Request,
  ctx: HandlerContext<T>,
) => MaybePromise<RPCResult | void>;

export type RequestMiddleware = Request & {
  logger: Logger;
  kv: KVBase;
};

export type RequestHandlerMiddleware = (req: RequestMiddleware, res: Response, next: NextFunction) => void | Promise<void>;

type RPCConfigCommon<T extends RPCTypes> = {
  type: T;
  name?: string;
  description?: string;
  method: RPCMethod;
  path: string;
  middleware?: RequestHandlerMiddleware[];
  responseSchema?: ZodTypeAny | Record<number, ZodTypeAny>;
  /** Answer 500 when a response breaks `responseSchema` instead of only logging it. */
  strict?: boolean;
};

export type RPCConfigApi = RPCConfigCommon<'api'> & { handler: RPCFunction<'api'> };
export type RPCConfigSse = RPCConfigCommon<'sse'> & { handler: RPCFunction<'sse'> };
export type RPCConfig = RPCConfigApi | RPCConfigSse;
