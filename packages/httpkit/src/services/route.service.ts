import express, { NextFunction, Request, Response } from 'express';
import { Subject } from 'rxjs';
import { performance } from 'node:perf_hooks';
import { SpanStatusCode, metrics, trace } from '@opentelemetry/api';
import type { Counter, Histogram, Span } from '@opentelemetry/api';
import { ZodType } from 'zod';
import type { ZodTypeAny } from 'zod';

import type {
  HandlerContext,
  HttpkitRequest,
  RPCConfig,
  RPCContext,
  RPCResult,
  RequestHandlerMiddleware,
  RequestMiddleware,
} from '../types/rpc.types.js';
import type { Logger } from '../types/logger.types.js';
import type { KVBase } from '../types/kv.types.js';
import { SSEService } from './sse.service.js';

/** Thrown by handlers to answer with a specific status. Any error with a numeric `status` is treated the same way. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

const SCOPE = 'httpkit';

export namespace RouteService {
  const pubs$: Record<string, Subject<RPCContext>> = {};
  let requestCounter: Counter | undefined;
  let requestDuration: Histogram | undefined;

  export const statusOf = (error: unknown): number => {
    if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
      return error.status >= 400 && error.status <= 599 ? error.status : 500;
    }

    return 500;
  };

  const errorBody = (error: unknown): Record<string, unknown> => {
    const body: Record<string, unknown> = { error: error instanceof Error ? error.message : `${error}` };

    if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
      body.code = error.code;
    }

    if (error instanceof HttpError && error.details) {
      Object.assign(body, error.details);
    }

    return body;
  };

  const resolveResponseSchema = (route: RPCConfig, status: number): ZodTypeAny | undefined => {
    const { responseSchema } = route;

    if (!responseSchema) {
      return undefined;
    }

    if (responseSchema instanceof ZodType) {
      return responseSchema;
    }

    return responseSchema[status];
  };

  function recordMetrics(statusCode: number, startTime: number, attributes: Record<string, string | number>) {
    attributes.status = String(statusCode);
    requestCounter?.add(1, attributes);
    requestDuration?.record(performance.now() - startTime, attributes);
  }

  export function start() {
    const meter = metrics.getMeter(SCOPE);
    requestCounter = meter.createCounter('httpkit_server_requests_total', {
      description: 'Total HTTP requests handled by httpkit routes',
      unit: '1',
    });
    requestDuration = meter.createHistogram('httpkit_server_request_duration_ms', {
      description: 'Processing time for httpkit handlers',
      unit: 'ms',
    });
  }

  async function runHandler(param: { req: HttpkitRequest; res: Response; route: RPCConfig; logger: Logger; kv: KVBase; span: Span }) {
    const { req, res, route, logger, kv, span } = param;
    const attributes: Record<string, string | number> = {
      method: route.method,
      type: route.type,
      path: route.path.toLowerCase(),
    };
    // sse routes validate each frame; a JSON answer given before the stream opens is not checked
    const sseSchema = route.type === 'sse' ? resolveResponseSchema(route, 200) : undefined;
    const sseService = new SSEService(res, logger, sseSchema);
    let result: RPCResult | void = undefined;

    try {
      switch (route.type) {
        case 'sse': {
          sseService.watchDisconnect();
          const ctx: HandlerContext<'sse'> = { kv, logger, span, stream: sseService.stream() };
          result = await route.handler(req, ctx);
          break;
        }

        case 'api':
          result = await route.handler(req, { kv, logger, span });
          break;
      }

      if (sseService.isSseRoute || res.headersSent) {
        return;
      }

      if (!result) {
        if (route.type === 'sse') {
          // nothing was streamed; still answer as an (empty) event stream
          sseService.sendSSEHeaders();
          return;
        }

        throw new Error('RPC handler returned no result');
      }

      const status = result.status ?? 200;
      const schema = route.type === 'sse' ? undefined : resolveResponseSchema(route, status);
      const checked = schema?.safeParse(result.body);

      if (checked && !checked.success) {
        logger.warn(`Invalid response for ${route.method} ${route.path}`, { issues: checked.error.issues.length });

        if (route.strict) {
          res.status(500).json({ error: 'Invalid API response' });
          return;
        }
      }

      res.status(status).json(result.body);
    }
    catch (reason) {
      const status = statusOf(reason);

      if (status >= 500) {
        logger.error(`Handler failed for ${route.method} ${route.path}`, { error: `${reason}` });
        span.recordException(reason instanceof Error ? reason : new Error(`${reason}`));
      }

      if (sseService.isSseRoute) {
        sseService.emitSseError(reason);
      }
      else if (!res.headersSent) {
        res.status(status).json(errorBody(reason));
      }
    }
    finally {
      if (sseService.isSseRoute) {
        sseService.closeStream();
      }

      recordMetrics(res.statusCode, req._httpkit.trace.start, attributes);
    }
  }

  export function addHandler(route: RPCConfig, logger: Logger, kv: KVBase): express.Router {
    const middlewareWrapper = (middleware: RequestHandlerMiddleware) => {
      return async (req: Request, res: Response, next: NextFunction) => {
        const middleReq: RequestMiddleware = Object.assign(req, { logger, kv });

        try {
          await middleware(middleReq, res, next);
        }
        catch (err) {
          next(err);
        }
      };
    };

    const router = express.Router();
    const signature = `${route.method}::${route.path}`.toLowerCase();
    const pub$ = new Subject<RPCContext>();
    pubs$[signature]?.complete();
    pubs$[signature] = pub$;

    const dispatch = (req: Request, res: Response) => {
      const now = performance.now();
      const httpkitReq: HttpkitRequest = Object.assign(req, { _httpkit: { trace: { initiated: now, start: now } } });
      pub$.next({ req: httpkitReq, res });
    };
    const middleware = (route.middleware ?? []).map((m) => middlewareWrapper(m));

    switch (route.method) {
      case 'GET':
        router.get(route.path, ...middleware, dispatch);
        break;
      case 'POST':
        router.post(route.path, ...middleware, dispatch);
        break;
      case 'PUT':
        router.put(route.path, ...middleware, dispatch);
        break;
      case 'PATCH':
        router.patch(route.path, ...middleware, dispatch);
        break;
      case 'DELETE':
        router.delete(route.path, ...middleware, dispatch);
        break;
    }

    pub$.subscribe({
      next: ({ req, res }) => {
        req._httpkit.trace.start = performance.now();
        const tracer = trace.getTracer(SCOPE);

        tracer.startActiveSpan(`${req.method} ${route.path}`, (span: Span) => {
          span.setAttributes({
            'http.request.method': req.method,
            'url.path': req.path,
            'http.route': route.path,
            'user_agent.original': req.headers['user-agent'] || undefined,
          });

          const onFinish = () => {
            res.removeListener('finish', onFinish);
            res.removeListener('close', onFinish);
            span.setAttribute('http.response.status_code', res.statusCode);
            span.setStatus(res.statusCode >= 500
              ? { code: SpanStatusCode.ERROR, message: `HTTP ${res.statusCode}` }
              : { code: SpanStatusCode.OK });
            span.end();
          };

          res.once('finish', onFinish);
          res.once('close', onFinish);

          runHandler({ req, res, route, logger, kv, span }).catch((error: unknown) => {
            logger.error(`Unhandled failure in ${route.method} ${route.path}`, { error: `${error}` });
          });
        });
      },
    });

    return router;
  }

  export const close = () => {
    Object.values(pubs$).forEach((pub) => pub.complete());
  };
}
