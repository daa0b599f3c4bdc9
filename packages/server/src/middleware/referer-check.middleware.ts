import type { RequestHandler } from 'express';
import type { Logger } from '@codescout/httpkit';

export interface RefererCheckOptions {
  allowedOrigins: string[];
  /** Reject `/api/` requests that carry no Referer header. */
  strict: boolean;
  environment: string;
  logger?: Logger;
}

const refererHost = (referer: string): string | undefined => {
  try {
    return new URL(referer).hostname.toLowerCase();
  }
  catch {
    return undefined;
  }
};

/** Only lets `/api/` requests through when they come from one of the allowed UI hosts. */
export function createRefererCheck(options: RefererCheckOptions): RequestHandler {
  const allowed = new Set(options.allowedOrigins.map((origin) => origin.toLowerCase()));

  return (req, res, next) => {
    if (options.environment === 'development' || !req.path.startsWith('/api/')) {
      next();
      return;
    }

    const referer = req.get('referer');

    if (referer) {
      const host = refererHost(referer);

      if (host && allowed.has(host)) {
        next();
        return;
      }

      options.logger?.warn('request blocked, referer not allowed', { referer, path: req.path });
      res.status(403).json({ detail: 'Invalid request' });
      return;
    }

    if (options.strict) {
      options.logger?.warn('request blocked, missing referer', { path: req.path });
      res.status(403).json({ detail: 'Invalid request' });
      return;
    }

    next();
  };
}
