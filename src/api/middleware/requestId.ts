/**
 * Request Correlation ID Middleware
 *
 * Reuses an incoming X-Request-ID header or generates one, echoes it on the
 * response and logs the request line with its outcome at DEBUG.
 */

import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { getLogger } from '../../logging/index.js';

const REQUEST_ID_HEADER = 'X-Request-ID';
const logger = getLogger('api');

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export function requestIdMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.get(REQUEST_ID_HEADER);
    // Reuse client-provided ID if it looks safe (alphanumeric + hyphens, max 64 chars)
    const requestId = incoming && /^[\w-]{1,64}$/.test(incoming) ? incoming : randomUUID();

    req.requestId = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const started = Date.now();
    res.on('finish', () => {
      logger.debug(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`, { requestId });
    });
    next();
  };
}
