/**
 * Authentication Middleware
 *
 * Static bearer token for the management routes. The webhook routes carry
 * their own HMAC signature check and do not pass through here.
 */

import { Request, Response, NextFunction } from 'express';
import * as crypto from 'crypto';

/**
 * Constant-time string comparison.
 */
export function safeEqual(a: string, b: string): boolean {
  const aBuf = Buffer.from(a);
  const bBuf = Buffer.from(b);
  if (aBuf.length !== bBuf.length) return false;
  return crypto.timingSafeEqual(aBuf, bBuf);
}

/**
 * With no token configured every request passes.
 */
export function authMiddleware(options: { token?: string } = {}) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const expected = options.token;
    if (!expected) {
      next();
      return;
    }

    const header = req.get('Authorization') ?? '';
    const match = /^Bearer\s+(.+)$/i.exec(header);
    if (!match?.[1] || !safeEqual(match[1], expected)) {
      res.status(401).json({ error: 'Unauthorized', message: 'Missing or invalid bearer token' });
      return;
    }
    next();
  };
}
