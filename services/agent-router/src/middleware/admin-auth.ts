import { timingSafeEqual } from 'node:crypto';
import { Request, Response, NextFunction } from 'express';
import { UnauthorizedError } from '../monitoring/errors.js';
import { ExpressMiddleware } from '../types/index.js';

const ADMIN_KEY_HEADER = 'x-admin-key';

function keysMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Require the shared admin key when one is configured; pass everything through otherwise.
 */
export function requireAdminKey(adminApiKey?: string): ExpressMiddleware {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!adminApiKey) {
      next();
      return;
    }

    const provided = req.get(ADMIN_KEY_HEADER);
    if (!provided || !keysMatch(adminApiKey, provided)) {
      next(new UnauthorizedError());
      return;
    }

    next();
  };
}
