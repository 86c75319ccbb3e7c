import { Request, Response, NextFunction, RequestHandler } from 'express';
import { timingSafeEqual } from 'crypto';
import { AuthenticationError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger('AuthMiddleware');

export interface AuthOptions {
  token: string;
  requireAuth: boolean;
}

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Bearer token authentication: `Authorization: Bearer <token>`
 */
export const authenticate = (options: AuthOptions): RequestHandler => {
  return (req: Request, _res: Response, next: NextFunction) => {
    // Skip auth if disabled
    if (!options.requireAuth) {
      return next();
    }

    const header = req.headers.authorization ?? '';
    const match = /^Bearer\s+(.+)$/i.exec(header);
    if (match && tokensMatch(match[1].trim(), options.token)) {
      return next();
    }

    logger.warn({ method: req.method, path: req.path, hasToken: Boolean(match) }, 'AuthMiddleware: Invalid or missing bearer token');
    return next(new AuthenticationError('Unauthorized: invalid or missing bearer token'));
  };
};
