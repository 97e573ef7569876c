import { timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { UnauthorizedError } from '../utils/errors';

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * Bearer token guard for the admin API. Without a configured key every
 * request passes.
 */
export function requireApiKey(apiKey: string | undefined): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!apiKey) {
      next();
      return;
    }

    const header = req.header('authorization') ?? '';
    const [scheme, token] = header.split(' ');
    if (scheme !== 'Bearer' || !token || !safeEqual(token, apiKey)) {
      next(new UnauthorizedError('Missing or invalid API key'));
      return;
    }
    next();
  };
}
