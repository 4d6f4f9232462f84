import type { Request, Response, NextFunction, RequestHandler } from 'express';
import crypto from 'crypto';
import { UnauthorizedError } from '../errors';

export const API_KEY_HEADER = 'x-api-key';

const keysMatch = (provided: string, expected: string) => {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
};

/**
 * Guards mutating routes. With no key configured nothing gets through.
 */
export const requireApiKey = (apiKey: string | undefined): RequestHandler => (
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const provided = req.get(API_KEY_HEADER);

  if (!apiKey || !provided || !keysMatch(provided, apiKey)) {
    return next(new UnauthorizedError());
  }

  next();
};
