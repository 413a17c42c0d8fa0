import type { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { sendFailure } from '../api/http';

/**
 * Verifies the bearer token and exposes its subject as the caller identity
 * (`res.locals.identity`). The core trusts this identity as given.
 */
export const createAuthMiddleware = (secret: string): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token = req.headers.authorization?.replace('Bearer ', '');

    if (!token) {
      sendFailure(req, res, 401, 'Authentication token required', 'UNAUTHENTICATED');
      return;
    }

    try {
      const decoded = jwt.verify(token, secret);
      const identity = typeof decoded === 'string' ? undefined : decoded.sub;

      if (!identity) {
        sendFailure(req, res, 401, 'Token has no subject', 'UNAUTHENTICATED');
        return;
      }

      res.locals.identity = identity;
      next();
    } catch (error) {
      sendFailure(req, res, 401, 'Invalid authentication token', 'UNAUTHENTICATED');
    }
  };
};

export function issueToken(secret: string, identity: string, expiresIn: number = 3600): string {
  return jwt.sign({}, secret, { subject: identity, expiresIn });
}
