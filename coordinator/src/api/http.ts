import { randomUUID } from 'crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import type { APIResponse, Identity } from '../types';
import { UnauthenticatedError, ValidationError, isCoordinatorError } from '../utils/errors';
import { Logger } from '../utils/Logger';

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/** Forwards rejections to the error handler instead of leaving them unhandled. */
export function asyncHandler(route: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    route(req, res).catch(next);
  };
}

export function requestIdOf(req: Request): string {
  const header = req.headers['x-request-id'];
  return typeof header === 'string' && header.length > 0 ? header : randomUUID();
}

export function sendSuccess<T>(req: Request, res: Response, data: T, status = 200): void {
  const body: APIResponse<T> = {
    success: true,
    data,
    timestamp: new Date(),
    requestId: requestIdOf(req)
  };
  res.status(status).json(body);
}

export function sendFailure(req: Request, res: Response, status: number, error: string, code?: string): void {
  const body: APIResponse = {
    success: false,
    error,
    code,
    timestamp: new Date(),
    requestId: requestIdOf(req)
  };
  res.status(status).json(body);
}

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid request body: ${details}`);
  }
  return result.data;
}

export function parseVersion(raw: string): number {
  const version = Number(raw);
  if (!Number.isSafeInteger(version) || version < 1) {
    throw new ValidationError(`Invalid model version '${raw}'`);
  }
  return version;
}

/** Identity placed in `res.locals` by the auth middleware. */
export function identityOf(res: Response): Identity {
  const identity: unknown = res.locals.identity;
  if (typeof identity !== 'string' || identity.length === 0) {
    throw new UnauthenticatedError('Authenticated identity missing');
  }
  return identity;
}

export function createErrorHandler(logger: Logger) {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (isCoordinatorError(error)) {
      if (error.status >= 500) {
        logger.warn(`${req.method} ${req.path} failed: ${error.message}`, { code: error.code });
      }
      if (error.retryable) {
        res.set('Retry-After', '1');
      }
      sendFailure(req, res, error.status, error.message, error.code);
      return;
    }

    if (error instanceof SyntaxError) {
      sendFailure(req, res, 400, 'Malformed JSON body', 'VALIDATION_ERROR');
      return;
    }

    logger.error('Unhandled error:', error);
    sendFailure(req, res, 500, 'Internal server error');
  };
}
