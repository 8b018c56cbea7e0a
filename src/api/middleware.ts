/**
 * API Middleware: identity extraction and error handling.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { DeploymentError, TypedError, apiError, createTypedError, validationError } from '../domain/errors';
import { logger } from '../logger';

/** Request with the caller's identity attached. */
export interface IdentifiedRequest extends Request {
  identityId?: string;
}

/**
 * Identity middleware. The caller names itself in `x-identity-id`;
 * authorization happens later, in the gate.
 */
export function identityMiddleware() {
  return (req: IdentifiedRequest, res: Response, next: NextFunction) => {
    const header = req.headers['x-identity-id'];
    const identityId = (Array.isArray(header) ? header[0] : header)?.trim();
    if (!identityId) {
      res.status(401).json(
        apiError(createTypedError({ code: 'AUTH.UNAUTHENTICATED', message: 'Missing x-identity-id header' })),
      );
      return;
    }
    req.identityId = identityId;
    next();
  };
}

/** The identity set by identityMiddleware. */
export function requireIdentity(req: IdentifiedRequest): string {
  if (!req.identityId) {
    throw new DeploymentError(createTypedError({ code: 'AUTH.UNAUTHENTICATED', message: 'Missing x-identity-id header' }));
  }
  return req.identityId;
}

/** Forward rejections of an async handler to the error handler. */
export function handle(fn: (req: IdentifiedRequest, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof DeploymentError) {
    const status = getHttpStatus(err.typedError);
    logger.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  if (err instanceof ZodError) {
    const typedError = validationError('Invalid request body', {
      issues: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
    res.status(getHttpStatus(typedError)).json(apiError(typedError));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  logger.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(500).json(apiError(createTypedError({ code: 'SYSTEM.INTERNAL', message })));
}

export function getHttpStatus(error: TypedError): number {
  switch (error.code) {
    case 'AUTH.UNAUTHENTICATED':
      return 401;
    case 'AUTH.TOKEN_UNKNOWN':
    case 'DEPLOY.NOT_RUNNING':
      return 404;
    case 'AUTH.TOKEN_CONSUMED':
    case 'DEPLOY.IN_PROGRESS':
      return 409;
    case 'AUTH.TOKEN_EXPIRED':
      return 410;
  }
  if (error.code.startsWith('AUTH.')) return 403;
  if (error.code.startsWith('VALIDATION.')) return 422;
  return 500;
}
