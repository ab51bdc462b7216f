import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { assertNever } from '../../domain-types';
import { isWorkflowError, WorkflowErrorKind } from '../../domain/workflow-error';
import { ApiErrorBody } from '../types';
import { ApiError } from './auth';

export function statusForKind(kind: WorkflowErrorKind): number {
  switch (kind) {
    case 'VALIDATION':
    case 'INVALID_DECISION':
      return 400;
    case 'FORBIDDEN':
      return 403;
    case 'NOT_FOUND':
      return 404;
    case 'INVALID_STATUS':
      return 409;
    case 'NOT_ELIGIBLE':
      return 422;
    default:
      return assertNever(kind);
  }
}

function sendError(res: Response, status: number, error: ApiErrorBody['error']) {
  const body: ApiErrorBody = { error };
  res.status(status).json(body);
}

// Express recognises error middleware by arity, so `next` stays in the signature.
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  const error = err instanceof Error ? err : new Error(String(err));

  // Log error for debugging
  console.error('[API Error]', {
    correlationId: req.correlationId,
    path: req.path,
    method: req.method,
    error: error.message,
    stack: process.env.NODE_ENV === 'development' ? error.stack : undefined,
  });

  if (res.headersSent) {
    next(err);
    return;
  }

  // Handle known API errors
  if (err instanceof ApiError) {
    sendError(res, err.statusCode, {
      code: err.code,
      message: err.message,
      details: err.details,
      correlationId: req.correlationId,
    });
    return;
  }

  if (err instanceof ZodError) {
    sendError(res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      details: { issues: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })) },
      correlationId: req.correlationId,
    });
    return;
  }

  // Workflow errors map by kind
  if (isWorkflowError(err)) {
    sendError(res, statusForKind(err.kind), {
      code: err.code,
      message: err.message,
      details: err.details,
      correlationId: req.correlationId,
    });
    return;
  }

  // Malformed JSON from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    sendError(res, 400, {
      code: 'INVALID_JSON',
      message: 'Request body is not valid JSON',
      correlationId: req.correlationId,
    });
    return;
  }

  // Never leak internal errors to client
  sendError(res, 500, {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    correlationId: req.correlationId,
  });
}

export function notFoundHandler(req: Request, res: Response) {
  sendError(res, 404, {
    code: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
    correlationId: req.correlationId,
  });
}
