import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  CommitFaultError,
  ConstraintViolationError,
  NotFoundError,
  RuleEvaluationFaultError,
  SessionClosedError,
  UnauthorizedError,
} from '../../../application/errors.js';
import { logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

function send(res: Response, status: number, body: ErrorResponse): void {
  res.status(status).json(body);
}

function isJsonParseError(err: Error): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (isJsonParseError(err)) {
    logger.debug({ path: req.path }, 'Malformed JSON body');
    send(res, 400, { code: 'INVALID_JSON', message: 'Request body is not valid JSON' });
    return;
  }

  if (err instanceof ZodError) {
    logger.debug({ path: req.path, issues: err.issues }, 'Request binding failed');
    send(res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    });
    return;
  }

  if (err instanceof UnauthorizedError) {
    send(res, 401, { code: 'UNAUTHORIZED', message: err.message });
    return;
  }

  if (err instanceof NotFoundError) {
    logger.debug({ path: req.path }, err.message);
    send(res, 404, { code: 'NOT_FOUND', message: err.message });
    return;
  }

  // The session is only released once the response is done or the client left
  if (err instanceof SessionClosedError) {
    logger.debug({ path: req.path }, 'Request ended before its handler finished');
    return;
  }

  logger.error({ err, path: req.path }, 'Request failed');

  if (err instanceof RuleEvaluationFaultError) {
    send(res, 500, { code: 'RULE_EVALUATION_FAULT', message: err.message });
    return;
  }

  if (err instanceof ConstraintViolationError) {
    send(res, 500, { code: 'CONSTRAINT_VIOLATION', message: err.message });
    return;
  }

  if (err instanceof CommitFaultError) {
    send(res, 500, { code: 'COMMIT_FAULT', message: err.message });
    return;
  }

  send(res, 500, { code: 'INTERNAL_ERROR', message: 'Internal server error' });
}
