import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import {
  CommitFaultError,
  ConstraintViolationError,
  NotFoundError,
  RuleEvaluationFaultError,
  UnauthorizedError,
} from '../../../application/errors.js';
import { errorHandler } from '../middleware/errorHandler.js';

function appThrowing(error: Error) {
  const app = express();
  app.get('/boom', () => {
    throw error;
  });
  app.use(errorHandler);
  return app;
}

describe('errorHandler', () => {
  it.each([
    [new NotFoundError('Employee not found'), 404, { code: 'NOT_FOUND', message: 'Employee not found' }],
    [new UnauthorizedError(), 401, { code: 'UNAUTHORIZED', message: 'Unauthorized' }],
    [
      new RuleEvaluationFaultError('UpdateEmployeeRequest', 'address1'),
      500,
      { code: 'RULE_EVALUATION_FAULT', message: 'Rule for UpdateEmployeeRequest.address1 could not be evaluated' },
    ],
    [
      new ConstraintViolationError('employee_benefits_employee_id_benefit_id_key'),
      500,
      { code: 'CONSTRAINT_VIOLATION', message: 'Constraint violated: employee_benefits_employee_id_benefit_id_key' },
    ],
    [new CommitFaultError(), 500, { code: 'COMMIT_FAULT', message: 'Commit failed' }],
    [new Error('secret internals'), 500, { code: 'INTERNAL_ERROR', message: 'Internal server error' }],
  ])('should map %s', async (error, status, body) => {
    const response = await request(appThrowing(error)).get('/boom');

    expect(response.status).toBe(status);
    expect(response.body).toEqual(body);
  });

  it('should map errors passed to next by middleware', async () => {
    const app = express();
    app.use((_req, _res, next) => next(new UnauthorizedError('Invalid or expired token')));
    app.get('/secret', (_req, res) => {
      res.json({ ok: true });
    });
    app.use(errorHandler);

    const response = await request(app).get('/secret');

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ code: 'UNAUTHORIZED', message: 'Invalid or expired token' });
  });
});
