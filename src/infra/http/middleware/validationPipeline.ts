import type { NextFunction, Response } from 'express';
import type { ValidationContext } from '../../../application/validation/context.js';
import {
  ValidationErrors,
  errorsFromZod,
  mergeErrors,
} from '../../../application/validation/outcome.js';
import type { PayloadType } from '../../../application/validation/payload.js';
import type { ValidatorRegistry } from '../../../application/validation/registry.js';
import { logger } from '../../logger.js';
import { asyncHandler } from './asyncHandler.js';
import { ScopedRequest, requireUnitOfWork } from './unitOfWork.js';

export interface RequestBindings {
  body?: PayloadType<object>;
  query?: PayloadType<object>;
}

export const VALIDATION_FAILED_MESSAGE = 'One or more validation errors occurred.';

/**
 * Runs before a handler: binds each configured request source to its payload
 * type and runs the validator registered for it, if any.
 *
 * Any field error ends the request with 400 and every message collected; the
 * handler is not called. Rule faults propagate to the error handler. A
 * request whose client went away during validation is dropped without a
 * response.
 *
 * `req.body` and `req.query` are left as received.
 */
export function validateRequest(registry: ValidatorRegistry, bindings: RequestBindings) {
  return asyncHandler(async (req: ScopedRequest, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    const abortIfGone = (): void => {
      if (!res.writableFinished) {
        controller.abort();
      }
    };
    res.on('close', abortIfGone);

    const ctx: ValidationContext = {
      routeParams: req.params,
      store: requireUnitOfWork(req).reader,
      signal: controller.signal,
    };

    const errors: ValidationErrors = {};
    try {
      if (bindings.body) {
        await validateSource(registry, bindings.body, req.body, ctx, errors);
      }
      if (bindings.query) {
        await validateSource(registry, bindings.query, req.query, ctx, errors);
      }
    } catch (error) {
      if (controller.signal.aborted) {
        logger.debug({ path: req.path }, 'Client disconnected during validation');
        return;
      }
      throw error;
    } finally {
      res.off('close', abortIfGone);
    }

    if (Object.keys(errors).length > 0) {
      logger.debug({ path: req.path, errors }, 'Request failed validation');
      res.status(400).json({ code: 'VALIDATION_ERROR', message: VALIDATION_FAILED_MESSAGE, errors });
      return;
    }

    next();
  });
}

async function validateSource(
  registry: ValidatorRegistry,
  type: PayloadType<object>,
  raw: unknown,
  ctx: ValidationContext,
  errors: ValidationErrors
): Promise<void> {
  const bound = await type.schema.safeParseAsync(raw);
  if (!bound.success) {
    mergeErrors(errors, errorsFromZod(bound.error));
    return;
  }

  const validator = registry.resolve(type);
  if (!validator) {
    return;
  }

  const outcome = await validator.validate(bound.data, ctx);
  mergeErrors(errors, outcome.errors);
}
