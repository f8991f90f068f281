import type { NextFunction, Response } from 'express';
import type { UnitOfWork, UnitOfWorkFactory } from '../../../application/persistence/unitOfWork.js';
import { logger } from '../../logger.js';
import type { AuthRequest } from './auth.js';

export interface ScopedRequest extends AuthRequest {
  uow?: UnitOfWork;
}

/**
 * Gives each request its own unit of work and releases its storage session
 * once the response is done (or the connection drops).
 */
export function unitOfWorkScope(factory: UnitOfWorkFactory) {
  return (req: ScopedRequest, res: Response, next: NextFunction): void => {
    const uow = factory.begin();
    req.uow = uow;

    let released = false;
    const release = (): void => {
      if (released) {
        return;
      }
      released = true;
      uow.release().catch((err: unknown) => {
        logger.warn({ err }, 'Failed to release storage session');
      });
    };
    res.on('finish', release);
    res.on('close', release);

    next();
  };
}

export function requireUnitOfWork(req: ScopedRequest): UnitOfWork {
  if (!req.uow) {
    throw new Error('unitOfWorkScope is not mounted for this route');
  }
  return req.uow;
}
