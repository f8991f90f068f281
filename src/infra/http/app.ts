import express, { Express } from 'express';
import type { Logger } from 'pino';
import type { UnitOfWorkFactory } from '../../application/persistence/unitOfWork.js';
import type { ValidatorRegistry } from '../../application/validation/registry.js';
import { errorHandler } from './middleware/errorHandler.js';
import { httpLogger } from './middleware/httpLogger.js';
import { apiRateLimiter } from './middleware/rateLimit.js';
import { unitOfWorkScope } from './middleware/unitOfWork.js';
import { createBenefitRoutes } from './routes/benefits.js';
import { createEmployeeRoutes } from './routes/employees.js';
import { createUserRoutes } from './routes/users.js';

export interface AppDependencies {
  unitOfWorkFactory: UnitOfWorkFactory;
  registry: ValidatorRegistry;
  jwtSecret: string;
  /** Resolves when storage answers; rejects otherwise. */
  healthCheck: () => Promise<void>;
  requestLogger?: Logger;
  rateLimit?: number;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  if (deps.requestLogger) {
    app.use(httpLogger(deps.requestLogger));
  }
  app.use(express.json());
  app.use(apiRateLimiter(deps.rateLimit));

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    withTimeout(deps.healthCheck(), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  app.use(unitOfWorkScope(deps.unitOfWorkFactory));

  app.use('/employees', createEmployeeRoutes(deps.registry));
  app.use('/benefits', createBenefitRoutes());
  app.use('/api/users', createUserRoutes(deps.registry, deps.jwtSecret));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
