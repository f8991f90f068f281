import type { Express } from 'express';
import jwt from 'jsonwebtoken';
import { UnitOfWorkFactory } from '../application/persistence/unitOfWork.js';
import type { ValidatorRegistry } from '../application/validation/registry.js';
import { createValidatorRegistry } from '../application/validators.js';
import { FixedClock } from '../domain/clock.js';
import { createApp } from '../infra/http/app.js';
import { MemoryDatabase } from './memoryDatabase.js';

export const TEST_JWT_SECRET = 'test-secret';
export const TEST_NOW = '2022-01-01T00:00:00.000Z';

export interface TestAppOptions {
  registry?: ValidatorRegistry;
  healthCheck?: () => Promise<void>;
}

/**
 * The real application over an in-memory database and a clock frozen at
 * {@link TEST_NOW}.
 */
export function createTestApp(options: TestAppOptions = {}): { app: Express; db: MemoryDatabase } {
  const db = new MemoryDatabase();
  const app = createApp({
    unitOfWorkFactory: new UnitOfWorkFactory({ openSession: db.openSession, clock: new FixedClock(TEST_NOW) }),
    registry: options.registry ?? createValidatorRegistry(),
    jwtSecret: TEST_JWT_SECRET,
    healthCheck: options.healthCheck ?? (() => Promise.resolve()),
    rateLimit: 1000,
  });
  return { app, db };
}

export function bearerToken(claims: object, secret = TEST_JWT_SECRET): string {
  return `Bearer ${jwt.sign(claims, secret, { expiresIn: '1h' })}`;
}
