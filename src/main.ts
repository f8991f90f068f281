import { UnitOfWorkFactory } from './application/persistence/unitOfWork.js';
import { createValidatorRegistry } from './application/validators.js';
import { createClock } from './domain/clock.js';
import { loadConfig } from './infra/config.js';
import { pgSessionOpener } from './infra/db/pgSession.js';
import { createPool } from './infra/db/pool.js';
import { createApp } from './infra/http/app.js';
import { logger } from './infra/logger.js';

const config = loadConfig();
logger.level = config.logLevel;

const pool = createPool(config.databaseUrl);
const clock = createClock(config.clock);
const registry = createValidatorRegistry();

const app = createApp({
  unitOfWorkFactory: new UnitOfWorkFactory({ openSession: pgSessionOpener(pool), clock }),
  registry,
  jwtSecret: config.jwtSecret,
  healthCheck: async () => {
    await pool.query('SELECT 1');
  },
  requestLogger: logger,
});

const server = app.listen(config.port, () => {
  logger.info({ port: config.port, clock: config.clock.mode, validators: registry.size }, 'Server listening');
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, 'Shutting down');
  server.close(() => {
    pool.end().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Failed to close database pool');
        process.exit(1);
      }
    );
  });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
