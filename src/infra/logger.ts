import { pino } from 'pino';
import type { Logger } from 'pino';

/**
 * Root application logger. Level comes from LOG_LEVEL so tests can run
 * with `silent`; main re-levels it from the parsed config.
 */
export const logger: Logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: { service: 'employee-records-api' },
});
