import dotenv from 'dotenv';
import { z } from 'zod';
import type { ClockSettings } from '../domain/clock.js';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  JWT_SECRET: z.string({ required_error: 'JWT_SECRET environment variable is required' }).min(1),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CLOCK_MODE: z.enum(['system', 'fixed']).default('system'),
  CLOCK_FIXED_AT: z.string().min(1).optional(),
});

export interface AppConfig {
  port: number;
  databaseUrl?: string;
  jwtSecret: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  clock: ClockSettings;
}

/**
 * Reads configuration from `env`. Without an explicit env, `.env` is loaded
 * into `process.env` first.
 */
export function loadConfig(env?: NodeJS.ProcessEnv): AppConfig {
  if (!env) {
    dotenv.config();
  }
  const parsed = envSchema.safeParse(env ?? process.env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    jwtSecret: vars.JWT_SECRET,
    logLevel: vars.LOG_LEVEL,
    clock: { mode: vars.CLOCK_MODE, fixedAt: vars.CLOCK_FIXED_AT },
  };
}
