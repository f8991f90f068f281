/**
 * Source of the current instant.
 *
 * Exactly one implementation is chosen at startup and handed to whatever
 * needs the time (the audit interceptor today). Nothing reads `new Date()`
 * for audit purposes directly.
 */
export interface Clock {
  now(): Date;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

/**
 * Clock frozen at a single instant. Used by test harnesses and by
 * `CLOCK_MODE=fixed` so stamped timestamps are reproducible.
 */
export class FixedClock implements Clock {
  private readonly epochMs: number;

  constructor(instant: Date | string) {
    const date = typeof instant === 'string' ? new Date(instant) : instant;
    if (Number.isNaN(date.getTime())) {
      throw new Error(`Invalid fixed clock instant: ${String(instant)}`);
    }
    this.epochMs = date.getTime();
  }

  now(): Date {
    // Fresh instance each call so callers can't mutate the frozen value
    return new Date(this.epochMs);
  }
}

export type ClockMode = 'system' | 'fixed';

export interface ClockSettings {
  mode: ClockMode;
  fixedAt?: string;
}

export function createClock(settings: ClockSettings): Clock {
  if (settings.mode === 'fixed') {
    if (!settings.fixedAt) {
      throw new Error('CLOCK_FIXED_AT is required when CLOCK_MODE=fixed');
    }
    return new FixedClock(settings.fixedAt);
  }
  return new SystemClock();
}
