import type { ReadStore } from '../persistence/store.js';

/**
 * What a rule may consult besides the payload: the route parameters of the
 * current request and a read-only view of the request's storage session.
 * Passed explicitly to every validator.
 */
export interface ValidationContext {
  readonly routeParams: Readonly<Record<string, string>>;
  readonly store: ReadStore;
  readonly signal: AbortSignal;
}

/**
 * Integer route parameter, or null when absent or malformed. Rules treat
 * null as "nothing to compare against" and pass.
 */
export function intRouteParam(ctx: ValidationContext, name: string): number | null {
  const raw = ctx.routeParams[name];
  if (raw === undefined || !/^\d+$/.test(raw)) {
    return null;
  }
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : null;
}

export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === '';
}
