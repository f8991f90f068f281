import { z } from 'zod';

/**
 * Reusable field rules. Each returns a zod schema meant to be attached to a
 * field with `rule(field, schema)`; optional ones pass on null/undefined.
 */

/** Present, a string, and not just whitespace. One message for all cases. */
export function requiredText(message: string) {
  return z
    .string({ required_error: message, invalid_type_error: message })
    .refine((value) => value.trim() !== '', message);
}

export function maxLength(max: number, message: string) {
  return z.string().max(max, message).nullish();
}

export function absoluteUrlOrEmpty(message: string) {
  return z
    .string()
    .refine((value) => value === '' || URL.canParse(value), message)
    .nullish();
}

export function intRange(bounds: { min?: [number, string]; max?: [number, string] }) {
  let schema = z.number();
  if (bounds.min) {
    schema = schema.min(bounds.min[0], bounds.min[1]);
  }
  if (bounds.max) {
    schema = schema.max(bounds.max[0], bounds.max[1]);
  }
  return schema.nullish();
}

export function nonNegativeValues(message: string) {
  return z
    .record(z.number())
    .refine((values) => Object.values(values).every((value) => value >= 0), message)
    .nullish();
}
