import type { ZodError } from 'zod';

/** Field name to messages, in declaration order. */
export type ValidationErrors = Record<string, string[]>;

export interface ValidationOutcome {
  readonly valid: boolean;
  readonly errors: ValidationErrors;
}

/** Key used for errors about the payload as a whole. */
export const ROOT_FIELD = '$';

export function outcomeOf(errors: ValidationErrors): ValidationOutcome {
  return { valid: Object.keys(errors).length === 0, errors };
}

/**
 * Appends `source` into `target`, keeping first-seen field order.
 */
export function mergeErrors(target: ValidationErrors, source: ValidationErrors): ValidationErrors {
  for (const [field, messages] of Object.entries(source)) {
    const existing = target[field];
    if (existing) {
      existing.push(...messages);
    } else {
      target[field] = [...messages];
    }
  }
  return target;
}

/**
 * Binding failures reported the same way as rule failures.
 */
export function errorsFromZod(error: ZodError): ValidationErrors {
  const errors: ValidationErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : ROOT_FIELD;
    mergeErrors(errors, { [field]: [issue.message] });
  }
  return errors;
}
