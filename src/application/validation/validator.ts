import type { ZodTypeAny } from 'zod';
import { RuleEvaluationFaultError } from '../errors.js';
import type { ValidationContext } from './context.js';
import { ValidationErrors, ValidationOutcome, outcomeOf } from './outcome.js';
import type { PayloadType } from './payload.js';

export type FieldName<T> = keyof T & string;

/** One rule attached to one field. The schema may use async refinements. */
export interface FieldRule<T> {
  readonly field: FieldName<T>;
  readonly schema: ZodTypeAny;
}

export type RuleFactory<T> = (field: FieldName<T>, schema: ZodTypeAny) => FieldRule<T>;

/**
 * Declares a validator's rules. Called once per validation so rules can
 * close over the context (route parameters, storage reads).
 */
export type RuleBuilder<T> = (rule: RuleFactory<T>, ctx: ValidationContext) => FieldRule<T>[];

/** Type-erased validator as held by the registry. */
export interface PayloadValidator {
  readonly payloadType: string;
  validate(payload: object, ctx: ValidationContext): Promise<ValidationOutcome>;
}

/**
 * Validator bound to one payload type.
 *
 * Rules on the same field run one after another in declaration order and
 * all of their messages are kept. Different fields are evaluated
 * concurrently; the resulting map still lists fields in declaration order.
 */
export class Validator<T extends object> implements PayloadValidator {
  readonly payloadType: string;

  constructor(
    type: PayloadType<T>,
    private readonly buildRules: RuleBuilder<T>
  ) {
    this.payloadType = type.id;
  }

  async validate(payload: T, ctx: ValidationContext): Promise<ValidationOutcome> {
    ctx.signal.throwIfAborted();

    const rules = this.buildRules((field, schema) => ({ field, schema }), ctx);
    const byField = new Map<FieldName<T>, ZodTypeAny[]>();
    for (const { field, schema } of rules) {
      const schemas = byField.get(field);
      if (schemas) {
        schemas.push(schema);
      } else {
        byField.set(field, [schema]);
      }
    }

    const results = await Promise.all(
      [...byField].map(([field, schemas]) => this.runField(field, payload[field], schemas, ctx.signal))
    );

    const errors: ValidationErrors = {};
    for (const [field, messages] of results) {
      if (messages.length > 0) {
        errors[field] = messages;
      }
    }
    return outcomeOf(errors);
  }

  private async runField(
    field: FieldName<T>,
    value: unknown,
    schemas: ZodTypeAny[],
    signal: AbortSignal
  ): Promise<[string, string[]]> {
    const messages: string[] = [];

    for (const schema of schemas) {
      signal.throwIfAborted();
      const result = await schema.safeParseAsync(value).catch((error: unknown) => {
        signal.throwIfAborted();
        throw new RuleEvaluationFaultError(this.payloadType, field, { cause: error });
      });
      signal.throwIfAborted();

      if (!result.success) {
        messages.push(...result.error.issues.map((issue) => issue.message));
      }
    }

    return [field, messages];
  }
}
