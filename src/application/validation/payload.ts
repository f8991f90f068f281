import type { ZodType, ZodTypeDef } from 'zod';

/**
 * A request payload type: a stable identifier plus the schema that binds the
 * raw request source (JSON body, query string) into a typed payload.
 *
 * Binding only checks shape and scalar types. Business rules belong to the
 * validator registered for the payload's id.
 */
export interface PayloadType<T extends object> {
  readonly id: string;
  readonly schema: ZodType<T, ZodTypeDef, unknown>;
}

export type PayloadTypeRef = string | { readonly id: string };

export function definePayload<T extends object>(
  id: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): PayloadType<T> {
  return { id, schema };
}

export function payloadTypeId(ref: PayloadTypeRef): string {
  return typeof ref === 'string' ? ref : ref.id;
}
