import { PayloadTypeRef, payloadTypeId } from './payload.js';
import type { PayloadValidator } from './validator.js';

/**
 * Payload type id → validator, built once at startup from an explicit list.
 */
export class ValidatorRegistry {
  private readonly byType = new Map<string, PayloadValidator>();

  private constructor(validators: readonly PayloadValidator[]) {
    for (const validator of validators) {
      if (this.byType.has(validator.payloadType)) {
        throw new Error(`Duplicate validator registered for ${validator.payloadType}`);
      }
      this.byType.set(validator.payloadType, validator);
    }
  }

  static fromValidators(validators: readonly PayloadValidator[]): ValidatorRegistry {
    return new ValidatorRegistry(validators);
  }

  /**
   * The validator for a payload type, or undefined when the type needs no
   * validation.
   */
  resolve(type: PayloadTypeRef): PayloadValidator | undefined {
    return this.byType.get(payloadTypeId(type));
  }

  has(type: PayloadTypeRef): boolean {
    return this.byType.has(payloadTypeId(type));
  }

  get size(): number {
    return this.byType.size;
  }
}
