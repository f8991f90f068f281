/**
 * Application-level errors for HTTP layer mapping.
 * These extend Error and are used for consistent error handling.
 */
export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnauthorizedError extends Error {
  constructor(message = 'Unauthorized') {
    super(message);
    this.name = 'UnauthorizedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A field rule could not finish (storage unreachable, bug in the rule).
 * Never reported as an invalid field.
 */
export class RuleEvaluationFaultError extends Error {
  constructor(
    public readonly payloadType: string,
    public readonly field: string,
    options?: { cause?: unknown }
  ) {
    super(`Rule for ${payloadType}.${field} could not be evaluated`, options);
    this.name = 'RuleEvaluationFaultError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Storage rejected a write on a uniqueness or foreign-key constraint.
 * Callers are expected to prevent these, so reaching one is a bug signal.
 */
export class ConstraintViolationError extends Error {
  constructor(
    public readonly constraint: string,
    message = `Constraint violated: ${constraint}`,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConstraintViolationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The write behind a commit failed; nothing from that commit was persisted.
 */
export class CommitFaultError extends Error {
  constructor(message = 'Commit failed', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CommitFaultError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The storage session was used after it was released, typically because the
 * request it belonged to already ended.
 */
export class SessionClosedError extends Error {
  constructor(message = 'Storage session is closed') {
    super(message);
    this.name = 'SessionClosedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
