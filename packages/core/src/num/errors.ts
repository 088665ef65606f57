/**
 * Numeric error types
 *
 * Typed errors for numeric failures. Conversion failures are the only
 * error raised by vector construction; the vector operations themselves
 * never throw.
 */

/**
 * Base class for numeric errors
 */
export abstract class NumericError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * A source value cannot be represented in the target element kind
 */
export class NumericCastError extends NumericError {
  constructor(
    readonly kind: string,
    readonly value: number | bigint
  ) {
    super(`Cannot represent ${String(value)} as ${kind}`);
  }
}

/**
 * No element kind is registered under the requested name
 */
export class UnknownKindError extends NumericError {
  constructor(readonly kindName: string) {
    super(`Unknown scalar kind: ${kindName}`);
  }
}

/**
 * Two vectors over different element kinds met in one operation
 */
export class KindMismatchError extends NumericError {
  constructor(
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Expected a ${expected} vector, got ${actual}`);
  }
}

/**
 * Tolerance overrides failed validation
 */
export class InvalidToleranceError extends NumericError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
  }
}
