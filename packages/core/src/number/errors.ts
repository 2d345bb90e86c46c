/**
 * Errors raised by numeric operations
 */

/**
 * Error thrown when a value is divided by zero
 */
export class DivisionByZeroError extends Error {
  constructor(public readonly dividend?: string) {
    super(dividend === undefined ? 'Division by zero' : `Division by zero: cannot divide ${dividend}`);
    this.name = 'DivisionByZeroError';
  }
}
