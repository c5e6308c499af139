/**
 * Error types
 *
 * Loss of precision is never an error: it is returned as the `error`, `any`
 * or `unknown` type. Errors thrown from here mean a caller broke an internal
 * invariant and must not be caught and absorbed by the analysis.
 */

export interface ErrorContext {
  [key: string]: unknown;
}

export class InvariantError extends Error {
  readonly code = 'ERR_INVARIANT';
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'InvariantError';
    this.context = context;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Fail on a value the type checker proved impossible
 */
export function unreachable(value: never, message: string): never {
  throw new InvariantError(message, { value });
}
