/**
 * Error taxonomy
 *
 * Structural errors (stack corruption, session misuse) abort whatever is
 * running. Data-shape errors (lookup failures, malformed type names) are
 * reported per function by the batch annotator.
 */

import type { ParseError } from './parser/index.js';

export abstract class SigmineError extends Error {
  abstract readonly errorType: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A return event that does not belong to the frame on top of the stack.
 */
export class StackCorruptionError extends SigmineError {
  readonly errorType = 'Stack Corruption';

  constructor(
    /** Function on top of the stack, or undefined when the stack was empty */
    readonly expected: string | undefined,
    /** Function that reported the return */
    readonly actual: string
  ) {
    super(
      expected === undefined
        ? `return from '${actual}' with an empty call stack`
        : `return from '${actual}' while '${expected}' is on top of the call stack`
    );
  }
}

export class LookupFailureError extends SigmineError {
  readonly errorType = 'Lookup Failure';

  constructor(
    readonly functionName: string,
    reason: string
  ) {
    super(`cannot resolve '${functionName}': ${reason}`);
  }
}

export class MalformedTypeError extends SigmineError {
  readonly errorType = 'Malformed Type';

  constructor(
    readonly typeName: string,
    reason: string
  ) {
    super(`malformed type name ${JSON.stringify(typeName)}: ${reason}`);
  }
}

export class SessionError extends SigmineError {
  readonly errorType = 'Session Error';
}

export class ProgramError extends SigmineError {
  readonly errorType = 'Program Error';

  constructor(
    message: string,
    readonly errors: readonly ParseError[] = []
  ) {
    super(message);
  }
}

/**
 * Errors that batch annotation records against one function and moves on
 */
export function isRecoverable(error: unknown): error is LookupFailureError | MalformedTypeError {
  return error instanceof LookupFailureError || error instanceof MalformedTypeError;
}
