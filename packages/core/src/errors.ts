/**
 * Construction errors
 *
 * Every code here is a broken construction contract: the caller drove the
 * builder out of order. None of them is recoverable input.
 */

export type ConstructionErrorCode =
  | 'NO_MODEL_IN_PROGRESS'
  | 'FRAME_STACK_UNDERFLOW'
  | 'UNBALANCED_FRAMES'
  | 'INVALID_TRANSITION'
  | 'FRAME_CONSOLIDATED'
  | 'OCCURRENCE_ALREADY_PLACED'
  | 'BEAMLINE_RANGE'
  | 'INVALID_ARGUMENT';

export class ConstructionError extends Error {
  constructor(
    message: string,
    public readonly code: ConstructionErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConstructionError';
  }
}

/**
 * Assert a construction precondition, throwing a coded error when it fails
 */
export function invariant(
  condition: unknown,
  code: ConstructionErrorCode,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    throw new ConstructionError(message, code, context);
  }
}

export function isConstructionError(
  error: unknown,
  code?: ConstructionErrorCode
): error is ConstructionError {
  return error instanceof ConstructionError && (code === undefined || error.code === code);
}
