/**
 * Error hierarchy for the chunk quality gate
 */

export class ChunkFilterError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Caller-contract violation: invalid constructor arguments or options.
 */
export class PreconditionError extends ChunkFilterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PRECONDITION', context);
  }
}

/**
 * Cooperative cancellation observed at a batch boundary.
 */
export class CancelledError extends ChunkFilterError {
  constructor(message: string = 'Operation was cancelled', context?: Record<string, unknown>) {
    super(message, 'CANCELLED', context);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
