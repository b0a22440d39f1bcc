/**
 * Error taxonomy of the command bridge. `errorType` is the name reported in
 * failure envelopes.
 */
export abstract class CommandBridgeError extends Error {
  abstract readonly errorType: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends CommandBridgeError {
  readonly errorType = 'ValidationError';

  constructor(
    message: string,
    public readonly details: readonly string[] = [],
  ) {
    super(message);
  }
}

export class UnsupportedOperationError extends CommandBridgeError {
  readonly errorType = 'UnsupportedOperationError';

  constructor(
    message: string,
    public readonly supportedOperations: readonly string[] = [],
  ) {
    super(message);
  }
}

export class TargetNotFoundError extends CommandBridgeError {
  readonly errorType = 'TargetNotFoundError';

  constructor(
    message: string,
    public readonly identifier?: string,
  ) {
    super(message);
  }
}

/** Absorbed by the coercion engine; never surfaces as an envelope on its own */
export class ConversionError extends CommandBridgeError {
  readonly errorType = 'ConversionError';
}

export class HandlerExecutionError extends CommandBridgeError {
  readonly errorType = 'HandlerExecutionError';
}

/**
 * Maps anything thrown into the taxonomy. Foreign errors become
 * `HandlerExecutionError` with the original as `cause`.
 */
export function toCommandBridgeError(error: unknown): CommandBridgeError {
  if (error instanceof CommandBridgeError) {
    return error;
  }
  return new HandlerExecutionError(describeError(error), { cause: error });
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
