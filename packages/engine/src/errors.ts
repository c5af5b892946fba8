/**
 * Error classes for engine operations
 */

/**
 * Base error class for engine errors
 */
export class EngineError extends Error {
  constructor(
    message: string,
    public readonly details?: string,
  ) {
    super(message);
    this.name = 'EngineError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineError);
    }
  }
}

/**
 * Error thrown when the engine binary cannot be started or does not
 * complete the UCI handshake
 */
export class EngineUnavailableError extends EngineError {
  constructor(
    public readonly enginePath: string,
    cause?: Error,
  ) {
    super(
      `Failed to start engine at '${enginePath}'${cause ? `: ${cause.message}` : ''}`,
      cause?.message,
    );
    this.name = 'EngineUnavailableError';
  }
}

/**
 * Error thrown when the engine process exits while a command is pending
 */
export class EngineTerminatedError extends EngineError {
  constructor(
    public readonly exitCode: number | null,
    public readonly signal: string | null,
    cause?: Error,
  ) {
    super(
      cause
        ? `Engine process failed: ${cause.message}`
        : `Engine process exited unexpectedly (${signal ? `signal ${signal}` : `code ${String(exitCode)}`})`,
      cause?.message,
    );
    this.name = 'EngineTerminatedError';
  }
}

/**
 * Error thrown when the engine does not answer in time
 */
export class EngineTimeoutError extends EngineError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`Engine operation '${operation}' timed out after ${timeoutMs}ms`);
    this.name = 'EngineTimeoutError';
  }
}

/**
 * Error thrown when engine output does not carry what the caller asked for
 */
export class EngineProtocolError extends EngineError {
  constructor(message: string, details?: string) {
    super(message, details);
    this.name = 'EngineProtocolError';
  }
}

/**
 * True when the engine itself is gone, as opposed to a problem with one query
 */
export function isFatalEngineError(error: unknown): boolean {
  return error instanceof EngineUnavailableError || error instanceof EngineTerminatedError;
}
