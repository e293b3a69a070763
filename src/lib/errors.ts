/**
 * Custom error classes.
 * Only SessionNotFoundError is expected to reach callers during play; the rest
 * signal configuration problems or programming errors.
 */

// Base error class
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'AppError'
  }
}

// Unknown session id
export class SessionNotFoundError extends AppError {
  constructor(
    public readonly sessionId: string,
    cause?: Error
  ) {
    super(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND', cause)
    this.name = 'SessionNotFoundError'
  }
}

// Session state failed a consistency check; the mutation is discarded
export class InvariantViolationError extends AppError {
  constructor(
    public readonly sessionId: string,
    message: string,
    cause?: Error
  ) {
    super(message, 'INVARIANT_VIOLATION', cause)
    this.name = 'InvariantViolationError'
  }
}

// Text generation failed or produced nothing usable
export class GenerationError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, 'GENERATION_ERROR', cause)
    this.name = 'GenerationError'
  }
}

export class GenerationTimeoutError extends GenerationError {
  constructor(public readonly timeoutMs: number) {
    super(`LLM request timed out after ${timeoutMs}ms`)
    this.name = 'GenerationTimeoutError'
  }
}

// Data or config file could not be read or validated
export class ConfigLoadError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_LOAD_ERROR', cause)
    this.name = 'ConfigLoadError'
  }
}
