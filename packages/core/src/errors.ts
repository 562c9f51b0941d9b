/**
 * @module errors
 * Error taxonomy for the replay editor.
 *
 * Every error carries a stable `code`. Errors raised while replaying a stack
 * are tagged with the index of the action that caused them.
 */

/** Stable error codes, one per error class. */
export const ERROR_CODES = Object.freeze({
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_SELECTION: 'INVALID_SELECTION',
  UNKNOWN_OPERATION: 'UNKNOWN_OPERATION',
  OUT_OF_RANGE: 'OUT_OF_RANGE',
  DECODE_ERROR: 'DECODE_ERROR',
  CACHE_BACKEND_ERROR: 'CACHE_BACKEND_ERROR',
  SESSION_NOT_FOUND: 'SESSION_NOT_FOUND',
} as const);

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Base class of every error the editor raises on purpose. */
export class ReplayError extends Error {
  readonly code: ErrorCode;
  /** Index of the offending action on the stack, once known. */
  actionIndex: number | null = null;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReplayError';
    this.code = code;
  }

  /** Record the offending action index unless one is already set. */
  atAction(index: number): this {
    if (this.actionIndex === null) {
      this.actionIndex = index;
    }
    return this;
  }
}

/** A malformed action or request. */
export class ValidationError extends ReplayError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.VALIDATION_ERROR) {
    super(code, message);
    this.name = 'ValidationError';
  }
}

/** A selection descriptor with missing or non-numeric fields. */
export class InvalidSelection extends ValidationError {
  constructor(message: string) {
    super(message, ERROR_CODES.INVALID_SELECTION);
    this.name = 'InvalidSelection';
  }
}

/** A filter or enhancement name the operation library does not know. */
export class UnknownOperation extends ReplayError {
  readonly operationName: string;

  constructor(operationName: string) {
    super(ERROR_CODES.UNKNOWN_OPERATION, `Unknown operation: '${operationName}'`);
    this.name = 'UnknownOperation';
    this.operationName = operationName;
  }
}

/** An index outside the valid range, e.g. truncating past the end of a stack. */
export class OutOfRange extends ReplayError {
  constructor(message: string) {
    super(ERROR_CODES.OUT_OF_RANGE, message);
    this.name = 'OutOfRange';
  }
}

/** Image bytes that could not be decoded. */
export class DecodeError extends ReplayError {
  constructor(message: string, cause?: unknown) {
    super(ERROR_CODES.DECODE_ERROR, message, { cause });
    this.name = 'DecodeError';
  }
}

/** Storage I/O failure in a cache backend. */
export class CacheBackendError extends ReplayError {
  readonly backend: string;

  constructor(backend: string, message: string, cause?: unknown) {
    super(ERROR_CODES.CACHE_BACKEND_ERROR, `[${backend}] ${message}`, { cause });
    this.name = 'CacheBackendError';
    this.backend = backend;
  }
}

/** A session id with no live session behind it. */
export class SessionNotFound extends ReplayError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(ERROR_CODES.SESSION_NOT_FOUND, `Session not found: '${sessionId}'`);
    this.name = 'SessionNotFound';
    this.sessionId = sessionId;
  }
}

/** Extract a message from anything thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
