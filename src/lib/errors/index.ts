/**
 * Error taxonomy surfaced to task callers.
 *
 * Codes follow the gRPC canonical names so results stay meaningful to
 * callers that front this agent with a gRPC or REST gateway.
 */

export enum ErrorCode {
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  NOT_FOUND = 'NOT_FOUND',
  UNIMPLEMENTED = 'UNIMPLEMENTED',
  INTERNAL = 'INTERNAL',
  DEADLINE_EXCEEDED = 'DEADLINE_EXCEEDED',
  UNAVAILABLE = 'UNAVAILABLE',
}

export interface ErrorMeta {
  /** Resource name involved */
  resource?: string;
  /** Request field that failed validation */
  field?: string;
  [key: string]: unknown;
}

export class ControllerError extends Error {
  public readonly code: ErrorCode;
  public readonly meta: ErrorMeta;

  constructor(message: string, code: ErrorCode, meta: ErrorMeta = {}, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'ControllerError';
    this.code = code;
    this.meta = meta;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  static invalidArgument(message: string, meta: ErrorMeta = {}): ControllerError {
    return new ControllerError(message, ErrorCode.INVALID_ARGUMENT, meta);
  }

  /**
   * Create for a missing registry entry or subsystem
   */
  static notFound(key: string, meta: ErrorMeta = {}): ControllerError {
    return new ControllerError(`unable to find key ${key}`, ErrorCode.NOT_FOUND, { resource: key, ...meta });
  }

  static unimplemented(method: string): ControllerError {
    return new ControllerError(`${method} method is not implemented`, ErrorCode.UNIMPLEMENTED);
  }

  /**
   * Create for state the agent itself holds inconsistently,
   * e.g. a namespace whose subsystem left the directory
   */
  static internal(message: string, meta: ErrorMeta = {}, cause?: unknown): ControllerError {
    return new ControllerError(message, ErrorCode.INTERNAL, meta, cause);
  }

  static deadlineExceeded(message: string, cause?: unknown): ControllerError {
    return new ControllerError(message, ErrorCode.DEADLINE_EXCEEDED, {}, cause);
  }

  static unavailable(message: string, cause?: unknown): ControllerError {
    return new ControllerError(message, ErrorCode.UNAVAILABLE, {}, cause);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      meta: this.meta,
    };
  }
}

export function isControllerError(err: unknown): err is ControllerError {
  return err instanceof ControllerError;
}

/**
 * Normalise anything thrown by a handler into a ControllerError.
 */
export function toControllerError(err: unknown): ControllerError {
  if (isControllerError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return ControllerError.internal(message, {}, err);
}
