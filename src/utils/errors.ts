/**
 * Base application error
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, isOperational = true) {
    super(message);
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Reading input, config files or log files failed
 */
export class IoError extends AppError {
  public readonly detail: string;

  constructor(detail: string) {
    super(`I/O error: ${detail}`, 'IO_ERROR');
    this.detail = detail;
  }
}

/**
 * A module or the runtime cannot be built from the given parameters
 */
export class InvalidConfigurationError extends AppError {
  public readonly detail: string;
  public readonly details: unknown;

  constructor(detail: string, details?: unknown) {
    super(`Invalid configuration: ${detail}`, 'INVALID_CONFIGURATION');
    this.detail = detail;
    this.details = details;
  }
}

/**
 * A key or input string is not valid hexadecimal
 */
export class HexDecodeError extends AppError {
  public readonly detail: string;

  constructor(detail: string) {
    super(`Hex decode error: ${detail}`, 'HEX_DECODE');
    this.detail = detail;
  }
}

/**
 * Decoded input or chain output is larger than the configured bound
 */
export class MaxSizeExceededError extends AppError {
  public readonly limit: number;
  public readonly actual: number;

  constructor(limit: number, actual: number) {
    super(`Stream too large: max ${limit} bytes, got ${actual}`, 'MAX_SIZE_EXCEEDED');
    this.limit = limit;
    this.actual = actual;
  }
}

/**
 * Queue or stream transport failure
 */
export class TransportError extends AppError {
  public readonly detail: string;
  public readonly originalError?: Error;

  constructor(detail: string, originalError?: Error) {
    super(`Transport error: ${detail}`, 'TRANSPORT_ERROR');
    this.detail = detail;
    this.originalError = originalError;
  }
}

/**
 * Module-specific transform failure (e.g. invalid Base64 on decode)
 */
export class ModuleError extends AppError {
  public readonly module: string;
  public readonly detail: string;

  constructor(module: string, detail: string) {
    super(`Module processing error: ${detail}`, 'MODULE_ERROR');
    this.module = module;
    this.detail = detail;
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
