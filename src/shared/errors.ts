/**
 * Structured error type for the I/O and validation edges of the app.
 *
 * Graph queries never throw; they return result variants. Loading files,
 * reading settings and validating request parameters throw EnsembleError.
 */

export enum ErrorCode {
  // File System
  FS_NOT_FOUND = 'FS_NOT_FOUND',
  FS_READ_ERROR = 'FS_READ_ERROR',
  FS_WRITE_ERROR = 'FS_WRITE_ERROR',

  // Data
  DATA_MISSING_COLUMN = 'DATA_MISSING_COLUMN',
  DATA_INVALID_RECORD = 'DATA_INVALID_RECORD',

  // Config
  CONFIG_VALIDATION_ERROR = 'CONFIG_VALIDATION_ERROR',

  // API
  INVALID_PARAMS = 'INVALID_PARAMS',
  CHARACTER_NOT_FOUND = 'CHARACTER_NOT_FOUND',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export class EnsembleError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      context?: Record<string, unknown>;
      originalError?: Error;
    } = {},
  ) {
    super(message);
    this.name = 'EnsembleError';
    this.code = code;
    this.context = options.context;
    this.originalError = options.originalError;

    if (options.originalError?.stack) {
      this.stack = `${this.stack}\n\nCaused by: ${options.originalError.stack}`;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }

  static isEnsembleError(value: unknown): value is EnsembleError {
    return value instanceof EnsembleError;
  }

  /** Wrap any thrown value into an EnsembleError */
  static from(
    error: unknown,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
  ): EnsembleError {
    if (error instanceof EnsembleError) return error;

    const originalError = error instanceof Error ? error : new Error(String(error));
    return new EnsembleError(originalError.message, code, {
      originalError,
      context,
    });
  }
}
