/** Base error class for all redactor operations. */
export class RedactorError extends Error {
  public readonly code: RedactorErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    code: RedactorErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RedactorError';
    this.code = code;
    this.details = details;
  }
}

export enum RedactorErrorCode {
  INVALID_CONFIGURATION = 'RED_INVALID_CONFIGURATION',
  FILE_NOT_FOUND = 'RED_FILE_NOT_FOUND',
  READ_ERROR = 'RED_READ_ERROR',
  WRITE_ERROR = 'RED_WRITE_ERROR',
  USAGE_ERROR = 'RED_USAGE_ERROR',
}

/** Narrows an unknown thrown value to a RedactorError. */
export function isRedactorError(error: unknown): error is RedactorError {
  return error instanceof RedactorError;
}
