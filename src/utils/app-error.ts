export type AppErrorCode =
  | 'INVALID_CORPUS_CONFIG'
  | 'INVALID_INPUT'
  | 'LOCATION_LOOKUP_FAULT'
  | 'INTERNAL_ERROR';

export class AppError extends Error {
  public code: AppErrorCode;
  public isOperational: boolean;
  public details?: Record<string, unknown>;

  constructor(
    message: string,
    code: AppErrorCode,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.isOperational = isOperational;
    if (details) this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }

  static invalidConfig(message: string, details?: Record<string, unknown>): AppError {
    return new AppError(message, 'INVALID_CORPUS_CONFIG', true, details);
  }

  static invalidInput(message: string, details?: Record<string, unknown>): AppError {
    return new AppError(message, 'INVALID_INPUT', true, details);
  }

  /**
   * Internal faults are bugs, not caller mistakes.
   */
  static internal(
    message: string = 'Internal error',
    code: AppErrorCode = 'INTERNAL_ERROR',
    details?: Record<string, unknown>
  ): AppError {
    return new AppError(message, code, false, details);
  }
}
