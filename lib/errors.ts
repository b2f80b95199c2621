export enum ErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  IO_FILE_NOT_FOUND = 'IO_FILE_NOT_FOUND',
  IO_READ_FAILED = 'IO_READ_FAILED',
  INTERNAL_UNKNOWN = 'INTERNAL_UNKNOWN'
}

type ErrorContext = Record<string, string | number | boolean | null | undefined>;

export class BuildValidatorError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;

  constructor(message: string, code: ErrorCode, context: ErrorContext = {}) {
    super(message);
    this.name = 'BuildValidatorError';
    this.code = code;
    this.context = context;
  }

  static fromError(error: unknown, code = ErrorCode.INTERNAL_UNKNOWN): BuildValidatorError {
    if (error instanceof BuildValidatorError) return error;
    const message = error instanceof Error ? error.message : String(error);
    const context = error instanceof Error ? { originalError: error.name } : {};
    return new BuildValidatorError(message, code, context);
  }
}

export class ConfigurationError extends BuildValidatorError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.CONFIG_INVALID, context);
    this.name = 'ConfigurationError';
  }
}
