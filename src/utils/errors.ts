export enum ErrorCode {
  // Source Errors (1xxx)
  SOURCE_UNAVAILABLE = 1001,
  SOURCE_UNREADABLE = 1002,

  // Configuration Errors (2xxx)
  CONFIG_INVALID = 2001,
  INVALID_ARGUMENT = 2002,

  // General Errors (9xxx)
  UNKNOWN_ERROR = 9000,
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
  timestamp: Date;
  recoverable: boolean;
}

export class AnalyzerError extends Error {
  readonly code: ErrorCode;
  declare readonly cause?: Error | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly timestamp: Date;
  readonly recoverable: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      cause?: Error | undefined;
      context?: Record<string, unknown> | undefined;
      recoverable?: boolean | undefined;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'AnalyzerError';
    this.code = code;
    this.context = options?.context;
    this.timestamp = new Date();
    this.recoverable = options?.recoverable ?? false;

    Error.captureStackTrace?.(this, AnalyzerError);
  }

  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      cause: this.cause,
      context: this.context,
      timestamp: this.timestamp,
      recoverable: this.recoverable,
    };
  }

  static fromError(err: Error, code: ErrorCode = ErrorCode.UNKNOWN_ERROR): AnalyzerError {
    if (err instanceof AnalyzerError) return err;
    return new AnalyzerError(code, err.message, { cause: err });
  }
}

/**
 * The input source does not exist or cannot be opened (missing file,
 * directory given instead of a file, permission denied).
 */
export class SourceUnavailableError extends AnalyzerError {
  constructor(
    path: string,
    options?: { cause?: Error | undefined; context?: Record<string, unknown> | undefined }
  ) {
    super(ErrorCode.SOURCE_UNAVAILABLE, `File ${path} not found`, {
      ...options,
      context: { path, ...options?.context },
      recoverable: true,
    });
    this.name = 'SourceUnavailableError';
  }
}

/**
 * Any other failure while reading the input source.
 */
export class SourceUnreadableError extends AnalyzerError {
  constructor(
    path: string,
    options?: { cause?: Error | undefined; context?: Record<string, unknown> | undefined }
  ) {
    const reason = options?.cause?.message ?? 'unknown error';
    super(ErrorCode.SOURCE_UNREADABLE, `Error reading ${path}: ${reason}`, {
      ...options,
      context: { path, ...options?.context },
      recoverable: true,
    });
    this.name = 'SourceUnreadableError';
  }
}

export class ConfigurationError extends AnalyzerError {
  constructor(
    message: string,
    options?: { cause?: Error | undefined; context?: Record<string, unknown> | undefined }
  ) {
    super(ErrorCode.CONFIG_INVALID, message, { ...options, recoverable: false });
    this.name = 'ConfigurationError';
  }
}

export class InvalidArgumentError extends AnalyzerError {
  constructor(
    message: string,
    options?: { cause?: Error | undefined; context?: Record<string, unknown> | undefined }
  ) {
    super(ErrorCode.INVALID_ARGUMENT, message, { ...options, recoverable: false });
    this.name = 'InvalidArgumentError';
  }
}

export function isSourceError(
  error: unknown
): error is SourceUnavailableError | SourceUnreadableError {
  return error instanceof SourceUnavailableError || error instanceof SourceUnreadableError;
}

export function getErrorCode(error: unknown): ErrorCode {
  if (error instanceof AnalyzerError) {
    return error.code;
  }
  return ErrorCode.UNKNOWN_ERROR;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
