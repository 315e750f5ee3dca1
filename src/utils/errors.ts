export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    error: {
      code: string;
      message: string;
      details?: unknown;
    };
  } {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

export class StorageError extends AppError {
  constructor(operation: string, path: string, cause?: unknown) {
    super(`Storage ${operation} failed: ${path}`, 'STORAGE_ERROR', { path, cause });
  }
}

export class CacheCorruptionError extends AppError {
  constructor(fingerprint: string, details?: unknown) {
    super(`Cache entry ${fingerprint} is corrupt`, 'CACHE_CORRUPTION', details);
  }
}

export class BatchFormatError extends AppError {
  constructor(path: string, line: number, details?: unknown) {
    super(`Malformed batch record at ${path}:${line}`, 'BATCH_FORMAT_ERROR', details);
  }
}

export class IndexArchiveError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'INDEX_ARCHIVE_ERROR', details);
  }
}

export class RetryExhaustedError extends AppError {
  constructor(stage: string, passes: number, unresolved: string[]) {
    super(
      `${stage} gave up after ${passes} passes with ${unresolved.length} unresolved`,
      'RETRY_EXHAUSTED',
      { stage, passes, unresolved },
    );
  }
}
