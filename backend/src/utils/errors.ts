export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;

  constructor(
    message: string,
    options: {
      statusCode?: number;
      code?: string;
      cause?: unknown;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.statusCode = options.statusCode ?? 500;
    this.code = options.code ?? 'INTERNAL_ERROR';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      ...options,
    });
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', options: { cause?: unknown } = {}) {
    super(message, {
      statusCode: 404,
      code: 'NOT_FOUND',
      ...options,
    });
  }
}

export class ConflictError extends AppError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, {
      statusCode: 409,
      code: 'CONFLICT',
      ...options,
    });
  }
}

/**
 * The request is well-formed but the current state forbids it, e.g. a loyalty
 * redemption without enough points or a check-in on an inactive service.
 */
export class InvalidStateError extends AppError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, {
      statusCode: 409,
      code: 'INVALID_STATE',
      ...options,
    });
  }
}

/**
 * A write did not commit. The driver error travels as `cause` and is only logged.
 */
export class StorageError extends AppError {
  constructor(message = 'The operation could not be saved', options: { cause?: unknown } = {}) {
    super(message, {
      statusCode: 500,
      code: 'STORAGE_FAILURE',
      ...options,
    });
  }
}

const PG_UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === PG_UNIQUE_VIOLATION
  );
}
