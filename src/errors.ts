export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Task not found') {
    super(message, 404, 'NOT_FOUND');
  }
}

/** The store could not complete a read, write or transaction. */
export class PersistenceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, 'PERSISTENCE_ERROR', { cause });
  }
}

/** A queued snapshot could not be decoded into a task. */
export class SerializationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, 'SERIALIZATION_ERROR', { cause });
  }
}

/** The remote authority rejected or could not receive an operation. */
export class DeliveryError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, 'DELIVERY_ERROR', { cause });
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 500, 'CONFIG_ERROR');
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}
