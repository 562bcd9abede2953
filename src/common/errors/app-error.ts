import { HttpStatus } from '@nestjs/common';

export type ErrorKind =
  | 'VALIDATION_ERROR'
  | 'AUTHENTICATION_ERROR'
  | 'AUTHORIZATION_ERROR'
  | 'NOT_FOUND'
  | 'CONFLICT_ERROR'
  | 'DATABASE_ERROR'
  | 'RATE_LIMIT_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Fixed mapping from error kind to transport status.
 * The exception filter is the only consumer.
 */
export const ERROR_STATUS: Record<ErrorKind, HttpStatus> = {
  VALIDATION_ERROR: HttpStatus.BAD_REQUEST,
  AUTHENTICATION_ERROR: HttpStatus.UNAUTHORIZED,
  AUTHORIZATION_ERROR: HttpStatus.FORBIDDEN,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  CONFLICT_ERROR: HttpStatus.CONFLICT,
  DATABASE_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
  RATE_LIMIT_ERROR: HttpStatus.TOO_MANY_REQUESTS,
  INTERNAL_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
};

export interface AppErrorOptions {
  detail?: string;
  errors?: string[];
  retryAfter?: number;
}

/**
 * Base class for every failure the service reports to a caller.
 *
 * `message` and `detail` are caller-safe. Internal causes belong in logs,
 * not here.
 */
export class AppError extends Error {
  readonly detail: string;
  readonly errors?: string[];
  readonly retryAfter?: number;

  constructor(
    readonly kind: ErrorKind,
    message: string,
    options: AppErrorOptions = {},
  ) {
    super(message);
    this.name = new.target.name;
    this.detail = options.detail ?? message;
    this.errors = options.errors;
    this.retryAfter = options.retryAfter;
  }

  get status(): HttpStatus {
    return ERROR_STATUS[this.kind];
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation error', detail?: string, errors?: string[]) {
    super('VALIDATION_ERROR', message, { detail, errors });
  }
}

export class AuthenticationError extends AppError {
  constructor(message = 'Could not validate credentials', detail = 'Invalid credentials') {
    super('AUTHENTICATION_ERROR', message, { detail });
  }
}

export class AuthorizationError extends AppError {
  constructor(message = 'Not enough permissions', detail = 'Insufficient permissions') {
    super('AUTHORIZATION_ERROR', message, { detail });
  }
}

export class NotFoundError extends AppError {
  constructor(resource = 'Resource') {
    super('NOT_FOUND', `${resource} not found`);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, detail?: string) {
    super('CONFLICT_ERROR', message, { detail });
  }
}

export class DatabaseError extends AppError {
  constructor(
    message = 'Database operation failed',
    detail = 'An error occurred while processing your request',
  ) {
    super('DATABASE_ERROR', message, { detail });
  }
}

export class RateLimitError extends AppError {
  constructor(retryAfter: number) {
    super('RATE_LIMIT_ERROR', 'Rate limit exceeded', {
      detail: `Too many requests. Please try again after ${retryAfter} seconds.`,
      retryAfter,
    });
  }
}

export class InternalError extends AppError {
  constructor() {
    super('INTERNAL_ERROR', 'Internal server error', { detail: 'An unexpected error occurred' });
  }
}
