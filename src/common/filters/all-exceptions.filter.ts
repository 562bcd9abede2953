import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { AppError, ERROR_STATUS, ErrorKind, InternalError } from '../errors/app-error';

interface RequestWithUser extends Request {
  user?: {
    id?: string;
  };
}

export interface ErrorResponse {
  success: false;
  statusCode: number;
  errorCode: ErrorKind;
  message: string;
  detail?: string;
  errors?: string[];
  retryAfter?: number;
  path: string;
  method: string;
  timestamp: string;
  stack?: string;
}

const KIND_BY_STATUS: Partial<Record<number, ErrorKind>> = {
  [HttpStatus.BAD_REQUEST]: 'VALIDATION_ERROR',
  [HttpStatus.UNPROCESSABLE_ENTITY]: 'VALIDATION_ERROR',
  [HttpStatus.PAYLOAD_TOO_LARGE]: 'VALIDATION_ERROR',
  [HttpStatus.UNSUPPORTED_MEDIA_TYPE]: 'VALIDATION_ERROR',
  [HttpStatus.UNAUTHORIZED]: 'AUTHENTICATION_ERROR',
  [HttpStatus.FORBIDDEN]: 'AUTHORIZATION_ERROR',
  [HttpStatus.NOT_FOUND]: 'NOT_FOUND',
  [HttpStatus.METHOD_NOT_ALLOWED]: 'NOT_FOUND',
  [HttpStatus.CONFLICT]: 'CONFLICT_ERROR',
  [HttpStatus.TOO_MANY_REQUESTS]: 'RATE_LIMIT_ERROR',
};

/** Caller-facing text for framework exceptions, whose own messages are not echoed */
const FRAMEWORK_MESSAGES: Record<ErrorKind, { message: string; detail: string }> = {
  VALIDATION_ERROR: { message: 'Validation error', detail: 'Invalid request data' },
  AUTHENTICATION_ERROR: { message: 'Could not validate credentials', detail: 'Invalid credentials' },
  AUTHORIZATION_ERROR: { message: 'Not enough permissions', detail: 'Insufficient permissions' },
  NOT_FOUND: { message: 'Resource not found', detail: 'The requested resource does not exist' },
  CONFLICT_ERROR: { message: 'Conflict', detail: 'The request conflicts with the current state' },
  DATABASE_ERROR: {
    message: 'Database operation failed',
    detail: 'An error occurred while processing your request',
  },
  RATE_LIMIT_ERROR: {
    message: 'Rate limit exceeded',
    detail: 'Too many requests. Please try again later.',
  },
  INTERNAL_ERROR: { message: 'Internal server error', detail: 'An unexpected error occurred' },
};

/**
 * Single rendering point for every failure.
 *
 * AppErrors are mapped through the ERROR_STATUS table. Framework
 * HttpExceptions (unknown route, body parser failures) keep their status
 * and get a fixed message for their kind.
 * Anything else becomes a generic 500 and its message is only logged.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  constructor(private readonly isDevelopment = process.env.NODE_ENV === 'development') {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<RequestWithUser>();

    const error = this.toAppError(exception);
    const status =
      exception instanceof HttpException ? exception.getStatus() : ERROR_STATUS[error.kind];

    this.logError(exception, error, status, request);

    const body = this.formatErrorResponse(error, status, request, exception);

    if (error.retryAfter !== undefined) {
      response.setHeader('Retry-After', String(error.retryAfter));
    }
    response.status(status).json(body);
  }

  private toAppError(exception: unknown): AppError {
    if (exception instanceof AppError) {
      return exception;
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const kind = KIND_BY_STATUS[status] ?? (status >= 500 ? 'INTERNAL_ERROR' : 'VALIDATION_ERROR');
      if (kind === 'INTERNAL_ERROR') {
        return new InternalError();
      }
      const { message, detail } = FRAMEWORK_MESSAGES[kind];
      return new AppError(kind, message, { detail });
    }

    return new InternalError();
  }

  private logError(
    exception: unknown,
    error: AppError,
    status: number,
    request: RequestWithUser,
  ): void {
    const context = JSON.stringify({
      statusCode: status,
      errorCode: error.kind,
      path: request.url,
      method: request.method,
      userId: request.user?.id,
    });

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const original = exception instanceof Error ? exception : undefined;
      this.logger.error(
        `Internal Server Error: ${original?.message ?? String(exception)} ${context}`,
        original?.stack,
      );
    } else {
      const cause = exception instanceof HttpException ? ` (${exception.message})` : '';
      this.logger.warn(
        `Client Error [${status}] ${error.message}: ${error.detail}${cause} ${context}`,
      );
    }
  }

  private formatErrorResponse(
    error: AppError,
    status: number,
    request: RequestWithUser,
    exception: unknown,
  ): ErrorResponse {
    const body: ErrorResponse = {
      success: false,
      statusCode: status,
      errorCode: error.kind,
      message: error.message,
      detail: error.detail,
      path: request.url,
      method: request.method,
      timestamp: new Date().toISOString(),
    };

    if (error.errors && error.errors.length > 0) {
      body.errors = error.errors;
    }
    if (error.retryAfter !== undefined) {
      body.retryAfter = error.retryAfter;
    }
    if (this.isDevelopment && exception instanceof Error && status >= 500) {
      body.stack = exception.stack;
    }

    return body;
  }
}
