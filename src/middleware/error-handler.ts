/**
 * Error Handling Middleware
 *
 * Centralized error handling that catches and formats different types of errors
 * into standardized API responses with appropriate HTTP status codes.
 * This is the only place where core errors are mapped to HTTP responses.
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { AuthError, TokenError } from '../models/auth';
import {
  BadRequestError,
  InactivePrincipalError,
  InvalidCredentialsError,
  NotFoundError,
  PermissionDeniedError,
} from '../models/errors';
import { ErrorCode, HttpStatus } from '../models/response';
import { LogLevel, log } from '../utils/logger';
import {
  authenticationErrorResponse,
  authorizationErrorResponse,
  errorResponse,
  internalErrorResponse,
  notFoundErrorResponse,
  serviceUnavailableErrorResponse,
  validationErrorResponse,
} from '../utils/response-formatter';

/**
 * Validation error class with optional field-level details
 */
export class ValidationError extends Error {
  constructor(message: string, public details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Check if error is a database connection error
 *
 * Detects common database connection error patterns:
 * - ECONNREFUSED: Connection refused
 * - ETIMEDOUT: Connection timeout
 * - ENOTFOUND: Host not found
 * - Connection terminated unexpectedly
 */
export function isDatabaseConnectionError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    message.includes('econnrefused') ||
    message.includes('etimedout') ||
    message.includes('enotfound') ||
    message.includes('connection terminated') ||
    message.includes('connection refused') ||
    message.includes('connect timeout')
  );
}

/**
 * Handle error and format appropriate response
 *
 * Maps application errors to standardized API responses:
 * - Token errors (400, "Invalid JWT.")
 * - Invalid credentials / inactive user (400)
 * - Validation errors (400)
 * - Authentication errors (401)
 * - Permission errors (403)
 * - Not found errors (404)
 * - Database connection errors (503)
 * - Generic errors (500)
 *
 * @example
 * ```typescript
 * try {
 *   // ... operation
 * } catch (error) {
 *   return handleError(error, requestId);
 * }
 * ```
 */
export function handleError(
  error: unknown,
  requestId: string
): APIGatewayProxyResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof TokenError) {
    return errorResponse(
      ErrorCode.INVALID_TOKEN,
      'Invalid JWT.',
      HttpStatus.BAD_REQUEST,
      { reason: err.code },
      requestId
    );
  }

  if (err instanceof InvalidCredentialsError) {
    return errorResponse(ErrorCode.INVALID_CREDENTIALS, err.message, HttpStatus.BAD_REQUEST, undefined, requestId);
  }

  if (err instanceof InactivePrincipalError) {
    return errorResponse(ErrorCode.INACTIVE_USER, err.message, HttpStatus.BAD_REQUEST, undefined, requestId);
  }

  if (err instanceof AuthError) {
    return authenticationErrorResponse(err.message, requestId);
  }

  if (err instanceof PermissionDeniedError) {
    return authorizationErrorResponse(err.message, requestId);
  }

  if (err instanceof NotFoundError) {
    return notFoundErrorResponse(err.message, requestId);
  }

  if (err instanceof ValidationError) {
    return validationErrorResponse(err.message, err.details, requestId);
  }

  if (err instanceof BadRequestError) {
    return validationErrorResponse(err.message, undefined, requestId);
  }

  if (isDatabaseConnectionError(err)) {
    return serviceUnavailableErrorResponse('Database connection failed', requestId);
  }

  log(LogLevel.ERROR, 'Unhandled error', {
    request_id: requestId,
    error_name: err.name,
    error_message: err.message,
    stack: err.stack,
  });

  return internalErrorResponse(
    'Internal server error',
    process.env.NODE_ENV === 'development' ? { error: err.message } : undefined,
    requestId
  );
}
