/**
 * Response Formatting Utilities
 *
 * Provides helper functions for creating standardized API responses.
 * All responses include request_id for tracing.
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { v4 as uuidv4 } from 'uuid';
import {
  SuccessResponse,
  ErrorResponse,
  ErrorDetails,
  HttpStatus,
  ErrorCode,
} from '../models/response';

const JSON_HEADERS = {
  'Content-Type': 'application/json',
  'Cache-Control': 'no-store',
};

/**
 * Generate a unique request ID
 */
export function generateRequestId(): string {
  return uuidv4();
}

/**
 * Create a success response
 *
 * @example
 * ```typescript
 * return successResponse({ access_token, refresh_token }, HttpStatus.OK, requestId);
 * ```
 */
export function successResponse<T>(
  data: T,
  statusCode: HttpStatus = HttpStatus.OK,
  requestId?: string
): APIGatewayProxyResult {
  const response: SuccessResponse<T> = {
    request_id: requestId || generateRequestId(),
    timestamp: new Date().toISOString(),
    data,
  };

  return {
    statusCode,
    headers: JSON_HEADERS,
    body: JSON.stringify(response),
  };
}

/**
 * Create an error response
 *
 * @param code - Machine-readable error code
 * @param message - Human-readable error message
 * @param details - Optional additional error context
 */
export function errorResponse(
  code: ErrorCode,
  message: string,
  statusCode: HttpStatus,
  details?: Record<string, unknown>,
  requestId?: string
): APIGatewayProxyResult {
  const errorDetails: ErrorDetails = {
    code,
    message,
    request_id: requestId || generateRequestId(),
  };

  if (details) {
    errorDetails.details = details;
  }

  const response: ErrorResponse = {
    error: errorDetails,
  };

  return {
    statusCode,
    headers: JSON_HEADERS,
    body: JSON.stringify(response),
  };
}

/**
 * Create a validation error response (400)
 */
export function validationErrorResponse(
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(ErrorCode.VALIDATION_ERROR, message, HttpStatus.BAD_REQUEST, details, requestId);
}

/**
 * Create an authentication error response (401)
 */
export function authenticationErrorResponse(
  message: string,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(ErrorCode.AUTHENTICATION_ERROR, message, HttpStatus.UNAUTHORIZED, undefined, requestId);
}

/**
 * Create an authorization error response (403)
 */
export function authorizationErrorResponse(
  message: string,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(ErrorCode.AUTHORIZATION_ERROR, message, HttpStatus.FORBIDDEN, undefined, requestId);
}

/**
 * Create a not found error response (404)
 */
export function notFoundErrorResponse(
  message: string,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(ErrorCode.NOT_FOUND, message, HttpStatus.NOT_FOUND, undefined, requestId);
}

/**
 * Create an internal server error response (500)
 *
 * @param details - Optional error details (only outside production)
 */
export function internalErrorResponse(
  message: string = 'Internal server error',
  details?: Record<string, unknown>,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(ErrorCode.INTERNAL_ERROR, message, HttpStatus.INTERNAL_SERVER_ERROR, details, requestId);
}

/**
 * Create a service unavailable error response (503)
 */
export function serviceUnavailableErrorResponse(
  message: string = 'Service temporarily unavailable',
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(ErrorCode.SERVICE_UNAVAILABLE, message, HttpStatus.SERVICE_UNAVAILABLE, undefined, requestId);
}
