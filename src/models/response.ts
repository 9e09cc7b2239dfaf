/**
 * API Response Models
 *
 * Type definitions for standardized API responses.
 * All responses include request_id for traceability.
 */

/**
 * Standard success response envelope
 */
export interface SuccessResponse<T = unknown> {
  request_id: string;
  timestamp: string;
  data: T;
}

/**
 * Error details object
 */
export interface ErrorDetails {
  code: string;
  message: string;
  request_id: string;
  details?: Record<string, unknown>;
}

/**
 * Standard error response envelope
 */
export interface ErrorResponse {
  error: ErrorDetails;
}

/**
 * HTTP status codes
 */
export enum HttpStatus {
  OK = 200,
  BAD_REQUEST = 400,
  UNAUTHORIZED = 401,
  FORBIDDEN = 403,
  NOT_FOUND = 404,
  INTERNAL_SERVER_ERROR = 500,
  SERVICE_UNAVAILABLE = 503,
}

/**
 * Standard error codes
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_TOKEN = 'INVALID_TOKEN',
  INVALID_CREDENTIALS = 'INVALID_CREDENTIALS',
  INACTIVE_USER = 'INACTIVE_USER',
  AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR',
  AUTHORIZATION_ERROR = 'AUTHORIZATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
}
