/**
 * Application Error Models
 *
 * Common error types used across the application.
 * These errors are mapped to appropriate HTTP status codes
 * by the error handling middleware.
 */

/**
 * Resource not found error (404)
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Bad request error (400)
 */
export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/**
 * Login refused: unknown email, wrong password or inactive account (400)
 */
export class InvalidCredentialsError extends Error {
  constructor(message: string = 'Invalid credentials.') {
    super(message);
    this.name = 'InvalidCredentialsError';
  }
}

/**
 * Principal exists but its status forbids refreshing tokens (400)
 */
export class InactivePrincipalError extends Error {
  constructor(public principalId: string, message: string = 'Inactive user.') {
    super(message);
    this.name = 'InactivePrincipalError';
  }
}

/**
 * Authenticated principal lacks a required permission (403)
 */
export class PermissionDeniedError extends Error {
  constructor(public permission: string, message?: string) {
    super(message ?? `Insufficient permissions. Required permission: ${permission}`);
    this.name = 'PermissionDeniedError';
  }
}
