/**
 * Error Handler Middleware Tests
 *
 * Tests for centralized error handling middleware that formats
 * different error types into standardized API responses.
 */

import { describe, it, expect, afterEach, jest } from '@jest/globals';
import {
  handleError,
  isDatabaseConnectionError,
  ValidationError,
} from '../../src/middleware/error-handler';
import { AuthError, AuthErrorCode, TokenError, TokenErrorCode } from '../../src/models/auth';
import {
  BadRequestError,
  InactivePrincipalError,
  InvalidCredentialsError,
  NotFoundError,
  PermissionDeniedError,
} from '../../src/models/errors';
import { HttpStatus } from '../../src/models/response';

const requestId = 'test-request-id-123';

function errorOf(result: { body: string }): Record<string, unknown> {
  const body: { error: Record<string, unknown> } = JSON.parse(result.body);
  return body.error;
}

describe('Error Handler Middleware', () => {
  const originalNodeEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = originalNodeEnv;
  });

  describe('handleError', () => {
    it('should map token errors to 400 Invalid JWT', () => {
      const result = handleError(new TokenError(TokenErrorCode.EXPIRED_TOKEN, 'Token has expired'), requestId);

      expect(result.statusCode).toBe(HttpStatus.BAD_REQUEST);
      expect(errorOf(result)).toEqual({
        code: 'INVALID_TOKEN',
        message: 'Invalid JWT.',
        request_id: requestId,
        details: { reason: 'EXPIRED_TOKEN' },
      });
    });

    it('should map invalid credentials to 400', () => {
      const result = handleError(new InvalidCredentialsError(), requestId);

      expect(result.statusCode).toBe(400);
      expect(errorOf(result)).toEqual({
        code: 'INVALID_CREDENTIALS',
        message: 'Invalid credentials.',
        request_id: requestId,
      });
    });

    it('should map inactive users to 400', () => {
      const result = handleError(new InactivePrincipalError('user-1'), requestId);

      expect(result.statusCode).toBe(400);
      expect(errorOf(result)).toMatchObject({ code: 'INACTIVE_USER', message: 'Inactive user.' });
    });

    it('should map authentication errors to 401 with their public message', () => {
      const error = new AuthError(AuthErrorCode.REVOKED_TOKEN, 'Authentication failed', {
        cause: new Error('token 7 reused'),
      });

      const result = handleError(error, requestId);

      expect(result.statusCode).toBe(HttpStatus.UNAUTHORIZED);
      expect(errorOf(result)).toEqual({
        code: 'AUTHENTICATION_ERROR',
        message: 'Authentication failed',
        request_id: requestId,
      });
    });

    it('should map permission errors to 403', () => {
      const result = handleError(new PermissionDeniedError('user:read'), requestId);

      expect(result.statusCode).toBe(HttpStatus.FORBIDDEN);
      expect(errorOf(result)).toMatchObject({
        code: 'AUTHORIZATION_ERROR',
        message: 'Insufficient permissions. Required permission: user:read',
      });
    });

    it('should map not found errors to 404', () => {
      const result = handleError(new NotFoundError('User not found'), requestId);

      expect(result.statusCode).toBe(404);
      expect(errorOf(result)).toMatchObject({ code: 'NOT_FOUND', message: 'User not found' });
    });

    it('should map validation errors to 400 with field details', () => {
      const result = handleError(new ValidationError('Validation error.', { email: 'Field required' }), requestId);

      expect(result.statusCode).toBe(400);
      expect(errorOf(result)).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Validation error.',
        request_id: requestId,
        details: { email: 'Field required' },
      });
    });

    it('should map bad requests to 400 without details', () => {
      const result = handleError(new BadRequestError('Invalid JSON in request body'), requestId);

      expect(result.statusCode).toBe(400);
      expect(errorOf(result)).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Invalid JSON in request body',
        request_id: requestId,
      });
    });

    it('should map database connection errors to 503', () => {
      const result = handleError(new Error('connect ECONNREFUSED 127.0.0.1:5432'), requestId);

      expect(result.statusCode).toBe(HttpStatus.SERVICE_UNAVAILABLE);
      expect(errorOf(result)).toMatchObject({
        code: 'SERVICE_UNAVAILABLE',
        message: 'Database connection failed',
      });
    });

    it('should log and hide unexpected errors in production', () => {
      process.env.NODE_ENV = 'production';
      const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      const result = handleError(new Error('boom'), requestId);

      expect(result.statusCode).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
      expect(errorOf(result)).toEqual({
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
        request_id: requestId,
      });
      expect(consoleError).toHaveBeenCalledTimes(1);
    });

    it('should expose the error message in development', () => {
      process.env.NODE_ENV = 'development';
      jest.spyOn(console, 'error').mockImplementation(() => undefined);

      const result = handleError(new Error('boom'), requestId);

      expect(errorOf(result).details).toEqual({ error: 'boom' });
    });

    it('should handle thrown values that are not errors', () => {
      jest.spyOn(console, 'error').mockImplementation(() => undefined);

      expect(handleError('plain string', requestId).statusCode).toBe(500);
    });
  });

  describe('isDatabaseConnectionError', () => {
    it.each([
      'connect ECONNREFUSED 127.0.0.1:5432',
      'connect ETIMEDOUT',
      'getaddrinfo ENOTFOUND db.internal',
      'Connection terminated unexpectedly',
      'timeout exceeded when trying to connect timeout',
    ])('should detect "%s"', (message) => {
      expect(isDatabaseConnectionError(new Error(message))).toBe(true);
    });

    it('should ignore other errors', () => {
      expect(isDatabaseConnectionError(new Error('duplicate key value'))).toBe(false);
    });
  });
});
