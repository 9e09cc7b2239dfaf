/**
 * Request Body Validation
 *
 * Validates token endpoint bodies against JSON schemas using ajv.
 * Invalid bodies raise a ValidationError with field-specific details.
 */

import Ajv, { ErrorObject, JSONSchemaType, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { ValidationError } from '../middleware/error-handler';

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  coerceTypes: false,
});

// Add format validators (email, uuid, etc.)
addFormats(ajv);

export interface LoginRequest {
  email: string;
  password: string;
}

export interface RefreshTokenRequest {
  refresh_token: string;
}

const loginSchema: JSONSchemaType<LoginRequest> = {
  type: 'object',
  properties: {
    email: { type: 'string', format: 'email', maxLength: 320 },
    password: { type: 'string', minLength: 1, maxLength: 1024 },
  },
  required: ['email', 'password'],
  additionalProperties: false,
};

const refreshTokenSchema: JSONSchemaType<RefreshTokenRequest> = {
  type: 'object',
  properties: {
    refresh_token: { type: 'string', minLength: 1, maxLength: 8192 },
  },
  required: ['refresh_token'],
  additionalProperties: false,
};

const validateLogin = ajv.compile(loginSchema);
const validateRefreshToken = ajv.compile(refreshTokenSchema);

/**
 * Format ajv validation errors into field-specific error details
 */
function formatValidationErrors(errors: ErrorObject[]): Record<string, string> {
  const details: Record<string, string> = {};

  for (const error of errors) {
    const missingProperty: unknown = error.params.missingProperty;
    const additionalProperty: unknown = error.params.additionalProperty;
    const field = error.instancePath
      ? error.instancePath.substring(1)
      : typeof missingProperty === 'string'
        ? missingProperty
        : 'body';

    let message = error.message || 'Validation failed';

    if (error.keyword === 'required') {
      message = 'Field required';
    } else if (error.keyword === 'type') {
      message = `Expected ${String(error.params.type)}`;
    } else if (error.keyword === 'format') {
      message = `Invalid format, expected ${String(error.params.format)}`;
    } else if (error.keyword === 'minLength') {
      message = `Must be at least ${String(error.params.limit)} characters`;
    } else if (error.keyword === 'maxLength') {
      message = `Must be at most ${String(error.params.limit)} characters`;
    } else if (error.keyword === 'additionalProperties' && typeof additionalProperty === 'string') {
      details[additionalProperty] = 'Unknown field';
      continue;
    }

    details[field] = message;
  }

  return details;
}

function validate<T>(validator: ValidateFunction<T>, body: unknown): T {
  if (!validator(body)) {
    throw new ValidationError('Validation error.', formatValidationErrors(validator.errors ?? []));
  }
  return body;
}

export function parseLoginRequest(body: unknown): LoginRequest {
  return validate(validateLogin, body);
}

export function parseRefreshTokenRequest(body: unknown): RefreshTokenRequest {
  return validate(validateRefreshToken, body);
}
