/**
 * JWT Authentication Backend
 *
 * Resolves the principal behind an `Authorization: <scheme> <token>` header.
 *
 * - no header, or another scheme        -> anonymous
 * - valid ACCESS token, CONFIRMED user  -> authenticated
 * - anything else                       -> rejected (AuthError)
 *
 * Rejections carry a generic message; the reason is logged server-side.
 * Storage failures are not rejections and propagate to the caller.
 */

import {
  AccessClaims,
  AuthError,
  AuthErrorCode,
  AuthenticationResult,
  TokenAudience,
  TokenError,
  TokenErrorCode,
} from '../models/auth';
import { Principal, PrincipalStore, UserStatus, toPrincipal } from '../models/user';
import { TokensManager } from '../services/tokens-manager';
import { logAuthentication } from '../utils/logger';

const AUTHENTICATION_FAILED = 'Authentication failed';

/**
 * Headers as delivered by API Gateway or node:http
 */
export type RequestHeaders = Record<string, string | string[] | undefined>;

export interface AuthenticationRequest {
  headers?: RequestHeaders | null;
  requestId?: string;
}

export interface JWTTokenBackendOptions {
  schemePrefix: string;
}

const TOKEN_ERROR_CODES: Record<TokenErrorCode, AuthErrorCode> = {
  [TokenErrorCode.INVALID_TOKEN]: AuthErrorCode.INVALID_TOKEN,
  [TokenErrorCode.INVALID_SIGNATURE]: AuthErrorCode.INVALID_SIGNATURE,
  [TokenErrorCode.EXPIRED_TOKEN]: AuthErrorCode.EXPIRED_TOKEN,
  [TokenErrorCode.AUDIENCE_MISMATCH]: AuthErrorCode.AUDIENCE_MISMATCH,
};

/**
 * Case-insensitive header lookup; repeated headers are joined by a comma
 */
export function getHeader(headers: RequestHeaders | null | undefined, name: string): string | undefined {
  if (!headers) {
    return undefined;
  }

  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && value !== undefined) {
      return Array.isArray(value) ? value.join(',') : value;
    }
  }

  return undefined;
}

export class JWTTokenBackend {
  constructor(
    private readonly tokensManager: TokensManager,
    private readonly principals: PrincipalStore,
    private readonly options: JWTTokenBackendOptions
  ) {}

  /**
   * Authenticate a request
   *
   * Never throws for credential problems; only storage errors escape.
   */
  async authenticate(request: AuthenticationRequest): Promise<AuthenticationResult> {
    const requestId = request.requestId;
    const header = getHeader(request.headers, 'authorization')?.trim();

    if (!header) {
      return { status: 'anonymous' };
    }

    const [scheme, ...rest] = header.split(/\s+/);
    if (scheme.toLowerCase() !== this.options.schemePrefix.toLowerCase()) {
      return { status: 'anonymous' };
    }

    if (rest.length === 0) {
      return this.reject(AuthErrorCode.MISSING_TOKEN, 'Authorization header has no token', requestId);
    }

    if (rest.length > 1) {
      return this.reject(
        AuthErrorCode.INVALID_TOKEN,
        `Authorization header must be in format: ${this.options.schemePrefix} <token>`,
        requestId
      );
    }

    const token = rest[0];

    let claims: AccessClaims;
    try {
      claims = this.tokensManager.decodeCode(token, TokenAudience.ACCESS);
    } catch (error) {
      if (error instanceof TokenError) {
        return this.reject(TOKEN_ERROR_CODES[error.code], error.message, requestId, error);
      }
      throw error;
    }

    const user = await this.principals.findById(claims.id);
    if (!user) {
      return this.reject(AuthErrorCode.UNKNOWN_PRINCIPAL, `User ${claims.id} not found`, requestId);
    }

    if (user.status !== UserStatus.CONFIRMED) {
      return this.reject(
        AuthErrorCode.INACTIVE_PRINCIPAL,
        `User ${user.id} has status ${user.status}`,
        requestId
      );
    }

    logAuthentication({
      requestId,
      success: true,
      userId: user.id,
    });

    return {
      status: 'authenticated',
      credentials: { scheme, token, claims },
      principal: toPrincipal(user),
    };
  }

  private reject(
    code: AuthErrorCode,
    reason: string,
    requestId?: string,
    cause?: Error
  ): AuthenticationResult {
    logAuthentication({
      requestId,
      success: false,
      code,
      reason,
    });

    return {
      status: 'rejected',
      error: new AuthError(code, AUTHENTICATION_FAILED, { cause: cause ?? new Error(reason) }),
    };
  }
}

/**
 * Unwrap an authentication result for routes that require a principal
 *
 * @throws AuthError when the request is anonymous or was rejected
 */
export function assertAuthenticated(result: AuthenticationResult): Principal {
  switch (result.status) {
    case 'authenticated':
      return result.principal;
    case 'rejected':
      throw result.error;
    case 'anonymous':
      throw new AuthError(AuthErrorCode.MISSING_TOKEN, 'Authentication required');
  }
}
