/**
 * Authentication Models
 *
 * Type definitions for token claims, token pairs, authentication results
 * and the errors raised while issuing or validating tokens.
 */

import { Principal } from './user';

/**
 * Token audiences
 * Every token carries exactly one audience and may only be consumed
 * by the operation expecting that audience.
 */
export enum TokenAudience {
  ACCESS = 'access',
  REFRESH = 'refresh',
}

/**
 * Claims carried by each audience, excluding registered claims
 */
export interface TokenDataMap {
  [TokenAudience.ACCESS]: {
    id: string;                   // Principal (user) ID
  };
  [TokenAudience.REFRESH]: {
    id: string;                   // Principal (user) ID
    token_id: number;             // Refresh token record ID (rotation)
  };
}

/**
 * Decoded claims for a given audience
 */
export type ClaimsFor<A extends TokenAudience> = TokenDataMap[A] & {
  aud: A;
  iat: number;                    // Issued at (Unix timestamp, seconds)
  exp: number;                    // Expiration (Unix timestamp, seconds)
};

export type AccessClaims = ClaimsFor<TokenAudience.ACCESS>;
export type RefreshClaims = ClaimsFor<TokenAudience.REFRESH>;

/**
 * Any decoded claims, tagged by audience
 */
export type TokenClaims = AccessClaims | RefreshClaims;

/**
 * Access/refresh token pair returned on login and refresh
 */
export interface TokenPair {
  access_token: string;
  refresh_token: string;
}

/**
 * Token validation error types
 */
export enum TokenErrorCode {
  INVALID_TOKEN = 'INVALID_TOKEN',
  INVALID_SIGNATURE = 'INVALID_SIGNATURE',
  EXPIRED_TOKEN = 'EXPIRED_TOKEN',
  AUDIENCE_MISMATCH = 'AUDIENCE_MISMATCH',
}

/**
 * Token validation error raised by the codec and the tokens manager
 */
export class TokenError extends Error {
  constructor(
    public code: TokenErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'TokenError';
  }
}

/**
 * Authentication error types
 */
export enum AuthErrorCode {
  MISSING_TOKEN = 'MISSING_TOKEN',
  INVALID_TOKEN = 'INVALID_TOKEN',
  EXPIRED_TOKEN = 'EXPIRED_TOKEN',
  INVALID_SIGNATURE = 'INVALID_SIGNATURE',
  AUDIENCE_MISMATCH = 'AUDIENCE_MISMATCH',
  UNKNOWN_PRINCIPAL = 'UNKNOWN_PRINCIPAL',
  INACTIVE_PRINCIPAL = 'INACTIVE_PRINCIPAL',
  REVOKED_TOKEN = 'REVOKED_TOKEN',
}

/**
 * Authentication error
 *
 * The message is safe to return to clients; the underlying reason
 * is kept in `cause` for server-side logging.
 */
export class AuthError extends Error {
  constructor(
    public code: AuthErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'AuthError';
  }
}

/**
 * Credentials extracted from a successfully authenticated request
 */
export interface AuthCredentials {
  scheme: string;
  token: string;
  claims: AccessClaims;
}

/**
 * Outcome of authenticating a request
 */
export type AuthenticationResult =
  | { status: 'anonymous' }
  | { status: 'authenticated'; credentials: AuthCredentials; principal: Principal }
  | { status: 'rejected'; error: AuthError };
