/**
 * Token Codec
 *
 * Signs and verifies audience-scoped JWTs with a shared secret.
 * Decoding verifies, in order: signature, issuer, expiry, audience and
 * finally the claim shape expected for that audience.
 */

import { createHmac, timingSafeEqual } from 'crypto';
import * as jwt from 'jsonwebtoken';
import {
  AccessClaims,
  RefreshClaims,
  TokenAudience,
  TokenClaims,
  TokenDataMap,
  TokenError,
  TokenErrorCode,
} from '../models/auth';

/**
 * Milliseconds since the Unix epoch
 */
export type Clock = () => number;

export interface TokenCodecOptions {
  issuer: string;
  algorithm?: jwt.Algorithm;
  clock?: Clock;
}

/**
 * HMAC algorithms only: the codec shares one secret for signing and verifying
 */
const HMAC_DIGESTS = {
  HS256: 'sha256',
  HS384: 'sha384',
  HS512: 'sha512',
} as const;

type HmacAlgorithm = keyof typeof HMAC_DIGESTS;

function isHmacAlgorithm(algorithm: string): algorithm is HmacAlgorithm {
  return Object.prototype.hasOwnProperty.call(HMAC_DIGESTS, algorithm);
}

export function toUnixSeconds(epochMillis: number): number {
  return Math.floor(epochMillis / 1000);
}

export class TokenCodec {
  private readonly algorithm: HmacAlgorithm;
  private readonly clock: Clock;

  constructor(
    private readonly secretKey: string,
    private readonly options: TokenCodecOptions
  ) {
    if (!secretKey) {
      throw new Error('Token secret key must not be empty');
    }

    const algorithm = options.algorithm ?? 'HS256';
    if (!isHmacAlgorithm(algorithm)) {
      throw new Error(`Unsupported token algorithm: ${algorithm}`);
    }
    this.algorithm = algorithm;

    this.clock = options.clock ?? Date.now;
  }

  /**
   * Sign claims for an audience
   *
   * @param issuedAt - Unix timestamp (seconds)
   * @param expiresAt - Unix timestamp (seconds); the token is invalid from this instant on
   */
  encode<A extends TokenAudience>(
    data: TokenDataMap[A],
    audience: A,
    issuedAt: number,
    expiresAt: number
  ): string {
    return jwt.sign(
      {
        ...data,
        aud: audience,
        iat: issuedAt,
        exp: expiresAt,
        iss: this.options.issuer,
      },
      this.secretKey,
      { algorithm: this.algorithm }
    );
  }

  /**
   * Verify a token and return its claims
   *
   * @throws TokenError with INVALID_SIGNATURE, EXPIRED_TOKEN, AUDIENCE_MISMATCH or INVALID_TOKEN
   */
  decode(token: string, expectedAudience: TokenAudience.ACCESS): AccessClaims;
  decode(token: string, expectedAudience: TokenAudience.REFRESH): RefreshClaims;
  decode(token: string, expectedAudience: TokenAudience): TokenClaims;
  decode(token: string, expectedAudience: TokenAudience): TokenClaims {
    const payload = this.verify(token);

    if (payload.aud !== expectedAudience) {
      throw new TokenError(
        TokenErrorCode.AUDIENCE_MISMATCH,
        `Token audience mismatch: expected ${expectedAudience}`
      );
    }

    return parseClaims(payload, expectedAudience);
  }

  private verify(token: string): jwt.JwtPayload {
    let payload: string | jwt.JwtPayload;

    try {
      payload = jwt.verify(token, this.secretKey, {
        algorithms: [this.algorithm],
        issuer: this.options.issuer,
        clockTimestamp: toUnixSeconds(this.clock()),
      });
    } catch (error) {
      // TokenExpiredError extends JsonWebTokenError, check it first
      if (error instanceof jwt.TokenExpiredError) {
        throw new TokenError(TokenErrorCode.EXPIRED_TOKEN, 'Token has expired', { cause: error });
      }

      // Altered header or payload bytes often fail to parse before the
      // library reaches its signature check
      if (!this.hasValidSignature(token)) {
        throw new TokenError(TokenErrorCode.INVALID_SIGNATURE, 'Invalid token signature', { cause: error });
      }

      throw new TokenError(
        TokenErrorCode.INVALID_TOKEN,
        `Invalid token: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error }
      );
    }

    if (typeof payload === 'string') {
      throw new TokenError(TokenErrorCode.INVALID_TOKEN, 'Invalid token: payload is not an object');
    }

    return payload;
  }

  /**
   * HMAC check over `header.payload` with the configured algorithm
   * Strings that are not three dot-separated segments are left to the library's error.
   */
  private hasValidSignature(token: string): boolean {
    const segments = token.split('.');
    if (segments.length !== 3) {
      return true;
    }

    const [header, payload, signature] = segments;
    const expected = createHmac(HMAC_DIGESTS[this.algorithm], this.secretKey)
      .update(`${header}.${payload}`)
      .digest();
    const actual = Buffer.from(signature, 'base64url');

    return actual.length === expected.length && timingSafeEqual(actual, expected);
  }
}

/**
 * Narrow a verified payload to the claim shape of its audience
 * Unknown shapes are rejected rather than passed through.
 */
function parseClaims(payload: jwt.JwtPayload, audience: TokenAudience): TokenClaims {
  const { id, iat, exp } = payload;

  if (typeof id !== 'string' || id.length === 0 || typeof iat !== 'number' || typeof exp !== 'number') {
    throw new TokenError(TokenErrorCode.INVALID_TOKEN, 'Invalid token: malformed claims');
  }

  switch (audience) {
    case TokenAudience.ACCESS:
      return { aud: TokenAudience.ACCESS, id, iat, exp };

    case TokenAudience.REFRESH: {
      const tokenId: unknown = payload.token_id;
      if (typeof tokenId !== 'number' || !Number.isSafeInteger(tokenId) || tokenId <= 0) {
        throw new TokenError(TokenErrorCode.INVALID_TOKEN, 'Invalid token: malformed claims');
      }
      return { aud: TokenAudience.REFRESH, id, token_id: tokenId, iat, exp };
    }
  }
}
