/**
 * Tokens Manager
 *
 * Issues access/refresh token pairs and decodes incoming tokens for an
 * expected audience. Every codec failure reaches the caller as a TokenError.
 */

import { AuthConfig } from '../config/environment';
import {
  AccessClaims,
  RefreshClaims,
  TokenAudience,
  TokenClaims,
  TokenDataMap,
  TokenPair,
} from '../models/auth';
import { Clock, TokenCodec, toUnixSeconds } from '../utils/token-codec';

export class TokensManager {
  private readonly codec: TokenCodec;

  constructor(
    private readonly config: AuthConfig,
    private readonly clock: Clock = Date.now
  ) {
    this.codec = new TokenCodec(config.secretKey, {
      issuer: config.issuer,
      clock,
    });
  }

  /**
   * Sign a single token
   *
   * Each call signs anew; callers must not assume two calls return the same
   * string, nor that they return different ones.
   *
   * @param lifetimeSeconds - Defaults to the access token lifetime
   * @throws RangeError if the lifetime is not a positive integer
   */
  createCode<A extends TokenAudience>(
    data: TokenDataMap[A],
    audience: A,
    lifetimeSeconds: number = this.config.accessLifetimeSeconds
  ): string {
    if (!Number.isInteger(lifetimeSeconds) || lifetimeSeconds <= 0) {
      throw new RangeError(`Token lifetime must be a positive integer, got ${lifetimeSeconds}`);
    }

    const issuedAt = toUnixSeconds(this.clock());
    return this.codec.encode(data, audience, issuedAt, issuedAt + lifetimeSeconds);
  }

  /**
   * Issue an access token and a refresh token for a principal
   *
   * @param tokenId - Refresh token record ID, checked on refresh for rotation
   */
  createPair(principalId: string, tokenId: number): TokenPair {
    const accessToken = this.createCode({ id: principalId }, TokenAudience.ACCESS);
    const refreshToken = this.createCode(
      { id: principalId, token_id: tokenId },
      TokenAudience.REFRESH,
      this.config.refreshLifetimeSeconds
    );

    return {
      access_token: accessToken,
      refresh_token: refreshToken,
    };
  }

  /**
   * Decode a token for the audience the caller expects
   *
   * @throws TokenError
   */
  decodeCode(token: string, expectedAudience: TokenAudience.ACCESS): AccessClaims;
  decodeCode(token: string, expectedAudience: TokenAudience.REFRESH): RefreshClaims;
  decodeCode(token: string, expectedAudience: TokenAudience): TokenClaims;
  decodeCode(token: string, expectedAudience: TokenAudience): TokenClaims {
    return this.codec.decode(token, expectedAudience);
  }
}
