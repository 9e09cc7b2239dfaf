/**
 * Auth Service
 *
 * Login, refresh and logout on top of the tokens manager.
 *
 * Refresh tokens are single-use: each refresh revokes the record behind the
 * presented token and issues a new one. Presenting an already revoked token
 * is treated as theft, and every live refresh token of the user is revoked.
 */

import * as bcrypt from 'bcrypt';
import { AuthError, AuthErrorCode, TokenAudience, TokenPair } from '../models/auth';
import { InactivePrincipalError, InvalidCredentialsError } from '../models/errors';
import { RefreshTokenStore } from '../models/refresh-token';
import { UserStatus, UserStore } from '../models/user';
import { TokensManager } from './tokens-manager';
import { logAuthentication, logSecurity } from '../utils/logger';

/**
 * Compared against when the email is unknown, so both paths cost one bcrypt round
 */
const DUMMY_PASSWORD_HASH = '$2b$12$C6UzMDM.H6dfI/f/IKcEe.Od6C6K7JxUXmbEyeCKhx4hxsRnfKeSa';

export class AuthService {
  constructor(
    private readonly users: UserStore,
    private readonly refreshTokens: RefreshTokenStore,
    private readonly tokensManager: TokensManager
  ) {}

  /**
   * Exchange credentials for a token pair
   *
   * @throws InvalidCredentialsError for unknown emails, wrong passwords and non-confirmed users
   */
  async login(email: string, password: string, requestId?: string): Promise<TokenPair> {
    const user = await this.users.findByEmail(email);

    if (!user) {
      await bcrypt.compare(password, DUMMY_PASSWORD_HASH);
      logAuthentication({ requestId, success: false, reason: 'Login with unknown email' });
      throw new InvalidCredentialsError();
    }

    const isPasswordValid = await bcrypt.compare(password, user.password_hash);
    if (!isPasswordValid) {
      logAuthentication({ requestId, success: false, userId: user.id, reason: 'Login with wrong password' });
      throw new InvalidCredentialsError();
    }

    if (user.status !== UserStatus.CONFIRMED) {
      logAuthentication({
        requestId,
        success: false,
        userId: user.id,
        code: AuthErrorCode.INACTIVE_PRINCIPAL,
        reason: `Login refused for status ${user.status}`,
      });
      throw new InvalidCredentialsError();
    }

    const tokenId = await this.refreshTokens.issue(user.id);
    logAuthentication({ requestId, success: true, userId: user.id });

    return this.tokensManager.createPair(user.id, tokenId);
  }

  /**
   * Exchange a refresh token for a new pair
   *
   * @throws TokenError if the token is invalid, expired or not a refresh token
   * @throws AuthError with UNKNOWN_PRINCIPAL or REVOKED_TOKEN
   * @throws InactivePrincipalError if the user is no longer CONFIRMED
   */
  async refresh(refreshToken: string, requestId?: string): Promise<TokenPair> {
    const claims = this.tokensManager.decodeCode(refreshToken, TokenAudience.REFRESH);

    const user = await this.users.findById(claims.id);
    if (!user) {
      logAuthentication({
        requestId,
        success: false,
        code: AuthErrorCode.UNKNOWN_PRINCIPAL,
        reason: `Refresh for missing user ${claims.id}`,
      });
      throw new AuthError(AuthErrorCode.UNKNOWN_PRINCIPAL, 'Authentication failed');
    }

    if (user.status !== UserStatus.CONFIRMED) {
      logAuthentication({
        requestId,
        success: false,
        userId: user.id,
        code: AuthErrorCode.INACTIVE_PRINCIPAL,
        reason: `Refresh refused for status ${user.status}`,
      });
      throw new InactivePrincipalError(user.id);
    }

    const nextTokenId = await this.refreshTokens.rotate(claims.token_id, user.id);
    if (nextTokenId === null) {
      const revokedCount = await this.refreshTokens.revokeAllFor(user.id);
      logSecurity({
        requestId,
        userId: user.id,
        violationType: 'REFRESH_TOKEN_REUSE',
        severity: 'HIGH',
        context: {
          token_id: claims.token_id,
          revoked_count: revokedCount,
        },
      });
      throw new AuthError(AuthErrorCode.REVOKED_TOKEN, 'Authentication failed');
    }

    logAuthentication({ requestId, success: true, userId: user.id });

    return this.tokensManager.createPair(user.id, nextTokenId);
  }

  /**
   * Revoke the record behind a refresh token
   *
   * @returns false if the token had already been revoked
   * @throws TokenError if the token is invalid, expired or not a refresh token
   */
  async logout(refreshToken: string): Promise<boolean> {
    const claims = this.tokensManager.decodeCode(refreshToken, TokenAudience.REFRESH);
    return this.refreshTokens.revoke(claims.token_id, claims.id);
  }
}
