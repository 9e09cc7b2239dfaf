/**
 * Auth Service Tests
 *
 * Unit tests for login, refresh-token rotation and logout with
 * in-memory user and refresh token stores.
 */

import { describe, it, expect, beforeAll, beforeEach, jest } from '@jest/globals';
import * as bcrypt from 'bcrypt';
import { AuthService } from '../../src/services/auth-service';
import { TokensManager } from '../../src/services/tokens-manager';
import { AuthConfig } from '../../src/config/environment';
import { AuthError, AuthErrorCode, TokenAudience, TokenError, TokenErrorCode } from '../../src/models/auth';
import { InactivePrincipalError, InvalidCredentialsError } from '../../src/models/errors';
import { RefreshTokenStore } from '../../src/models/refresh-token';
import { User, UserStatus, UserStore } from '../../src/models/user';

const NOW_MS = 1_700_000_000_000;
const USER_ID = '3f2b8c1e-5d4a-4e6f-9a7b-1c2d3e4f5a6b';
const PASSWORD = 'correct horse';

const authConfig: AuthConfig = {
  secretKey: 'test-secret',
  issuer: 'wishlist-backend',
  accessLifetimeSeconds: 3600,
  refreshLifetimeSeconds: 2592000,
  schemePrefix: 'Bearer',
};

class MockUserStore implements UserStore {
  private users: User[] = [];

  setMockUsers(users: User[]) {
    this.users = users;
  }

  async findById(id: string): Promise<User | null> {
    return this.users.find((user) => user.id === id) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.users.find((user) => user.email === email.trim().toLowerCase()) ?? null;
  }
}

interface TokenRecord {
  id: number;
  userId: string;
  revoked: boolean;
}

// Mirrors the conditional UPDATE of the repository
class MockRefreshTokenStore implements RefreshTokenStore {
  records: TokenRecord[] = [];

  async issue(userId: string): Promise<number> {
    const id = this.records.length + 1;
    this.records.push({ id, userId, revoked: false });
    return id;
  }

  async rotate(tokenId: number, userId: string): Promise<number | null> {
    if (!(await this.revoke(tokenId, userId))) {
      return null;
    }
    return this.issue(userId);
  }

  async revoke(tokenId: number, userId: string): Promise<boolean> {
    const record = this.records.find((r) => r.id === tokenId && r.userId === userId && !r.revoked);
    if (!record) {
      return false;
    }
    record.revoked = true;
    return true;
  }

  async revokeAllFor(userId: string): Promise<number> {
    const live = this.records.filter((r) => r.userId === userId && !r.revoked);
    live.forEach((r) => {
      r.revoked = true;
    });
    return live.length;
  }

  liveIds(): number[] {
    return this.records.filter((r) => !r.revoked).map((r) => r.id);
  }
}

describe('AuthService', () => {
  let passwordHash: string;
  let users: MockUserStore;
  let refreshTokens: MockRefreshTokenStore;
  let tokensManager: TokensManager;
  let service: AuthService;

  function makeUser(overrides: Partial<User> = {}): User {
    return {
      id: USER_ID,
      email: 'ada@example.com',
      first_name: 'Ada',
      last_name: 'Lovelace',
      password_hash: passwordHash,
      status: UserStatus.CONFIRMED,
      created_at: new Date('2024-01-01'),
      updated_at: new Date('2024-01-01'),
      ...overrides,
    };
  }

  beforeAll(async () => {
    passwordHash = await bcrypt.hash(PASSWORD, 4);
  });

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    users = new MockUserStore();
    users.setMockUsers([makeUser()]);
    refreshTokens = new MockRefreshTokenStore();
    tokensManager = new TokensManager(authConfig, () => NOW_MS);
    service = new AuthService(users, refreshTokens, tokensManager);
  });

  describe('login', () => {
    it('should issue a token pair bound to a new refresh record', async () => {
      const pair = await service.login('ada@example.com', PASSWORD);

      expect(tokensManager.decodeCode(pair.access_token, TokenAudience.ACCESS).id).toBe(USER_ID);
      expect(tokensManager.decodeCode(pair.refresh_token, TokenAudience.REFRESH)).toMatchObject({
        id: USER_ID,
        token_id: 1,
      });
      expect(refreshTokens.liveIds()).toEqual([1]);
    });

    it('should look up the email case-insensitively', async () => {
      await expect(service.login('  Ada@Example.com ', PASSWORD)).resolves.toHaveProperty('access_token');
    });

    it('should reject a wrong password', async () => {
      await expect(service.login('ada@example.com', 'wrong')).rejects.toThrow(InvalidCredentialsError);
      expect(refreshTokens.records).toHaveLength(0);
    });

    it('should reject an unknown email with the same error', async () => {
      await expect(service.login('nobody@example.com', PASSWORD)).rejects.toThrow(
        new InvalidCredentialsError('Invalid credentials.')
      );
    });

    it.each([UserStatus.UNCONFIRMED, UserStatus.ARCHIVED])(
      'should reject a %s user with valid credentials',
      async (status) => {
        users.setMockUsers([makeUser({ status })]);

        await expect(service.login('ada@example.com', PASSWORD)).rejects.toThrow(InvalidCredentialsError);
        expect(refreshTokens.records).toHaveLength(0);
      }
    );
  });

  describe('refresh', () => {
    it('should rotate the refresh record and return a new pair', async () => {
      const first = await service.login('ada@example.com', PASSWORD);

      const second = await service.refresh(first.refresh_token);

      expect(tokensManager.decodeCode(second.refresh_token, TokenAudience.REFRESH).token_id).toBe(2);
      expect(tokensManager.decodeCode(second.access_token, TokenAudience.ACCESS).id).toBe(USER_ID);
      expect(refreshTokens.liveIds()).toEqual([2]);
    });

    it('should revoke every refresh token of the user when one is reused', async () => {
      const first = await service.login('ada@example.com', PASSWORD);
      await service.login('ada@example.com', PASSWORD);
      await service.refresh(first.refresh_token);

      const reuse = service.refresh(first.refresh_token);

      await expect(reuse).rejects.toThrow(AuthError);
      await expect(reuse).rejects.toMatchObject({ code: AuthErrorCode.REVOKED_TOKEN });
      expect(refreshTokens.liveIds()).toEqual([]);
    });

    it('should log refresh token reuse as a security event', async () => {
      const errorLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      const first = await service.login('ada@example.com', PASSWORD);
      await service.refresh(first.refresh_token);

      await expect(service.refresh(first.refresh_token)).rejects.toThrow(AuthError);

      expect(errorLog).toHaveBeenCalledTimes(1);
      const entry: unknown = JSON.parse(String(errorLog.mock.calls[0][0]));
      expect(entry).toMatchObject({
        level: 'ERROR',
        violation_type: 'REFRESH_TOKEN_REUSE',
        severity: 'HIGH',
        user_id: USER_ID,
      });
    });

    it('should reject an access token', async () => {
      const pair = await service.login('ada@example.com', PASSWORD);

      await expect(service.refresh(pair.access_token)).rejects.toThrow(TokenError);
      await expect(service.refresh(pair.access_token)).rejects.toMatchObject({
        code: TokenErrorCode.AUDIENCE_MISMATCH,
      });
    });

    it('should reject a refresh token of a deleted user', async () => {
      const pair = await service.login('ada@example.com', PASSWORD);
      users.setMockUsers([]);

      await expect(service.refresh(pair.refresh_token)).rejects.toMatchObject({
        code: AuthErrorCode.UNKNOWN_PRINCIPAL,
      });
    });

    it('should reject an archived user without consuming the token', async () => {
      const pair = await service.login('ada@example.com', PASSWORD);
      users.setMockUsers([makeUser({ status: UserStatus.ARCHIVED })]);

      await expect(service.refresh(pair.refresh_token)).rejects.toThrow(InactivePrincipalError);
      expect(refreshTokens.liveIds()).toEqual([1]);
    });

    it('should reject an expired refresh token', async () => {
      const pair = await service.login('ada@example.com', PASSWORD);
      const later = new TokensManager(authConfig, () => NOW_MS + 2592000 * 1000);
      const laterService = new AuthService(users, refreshTokens, later);

      await expect(laterService.refresh(pair.refresh_token)).rejects.toMatchObject({
        code: TokenErrorCode.EXPIRED_TOKEN,
      });
    });
  });

  describe('logout', () => {
    it('should revoke the refresh record once', async () => {
      const pair = await service.login('ada@example.com', PASSWORD);

      await expect(service.logout(pair.refresh_token)).resolves.toBe(true);
      await expect(service.logout(pair.refresh_token)).resolves.toBe(false);
      expect(refreshTokens.liveIds()).toEqual([]);
    });

    it('should make the refresh token unusable', async () => {
      const pair = await service.login('ada@example.com', PASSWORD);
      await service.logout(pair.refresh_token);

      await expect(service.refresh(pair.refresh_token)).rejects.toMatchObject({
        code: AuthErrorCode.REVOKED_TOKEN,
      });
    });

    it('should reject an access token', async () => {
      const pair = await service.login('ada@example.com', PASSWORD);

      await expect(service.logout(pair.access_token)).rejects.toMatchObject({
        code: TokenErrorCode.AUDIENCE_MISMATCH,
      });
    });
  });
});
