/**
 * Refresh Token Repository
 *
 * Tracks issued refresh tokens so each one can be used once. Revocation is
 * a conditional UPDATE, so two concurrent refreshes of the same token cannot
 * both succeed.
 */

import { PoolClient } from 'pg';
import { query, transaction } from '../config/database';
import { RefreshTokenStore } from '../models/refresh-token';

const REVOKE_QUERY = `
  UPDATE refresh_tokens
  SET revoked_at = NOW()
  WHERE id = $1 AND user_id = $2 AND revoked_at IS NULL
  RETURNING id
`;

const ISSUE_QUERY = `
  INSERT INTO refresh_tokens (user_id)
  VALUES ($1)
  RETURNING id
`;

export class RefreshTokenRepository implements RefreshTokenStore {
  async issue(userId: string): Promise<number> {
    const result = await query<{ id: number }>(ISSUE_QUERY, [userId]);
    return result.rows[0].id;
  }

  async rotate(tokenId: number, userId: string): Promise<number | null> {
    return transaction(async (client: PoolClient) => {
      const revoked = await client.query<{ id: number }>(REVOKE_QUERY, [tokenId, userId]);
      if (revoked.rows.length === 0) {
        return null;
      }

      const issued = await client.query<{ id: number }>(ISSUE_QUERY, [userId]);
      return issued.rows[0].id;
    });
  }

  async revoke(tokenId: number, userId: string): Promise<boolean> {
    const result = await query<{ id: number }>(REVOKE_QUERY, [tokenId, userId]);
    return result.rows.length > 0;
  }

  async revokeAllFor(userId: string): Promise<number> {
    const result = await query<{ id: number }>(
      `
      UPDATE refresh_tokens
      SET revoked_at = NOW()
      WHERE user_id = $1 AND revoked_at IS NULL
      RETURNING id
      `,
      [userId]
    );

    return result.rows.length;
  }
}
