/**
 * Refresh Token Models
 *
 * A refresh token record is issued alongside every token pair. Its ID is
 * embedded in the refresh token as `token_id`; consuming the record is what
 * makes a refresh token single-use.
 */

/**
 * Persistence contract for refresh token rotation
 */
export interface RefreshTokenStore {
  /**
   * Create a live record for a user and return its ID
   */
  issue(userId: string): Promise<number>;

  /**
   * Atomically revoke a live record and issue its successor
   * Returns the new record ID, or null if the record was not live.
   */
  rotate(tokenId: number, userId: string): Promise<number | null>;

  /**
   * Revoke a live record; returns false if it was already revoked or unknown
   */
  revoke(tokenId: number, userId: string): Promise<boolean>;

  /**
   * Revoke every live record of a user; returns how many were revoked
   */
  revokeAllFor(userId: string): Promise<number>;
}
