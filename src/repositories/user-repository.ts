/**
 * User Repository
 *
 * Read-only data access for user accounts. All queries are parameterized
 * to prevent SQL injection.
 */

import { query } from '../config/database';
import { User, UserRow, UserStore, mapUserRow } from '../models/user';

/**
 * UUID validation regex
 */
const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const USER_COLUMNS = `
  id,
  email,
  first_name,
  last_name,
  password_hash,
  status,
  created_at,
  updated_at
`;

export class UserRepository implements UserStore {
  /**
   * Find a user by ID
   * IDs that are not UUIDs cannot exist and are not sent to the database.
   */
  async findById(id: string): Promise<User | null> {
    if (!UUID_REGEX.test(id)) {
      return null;
    }

    const result = await query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );

    return result.rows.length > 0 ? mapUserRow(result.rows[0]) : null;
  }

  /**
   * Find a user by email (case-insensitive)
   */
  async findByEmail(email: string): Promise<User | null> {
    const result = await query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email.trim().toLowerCase()]
    );

    return result.rows.length > 0 ? mapUserRow(result.rows[0]) : null;
  }
}
