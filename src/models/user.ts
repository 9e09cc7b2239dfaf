/**
 * User Models
 *
 * Type definitions for user accounts and the principal resolved
 * from an authenticated request.
 */

/**
 * User account statuses
 * Only CONFIRMED users may log in, refresh tokens or authenticate.
 */
export enum UserStatus {
  UNCONFIRMED = 'UNCONFIRMED',
  CONFIRMED = 'CONFIRMED',
  ARCHIVED = 'ARCHIVED',
}

/**
 * User entity from database
 */
export interface User {
  id: string;                    // UUID
  email: string;                 // Lower-cased, unique
  first_name: string;
  last_name: string;
  password_hash: string;         // bcrypt hash
  status: UserStatus;
  created_at: Date;
  updated_at: Date;
}

/**
 * User database row (matches PostgreSQL schema)
 */
export interface UserRow {
  id: string;
  email: string;
  first_name: string;
  last_name: string;
  password_hash: string;
  status: string;
  created_at: Date;
  updated_at: Date;
}

/**
 * Authenticated identity, without credential fields
 *
 * Group memberships are not carried here. Authorization looks them up through
 * `AuthorizationStore.findGroupsFor` on every call.
 */
export interface Principal {
  id: string;
  email: string;
  status: UserStatus;
}

/**
 * Read contract used to resolve principals from token claims
 */
export interface PrincipalStore {
  findById(id: string): Promise<User | null>;
}

/**
 * Read contract used by login
 */
export interface UserStore extends PrincipalStore {
  findByEmail(email: string): Promise<User | null>;
}

export function isUserStatus(value: string): value is UserStatus {
  return Object.values<string>(UserStatus).includes(value);
}

/**
 * Convert database row to User model
 * Unknown statuses are treated as ARCHIVED so they never authenticate.
 */
export function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    first_name: row.first_name,
    last_name: row.last_name,
    password_hash: row.password_hash,
    status: isUserStatus(row.status) ? row.status : UserStatus.ARCHIVED,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function toPrincipal(user: User): Principal {
  return {
    id: user.id,
    email: user.email,
    status: user.status,
  };
}
