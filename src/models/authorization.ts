/**
 * Authorization Models
 *
 * Groups, roles and permissions. A principal belongs to groups, groups
 * grant roles and roles grant permissions; all relations are many-to-many.
 */

export interface Group {
  id: string;                    // UUID
  name: string;
  description?: string;
}

export interface Role {
  id: string;                    // UUID
  name: string;
  description?: string;
}

/**
 * Atomic named capability, e.g. "wish:create"
 */
export interface Permission {
  id: string;                    // UUID
  name: string;
  title?: string;
}

export interface GroupRow {
  id: string;
  name: string;
  description: string | null;
}

export interface RoleRow {
  id: string;
  name: string;
  description: string | null;
}

export interface PermissionRow {
  id: string;
  name: string;
  title: string | null;
}

/**
 * Read-only queries the authorization manager composes
 */
export interface AuthorizationStore {
  findGroupsFor(userId: string): Promise<Group[]>;
  findRolesFor(groupId: string): Promise<Role[]>;
  findPermissionsFor(roleId: string): Promise<Permission[]>;
}

/**
 * Names reachable from a principal, sorted
 */
export interface AccessSummary {
  groups: string[];
  roles: string[];
  permissions: string[];
}

export function mapGroupRow(row: GroupRow): Group {
  return {
    id: row.id,
    name: row.name,
    description: row.description || undefined,
  };
}

export function mapRoleRow(row: RoleRow): Role {
  return {
    id: row.id,
    name: row.name,
    description: row.description || undefined,
  };
}

export function mapPermissionRow(row: PermissionRow): Permission {
  return {
    id: row.id,
    name: row.name,
    title: row.title || undefined,
  };
}
