/**
 * Authorization Repository
 *
 * Read-only queries over the user -> group -> role -> permission join
 * tables. Each query returns one level; the authorization manager composes
 * them.
 */

import { query } from '../config/database';
import {
  AuthorizationStore,
  Group,
  GroupRow,
  Permission,
  PermissionRow,
  Role,
  RoleRow,
  mapGroupRow,
  mapPermissionRow,
  mapRoleRow,
} from '../models/authorization';

export class AuthorizationRepository implements AuthorizationStore {
  /**
   * Groups the user is a member of
   */
  async findGroupsFor(userId: string): Promise<Group[]> {
    const result = await query<GroupRow>(
      `
      SELECT g.id, g.name, g.description
      FROM groups g
      INNER JOIN user_groups ug ON ug.group_id = g.id
      WHERE ug.user_id = $1
      ORDER BY g.name ASC
      `,
      [userId]
    );

    return result.rows.map(mapGroupRow);
  }

  /**
   * Roles granted by a group
   */
  async findRolesFor(groupId: string): Promise<Role[]> {
    const result = await query<RoleRow>(
      `
      SELECT r.id, r.name, r.description
      FROM roles r
      INNER JOIN group_roles gr ON gr.role_id = r.id
      WHERE gr.group_id = $1
      ORDER BY r.name ASC
      `,
      [groupId]
    );

    return result.rows.map(mapRoleRow);
  }

  /**
   * Permissions granted by a role
   */
  async findPermissionsFor(roleId: string): Promise<Permission[]> {
    const result = await query<PermissionRow>(
      `
      SELECT p.id, p.name, p.title
      FROM permissions p
      INNER JOIN role_permissions rp ON rp.permission_id = p.id
      WHERE rp.role_id = $1
      ORDER BY p.name ASC
      `,
      [roleId]
    );

    return result.rows.map(mapPermissionRow);
  }
}
