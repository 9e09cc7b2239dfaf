/**
 * Authorization Manager
 *
 * Decides whether a principal holds a named permission by resolving
 * group -> role -> permission chains from storage. Nothing is cached:
 * memberships may change between requests, so every call re-resolves.
 */

import { AccessSummary, AuthorizationStore, Permission, Role } from '../models/authorization';
import { PermissionDeniedError } from '../models/errors';
import { Principal } from '../models/user';
import { logAuthorization } from '../utils/logger';

interface ResolvedAccess {
  groups: Set<string>;
  roles: Set<string>;
  permissions: Set<string>;
}

export class AuthorizationManager {
  constructor(private readonly store: AuthorizationStore) {}

  /**
   * Effective permission names of a principal
   * Anonymous callers and principals without groups get an empty set.
   */
  async getPermissions(principal: Principal | null | undefined): Promise<Set<string>> {
    const access = await this.resolve(principal);
    return access.permissions;
  }

  /**
   * Sorted group, role and permission names reachable from a principal
   */
  async describeAccess(principal: Principal | null | undefined): Promise<AccessSummary> {
    const access = await this.resolve(principal);
    return {
      groups: [...access.groups].sort(),
      roles: [...access.roles].sort(),
      permissions: [...access.permissions].sort(),
    };
  }

  /**
   * Exact, case-sensitive membership test
   */
  async hasPermission(principal: Principal | null | undefined, permissionName: string): Promise<boolean> {
    const permissions = await this.getPermissions(principal);
    return permissions.has(permissionName);
  }

  /**
   * Guard for routes that need a permission
   *
   * @throws PermissionDeniedError if the principal lacks the permission
   */
  async requirePermission(
    principal: Principal | null | undefined,
    permissionName: string,
    requestId?: string
  ): Promise<void> {
    const granted = await this.hasPermission(principal, permissionName);

    logAuthorization({
      requestId,
      userId: principal?.id,
      success: granted,
      permission: permissionName,
    });

    if (!granted) {
      throw new PermissionDeniedError(permissionName);
    }
  }

  private async resolve(principal: Principal | null | undefined): Promise<ResolvedAccess> {
    const access: ResolvedAccess = {
      groups: new Set(),
      roles: new Set(),
      permissions: new Set(),
    };

    if (!principal) {
      return access;
    }

    const groups = await this.store.findGroupsFor(principal.id);
    const rolesPerGroup = await Promise.all(
      groups.map((group) => this.store.findRolesFor(group.id))
    );

    // A role granted through several groups is only queried once
    const roles = new Map<string, Role>();
    for (const role of rolesPerGroup.flat()) {
      roles.set(role.id, role);
    }

    const permissionsPerRole: Permission[][] = await Promise.all(
      [...roles.keys()].map((roleId) => this.store.findPermissionsFor(roleId))
    );

    for (const group of groups) {
      access.groups.add(group.name);
    }
    for (const role of roles.values()) {
      access.roles.add(role.name);
    }
    for (const permission of permissionsPerRole.flat()) {
      access.permissions.add(permission.name);
    }

    return access;
  }
}
