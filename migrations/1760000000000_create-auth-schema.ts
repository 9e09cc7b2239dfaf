/**
 * Authentication Schema Migration (V001)
 *
 * Tables created:
 * - users: Accounts with bcrypt password hashes and a lifecycle status
 * - groups, roles, permissions: Named authorization entities
 * - user_groups, group_roles, role_permissions: Many-to-many grants
 * - refresh_tokens: Issued refresh tokens, revoked when used or logged out
 */

import { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';

export const shorthands: ColumnDefinitions | undefined = undefined;

export async function up(pgm: MigrationBuilder): Promise<void> {
  // Enable UUID extension
  pgm.createExtension('uuid-ossp', { ifNotExists: true });

  pgm.createTable('users', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('uuid_generate_v4()'),
    },
    email: {
      type: 'varchar(320)',
      notNull: true,
      unique: true,
    },
    first_name: {
      type: 'varchar(255)',
      notNull: true,
      default: '',
    },
    last_name: {
      type: 'varchar(255)',
      notNull: true,
      default: '',
    },
    password_hash: {
      type: 'varchar(255)',
      notNull: true,
    },
    status: {
      type: 'varchar(20)',
      notNull: true,
      default: 'UNCONFIRMED',
      check: "status IN ('UNCONFIRMED', 'CONFIRMED', 'ARCHIVED')",
    },
    created_at: {
      type: 'timestamp',
      notNull: true,
      default: pgm.func('NOW()'),
    },
    updated_at: {
      type: 'timestamp',
      notNull: true,
      default: pgm.func('NOW()'),
    },
  });

  pgm.createTable('groups', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('uuid_generate_v4()'),
    },
    name: {
      type: 'varchar(150)',
      notNull: true,
      unique: true,
    },
    description: {
      type: 'text',
    },
  });

  pgm.createTable('roles', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('uuid_generate_v4()'),
    },
    name: {
      type: 'varchar(150)',
      notNull: true,
      unique: true,
    },
    description: {
      type: 'text',
    },
  });

  pgm.createTable('permissions', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('uuid_generate_v4()'),
    },
    name: {
      type: 'varchar(150)',
      notNull: true,
      unique: true,
    },
    title: {
      type: 'varchar(255)',
    },
  });

  // Join tables
  pgm.createTable('user_groups', {
    user_id: {
      type: 'uuid',
      notNull: true,
      primaryKey: true,
      references: 'users(id)',
      onDelete: 'CASCADE',
    },
    group_id: {
      type: 'uuid',
      notNull: true,
      primaryKey: true,
      references: 'groups(id)',
      onDelete: 'CASCADE',
    },
  });

  pgm.createTable('group_roles', {
    group_id: {
      type: 'uuid',
      notNull: true,
      primaryKey: true,
      references: 'groups(id)',
      onDelete: 'CASCADE',
    },
    role_id: {
      type: 'uuid',
      notNull: true,
      primaryKey: true,
      references: 'roles(id)',
      onDelete: 'CASCADE',
    },
  });

  pgm.createTable('role_permissions', {
    role_id: {
      type: 'uuid',
      notNull: true,
      primaryKey: true,
      references: 'roles(id)',
      onDelete: 'CASCADE',
    },
    permission_id: {
      type: 'uuid',
      notNull: true,
      primaryKey: true,
      references: 'permissions(id)',
      onDelete: 'CASCADE',
    },
  });

  pgm.createIndex('group_roles', 'role_id');
  pgm.createIndex('role_permissions', 'permission_id');

  pgm.createTable('refresh_tokens', {
    id: 'id',
    user_id: {
      type: 'uuid',
      notNull: true,
      references: 'users(id)',
      onDelete: 'CASCADE',
    },
    created_at: {
      type: 'timestamp',
      notNull: true,
      default: pgm.func('NOW()'),
    },
    revoked_at: {
      type: 'timestamp',
    },
  });

  // Active tokens per user, used by revoke-all
  pgm.createIndex('refresh_tokens', ['user_id', 'revoked_at'], {
    name: 'idx_refresh_tokens_user_revoked',
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  // Drop tables in reverse order to respect foreign key constraints
  pgm.dropTable('refresh_tokens', { cascade: true });
  pgm.dropTable('role_permissions', { cascade: true });
  pgm.dropTable('group_roles', { cascade: true });
  pgm.dropTable('user_groups', { cascade: true });
  pgm.dropTable('permissions', { cascade: true });
  pgm.dropTable('roles', { cascade: true });
  pgm.dropTable('groups', { cascade: true });
  pgm.dropTable('users', { cascade: true });

  pgm.dropExtension('uuid-ossp', { ifExists: true });
}
