/**
 * Authorization Repository Tests
 *
 * Unit tests for AuthorizationRepository against a mocked pg pool.
 */

import { AuthorizationRepository } from '../../src/repositories/authorization-repository';
import { resetPool } from '../../src/config/database';

jest.mock('pg', () => {
  const mockPool = {
    query: jest.fn(),
    connect: jest.fn(),
    end: jest.fn(),
    on: jest.fn(),
  };

  return {
    Pool: jest.fn(() => mockPool),
  };
});

interface MockPool {
  query: jest.Mock;
}

function normalize(sql: unknown): string {
  return String(sql).replace(/\s+/g, ' ').trim();
}

describe('AuthorizationRepository', () => {
  let repository: AuthorizationRepository;
  let mockPool: MockPool;

  beforeEach(() => {
    mockPool = jest.requireMock<{ Pool: () => MockPool }>('pg').Pool();
    jest.clearAllMocks();
    resetPool();

    process.env.DB_HOST = 'localhost';
    process.env.DB_NAME = 'test_db';
    process.env.DB_USER = 'test_user';

    repository = new AuthorizationRepository();
  });

  describe('findGroupsFor', () => {
    it('should join groups through user_groups', async () => {
      mockPool.query.mockResolvedValue({
        rows: [
          { id: 'group-1', name: 'editors', description: 'Can edit wishes' },
          { id: 'group-2', name: 'reviewers', description: null },
        ],
      });

      await expect(repository.findGroupsFor('user-1')).resolves.toEqual([
        { id: 'group-1', name: 'editors', description: 'Can edit wishes' },
        { id: 'group-2', name: 'reviewers', description: undefined },
      ]);

      const [sql, params] = mockPool.query.mock.calls[0];
      expect(normalize(sql)).toBe(
        'SELECT g.id, g.name, g.description FROM groups g ' +
          'INNER JOIN user_groups ug ON ug.group_id = g.id ' +
          'WHERE ug.user_id = $1 ORDER BY g.name ASC'
      );
      expect(params).toEqual(['user-1']);
    });
  });

  describe('findRolesFor', () => {
    it('should join roles through group_roles', async () => {
      mockPool.query.mockResolvedValue({ rows: [{ id: 'role-1', name: 'writer', description: null }] });

      await expect(repository.findRolesFor('group-1')).resolves.toEqual([
        { id: 'role-1', name: 'writer', description: undefined },
      ]);

      const [sql, params] = mockPool.query.mock.calls[0];
      expect(normalize(sql)).toContain('INNER JOIN group_roles gr ON gr.role_id = r.id WHERE gr.group_id = $1');
      expect(params).toEqual(['group-1']);
    });
  });

  describe('findPermissionsFor', () => {
    it('should join permissions through role_permissions', async () => {
      mockPool.query.mockResolvedValue({ rows: [{ id: 'perm-1', name: 'wish:read', title: 'Read wishes' }] });

      await expect(repository.findPermissionsFor('role-1')).resolves.toEqual([
        { id: 'perm-1', name: 'wish:read', title: 'Read wishes' },
      ]);

      const [sql, params] = mockPool.query.mock.calls[0];
      expect(normalize(sql)).toContain(
        'INNER JOIN role_permissions rp ON rp.permission_id = p.id WHERE rp.role_id = $1'
      );
      expect(params).toEqual(['role-1']);
    });

    it('should propagate query failures', async () => {
      mockPool.query.mockRejectedValue(new Error('connection terminated'));

      await expect(repository.findPermissionsFor('role-1')).rejects.toThrow('connection terminated');
    });
  });
});
