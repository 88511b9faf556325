import { Database } from '../../connections/db/transaction';
import { repositoryCall } from '../../connections/db/repository';
import { Role } from '../../connections/db/models/role.model';
import { isRoleName, RoleName } from '../../constants/user.constants';
import { DuplicateRoleError, isUniqueViolation } from '../../utils/errors';

export interface RoleRepository {
  createRole(name: RoleName): Promise<Role>;
  getRole(name: RoleName): Promise<Role | null>;
  listRoles(): Promise<Role[]>;
}

type RoleRow = { id: number; name: string };

// Rows whose name is outside the known set are not exposed
const toRoles = (rows: RoleRow[]): Role[] =>
  rows.flatMap((row) => (isRoleName(row.name) ? [{ id: row.id, name: row.name }] : []));

export class PgRoleRepository implements RoleRepository {
  constructor(private readonly db: Database) {}

  async createRole(name: RoleName): Promise<Role> {
    return repositoryCall(
      'createRole',
      async () => {
        const existing = await this.getRole(name);
        if (existing) {
          throw new DuplicateRoleError();
        }
        const inserted = await this.db.query<{ id: number }>(
          'INSERT INTO roles (name) VALUES ($1) RETURNING id',
          [name]
        );
        return { id: inserted.rows[0].id, name };
      },
      (error) => (isUniqueViolation(error) ? new DuplicateRoleError() : undefined)
    );
  }

  async getRole(name: RoleName): Promise<Role | null> {
    return repositoryCall('getRole', async () => {
      const result = await this.db.query<RoleRow>('SELECT id, name FROM roles WHERE name = $1', [name]);
      return toRoles(result.rows)[0] ?? null;
    });
  }

  async listRoles(): Promise<Role[]> {
    return repositoryCall('listRoles', async () => {
      const result = await this.db.query<RoleRow>('SELECT id, name FROM roles ORDER BY id');
      return toRoles(result.rows);
    });
  }
}
