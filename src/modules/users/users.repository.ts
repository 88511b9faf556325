import { Database, SqlClient, withTransaction } from '../../connections/db/transaction';
import { repositoryCall } from '../../connections/db/repository';
import { CreateUserInput, User } from '../../connections/db/models/user.model';
import { isRoleName, RoleName, USER_ROLE } from '../../constants/user.constants';
import {
  DuplicateUserError,
  isUniqueViolation,
  NotFoundError,
  RepositoryError,
  UserNotFoundError,
} from '../../utils/errors';
import { hashPassword } from '../../utils/password';

/**
 * User directory. Lookups return null for absent users; mutations throw
 * UserNotFoundError instead.
 */
export interface UserRepository {
  createUser(input: CreateUserInput): Promise<User>;
  getUserById(id: number): Promise<User | null>;
  getUserByUsername(username: string): Promise<User | null>;
  getUserByEmail(email: string): Promise<User | null>;
  confirmEmail(email: string): Promise<User>;
  setAvatarUrl(email: string, url: string): Promise<User>;
  assignRole(userId: number, role: RoleName): Promise<User>;
}

type UserRow = {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  is_active: boolean;
  avatar_url: string | null;
  role_id: number | null;
  role: string | null;
  created_at: Date;
  updated_at: Date;
};

const SELECT_USER = `
  SELECT u.id, u.username, u.email, u.password_hash, u.is_active, u.avatar_url,
         u.role_id, r.name AS role, u.created_at, u.updated_at
  FROM users u
  LEFT JOIN roles r ON r.id = u.role_id`;

const toUser = (row: UserRow): User => ({
  id: row.id,
  username: row.username,
  email: row.email,
  password_hash: row.password_hash,
  is_active: row.is_active,
  avatar_url: row.avatar_url,
  role_id: row.role_id,
  role: row.role !== null && isRoleName(row.role) ? row.role : null,
  created_at: row.created_at,
  updated_at: row.updated_at,
});

const findUser = async (client: SqlClient, condition: string, values: unknown[]): Promise<User | null> => {
  const result = await client.query<UserRow>(`${SELECT_USER} WHERE ${condition}`, values);
  return result.rows.length > 0 ? toUser(result.rows[0]) : null;
};

const loadUser = async (client: SqlClient, id: number): Promise<User> => {
  const user = await findUser(client, 'u.id = $1', [id]);
  if (!user) {
    throw new RepositoryError();
  }
  return user;
};

export class PgUserRepository implements UserRepository {
  constructor(private readonly db: Database) {}

  async createUser({ username, email, password }: CreateUserInput): Promise<User> {
    return repositoryCall(
      'createUser',
      () =>
        withTransaction(this.db, async (client) => {
          const existing = await client.query<{ id: number }>(
            'SELECT id FROM users WHERE username = $1 OR email = $2',
            [username, email]
          );
          if (existing.rows.length > 0) {
            throw new DuplicateUserError();
          }

          const passwordHash = await hashPassword(password);

          // The default role row is created on first use
          const role = await client.query<{ id: number }>(
            `INSERT INTO roles (name) VALUES ($1)
             ON CONFLICT (name) DO UPDATE SET name = EXCLUDED.name
             RETURNING id`,
            [USER_ROLE.USER]
          );

          const inserted = await client.query<{ id: number }>(
            `INSERT INTO users (username, email, password_hash, is_active, role_id)
             VALUES ($1, $2, $3, FALSE, $4)
             RETURNING id`,
            [username, email, passwordHash, role.rows[0].id]
          );

          return loadUser(client, inserted.rows[0].id);
        }),
      (error) => (isUniqueViolation(error) ? new DuplicateUserError() : undefined)
    );
  }

  getUserById(id: number): Promise<User | null> {
    return repositoryCall('getUserById', () => findUser(this.db, 'u.id = $1', [id]));
  }

  getUserByUsername(username: string): Promise<User | null> {
    return repositoryCall('getUserByUsername', () => findUser(this.db, 'u.username = $1', [username]));
  }

  getUserByEmail(email: string): Promise<User | null> {
    return repositoryCall('getUserByEmail', () => findUser(this.db, 'u.email = $1', [email]));
  }

  async confirmEmail(email: string): Promise<User> {
    return repositoryCall('confirmEmail', () =>
      withTransaction(this.db, async (client) => {
        // Only ever flips to TRUE
        const updated = await client.query<{ id: number }>(
          'UPDATE users SET is_active = TRUE, updated_at = NOW() WHERE email = $1 RETURNING id',
          [email]
        );
        if (updated.rows.length === 0) {
          throw new UserNotFoundError();
        }
        return loadUser(client, updated.rows[0].id);
      })
    );
  }

  async setAvatarUrl(email: string, url: string): Promise<User> {
    return repositoryCall('setAvatarUrl', () =>
      withTransaction(this.db, async (client) => {
        const updated = await client.query<{ id: number }>(
          'UPDATE users SET avatar_url = $1, updated_at = NOW() WHERE email = $2 RETURNING id',
          [url, email]
        );
        if (updated.rows.length === 0) {
          throw new UserNotFoundError();
        }
        return loadUser(client, updated.rows[0].id);
      })
    );
  }

  async assignRole(userId: number, role: RoleName): Promise<User> {
    return repositoryCall('assignRole', () =>
      withTransaction(this.db, async (client) => {
        const roleResult = await client.query<{ id: number }>('SELECT id FROM roles WHERE name = $1', [role]);
        if (roleResult.rows.length === 0) {
          throw new NotFoundError('Role not found');
        }

        const updated = await client.query<{ id: number }>(
          'UPDATE users SET role_id = $1, updated_at = NOW() WHERE id = $2 RETURNING id',
          [roleResult.rows[0].id, userId]
        );
        if (updated.rows.length === 0) {
          throw new UserNotFoundError();
        }
        return loadUser(client, updated.rows[0].id);
      })
    );
  }
}
