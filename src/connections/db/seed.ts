import { seedConfig } from '../config/app.config';
import { ROLE_NAMES, USER_ROLE } from '../../constants/user.constants';
import { hashPassword } from '../../utils/password';
import { logger } from '../../utils/logging';
import { pool } from './connection';
import { SqlClient, withTransaction } from './transaction';

const seedRoles = async (client: SqlClient) => {
  for (const name of ROLE_NAMES) {
    await client.query('INSERT INTO roles (name) VALUES ($1) ON CONFLICT (name) DO NOTHING', [name]);
  }
  logger.info(`Roles ensured: ${ROLE_NAMES.join(', ')}`);
};

/**
 * Creates an active admin when ADMIN_EMAIL and ADMIN_PASSWORD are set.
 * An existing account with that username or email is left untouched.
 */
const seedAdmin = async (client: SqlClient) => {
  const { adminUsername, adminEmail, adminPassword } = seedConfig;
  if (!adminEmail || !adminPassword) {
    logger.info('ADMIN_EMAIL / ADMIN_PASSWORD not set, skipping admin user');
    return;
  }

  const existing = await client.query('SELECT id FROM users WHERE username = $1 OR email = $2', [
    adminUsername,
    adminEmail,
  ]);
  if (existing.rows.length > 0) {
    logger.info('Admin user already exists, skipping');
    return;
  }

  const passwordHash = await hashPassword(adminPassword);
  await client.query(
    `INSERT INTO users (username, email, password_hash, is_active, role_id)
     SELECT $1, $2, $3, TRUE, id FROM roles WHERE name = $4`,
    [adminUsername, adminEmail, passwordHash, USER_ROLE.ADMIN]
  );
  logger.info('Default admin user created', { username: adminUsername, email: adminEmail });
};

export const seed = async () => {
  await withTransaction(pool, async (client) => {
    await seedRoles(client);
    await seedAdmin(client);
  });
};

if (require.main === module) {
  seed()
    .catch((error: unknown) => {
      logger.error('Seed error:', { error: error instanceof Error ? error.message : String(error) });
      process.exitCode = 1;
    })
    .finally(() => pool.end());
}
