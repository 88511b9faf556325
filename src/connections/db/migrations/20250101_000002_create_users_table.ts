import { Migration } from './types';

export const migration: Migration = {
  async up(client) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS users (
        id SERIAL PRIMARY KEY,
        username VARCHAR(50) NOT NULL,
        email VARCHAR(150) NOT NULL,
        password_hash VARCHAR(255) NOT NULL,
        -- FALSE until the email address is confirmed
        is_active BOOLEAN NOT NULL DEFAULT FALSE,
        avatar_url VARCHAR(500),
        role_id INTEGER REFERENCES roles(id) ON DELETE RESTRICT,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        CONSTRAINT users_username_key UNIQUE (username),
        CONSTRAINT users_email_key UNIQUE (email)
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_users_role_id ON users(role_id)
    `);
  },

  async down(client) {
    await client.query('DROP TABLE IF EXISTS users CASCADE');
  },
};
