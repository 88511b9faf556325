import { Migration } from './types';

export const migration: Migration = {
  async up(client) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS roles (
        id SERIAL PRIMARY KEY,
        -- 'User', 'Admin' or 'Moderator'
        name VARCHAR(50) NOT NULL,
        CONSTRAINT roles_name_key UNIQUE (name)
      )
    `);
  },

  async down(client) {
    await client.query('DROP TABLE IF EXISTS roles CASCADE');
  },
};
