import { Migration } from './types';

export const migration: Migration = {
  async up(client) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS contacts (
        id SERIAL PRIMARY KEY,
        firstname VARCHAR(50) NOT NULL,
        lastname VARCHAR(50) NOT NULL,
        birthday DATE NOT NULL,
        description VARCHAR(250),
        owner_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_contacts_owner_id ON contacts(owner_id)
    `);
  },

  async down(client) {
    await client.query('DROP TABLE IF EXISTS contacts CASCADE');
  },
};
