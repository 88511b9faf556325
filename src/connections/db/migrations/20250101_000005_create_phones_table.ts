import { Migration } from './types';

export const migration: Migration = {
  async up(client) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS phones (
        id SERIAL PRIMARY KEY,
        phone VARCHAR(20) NOT NULL,
        contact_id INTEGER NOT NULL REFERENCES contacts(id) ON DELETE CASCADE
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_phones_contact_id ON phones(contact_id)
    `);
  },

  async down(client) {
    await client.query('DROP TABLE IF EXISTS phones');
  },
};
