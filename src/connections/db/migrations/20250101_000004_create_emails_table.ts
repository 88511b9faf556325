import { Migration } from './types';

export const migration: Migration = {
  async up(client) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS emails (
        id SERIAL PRIMARY KEY,
        email VARCHAR(150) NOT NULL,
        contact_id INTEGER NOT NULL REFERENCES contacts(id) ON DELETE CASCADE,
        -- Unique across all contacts, not per owner
        CONSTRAINT emails_email_key UNIQUE (email)
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_emails_contact_id ON emails(contact_id)
    `);
  },

  async down(client) {
    await client.query('DROP TABLE IF EXISTS emails');
  },
};
