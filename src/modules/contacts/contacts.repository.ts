import { Database, SqlClient, withTransaction } from '../../connections/db/transaction';
import { repositoryCall } from '../../connections/db/repository';
import { Contact, ContactInput } from '../../connections/db/models/contact.model';
import { BIRTHDAY_WINDOW_DAYS, CONTACTS_DEFAULT_PAGE_SIZE, CONTACTS_MAX_PAGE_SIZE } from '../../constants/contacts.constants';
import { upcomingBirthdayKeys } from '../../utils/birthdays';
import { DuplicateEmailError, isUniqueViolation, NotFoundError } from '../../utils/errors';

/**
 * Every operation is scoped to `ownerId` when one is given. Omitting it
 * (admin endpoints only) addresses all contacts.
 */
export interface ContactPage {
  limit: number;
  offset: number;
  ownerId?: number;
}

export interface BirthdayQuery extends ContactPage {
  days?: number;
  today?: Date;
}

export interface ContactRepository {
  list(page: ContactPage): Promise<Contact[]>;
  get(contactId: number, ownerId?: number): Promise<Contact>;
  create(input: ContactInput, ownerId: number): Promise<Contact>;
  update(contactId: number, input: ContactInput, ownerId?: number): Promise<Contact>;
  delete(contactId: number, ownerId?: number): Promise<Contact>;
  birthdaysWithin(query: BirthdayQuery): Promise<Contact[]>;
  search(query: string, ownerId?: number): Promise<Contact[]>;
}

export const clampPage = (limit: number, offset: number): { limit: number; offset: number } => ({
  limit: Number.isFinite(limit)
    ? Math.min(Math.max(Math.trunc(limit), 1), CONTACTS_MAX_PAGE_SIZE)
    : CONTACTS_DEFAULT_PAGE_SIZE,
  offset: Number.isFinite(offset) ? Math.max(Math.trunc(offset), 0) : 0,
});

// ILIKE treats % and _ as wildcards; search input matches them literally
export const escapeLikePattern = (value: string): string => value.replace(/[\\%_]/g, '\\$&');

type ContactRow = {
  id: number;
  firstname: string;
  lastname: string;
  birthday: string;
  description: string | null;
  owner_id: number | null;
};

type EmailRow = { id: number; email: string; contact_id: number };
type PhoneRow = { id: number; phone: string; contact_id: number };

const CONTACT_COLUMNS = `c.id, c.firstname, c.lastname, to_char(c.birthday, 'YYYY-MM-DD') AS birthday,
  c.description, c.owner_id`;

const contactNotFound = () => new NotFoundError('Contact not found');

const translateContactError = (error: unknown) =>
  isUniqueViolation(error, 'emails_email_key') ? new DuplicateEmailError() : undefined;

/**
 * Positional parameter collector for dynamically built WHERE clauses.
 */
class QueryParams {
  readonly values: unknown[] = [];
  readonly conditions: string[] = [];

  constructor(ownerId?: number) {
    if (ownerId !== undefined) {
      this.conditions.push(`c.owner_id = ${this.add(ownerId)}`);
    }
  }

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }

  where(): string {
    return this.conditions.length > 0 ? `WHERE ${this.conditions.join(' AND ')}` : '';
  }
}

/**
 * Attach emails and phones to contact rows, two queries for the whole page.
 */
const withChildren = async (client: SqlClient, rows: ContactRow[]): Promise<Contact[]> => {
  if (rows.length === 0) {
    return [];
  }

  const ids = rows.map((row) => row.id);
  const emails = await client.query<EmailRow>(
    'SELECT id, email, contact_id FROM emails WHERE contact_id = ANY($1::int[]) ORDER BY id',
    [ids]
  );
  const phones = await client.query<PhoneRow>(
    'SELECT id, phone, contact_id FROM phones WHERE contact_id = ANY($1::int[]) ORDER BY id',
    [ids]
  );

  return rows.map((row) => ({
    ...row,
    emails: emails.rows.filter((email) => email.contact_id === row.id).map(({ id, email }) => ({ id, email })),
    phones: phones.rows.filter((phone) => phone.contact_id === row.id).map(({ id, phone }) => ({ id, phone })),
  }));
};

const findContact = async (client: SqlClient, contactId: number, ownerId?: number): Promise<Contact | null> => {
  const params = new QueryParams(ownerId);
  params.conditions.push(`c.id = ${params.add(contactId)}`);

  const result = await client.query<ContactRow>(
    `SELECT ${CONTACT_COLUMNS} FROM contacts c ${params.where()}`,
    params.values
  );
  const [contact] = await withChildren(client, result.rows);
  return contact ?? null;
};

const insertChildren = async (client: SqlClient, contactId: number, input: ContactInput): Promise<void> => {
  if (input.emails && input.emails.length > 0) {
    await client.query(
      'INSERT INTO emails (email, contact_id) SELECT unnest($1::text[]), $2',
      [input.emails.map(({ email }) => email), contactId]
    );
  }
  if (input.phones && input.phones.length > 0) {
    await client.query(
      'INSERT INTO phones (phone, contact_id) SELECT unnest($1::text[]), $2',
      [input.phones.map(({ phone }) => phone), contactId]
    );
  }
};

const requireContact = async (client: SqlClient, contactId: number): Promise<Contact> => {
  const contact = await findContact(client, contactId);
  if (!contact) {
    throw contactNotFound();
  }
  return contact;
};

export class PgContactRepository implements ContactRepository {
  constructor(private readonly db: Database) {}

  async list({ limit, offset, ownerId }: ContactPage): Promise<Contact[]> {
    const page = clampPage(limit, offset);

    return repositoryCall('listContacts', async () => {
      const params = new QueryParams(ownerId);
      const result = await this.db.query<ContactRow>(
        `SELECT ${CONTACT_COLUMNS} FROM contacts c ${params.where()}
         ORDER BY c.id
         LIMIT ${params.add(page.limit)} OFFSET ${params.add(page.offset)}`,
        params.values
      );
      return withChildren(this.db, result.rows);
    });
  }

  async get(contactId: number, ownerId?: number): Promise<Contact> {
    return repositoryCall('getContact', async () => {
      const contact = await findContact(this.db, contactId, ownerId);
      if (!contact) {
        throw contactNotFound();
      }
      return contact;
    });
  }

  async create(input: ContactInput, ownerId: number): Promise<Contact> {
    return repositoryCall(
      'createContact',
      () =>
        withTransaction(this.db, async (client) => {
          const inserted = await client.query<{ id: number }>(
            `INSERT INTO contacts (firstname, lastname, birthday, description, owner_id)
             VALUES ($1, $2, $3, $4, $5)
             RETURNING id`,
            [input.firstname, input.lastname, input.birthday, input.description ?? null, ownerId]
          );
          const contactId = inserted.rows[0].id;

          // Children need the parent id, so they go in after the parent row
          await insertChildren(client, contactId, input);

          return requireContact(client, contactId);
        }),
      translateContactError
    );
  }

  async update(contactId: number, input: ContactInput, ownerId?: number): Promise<Contact> {
    return repositoryCall(
      'updateContact',
      () =>
        withTransaction(this.db, async (client) => {
          const params = new QueryParams(ownerId);
          params.conditions.push(`c.id = ${params.add(contactId)}`);
          const existing = await client.query<{ id: number }>(
            `SELECT c.id FROM contacts c ${params.where()} FOR UPDATE`,
            params.values
          );
          if (existing.rows.length === 0) {
            throw contactNotFound();
          }

          await client.query(
            `UPDATE contacts
             SET firstname = $1, lastname = $2, birthday = $3, description = $4, updated_at = NOW()
             WHERE id = $5`,
            [input.firstname, input.lastname, input.birthday, input.description ?? null, contactId]
          );

          // Supplied collections replace the stored ones wholesale
          if (input.emails !== undefined) {
            await client.query('DELETE FROM emails WHERE contact_id = $1', [contactId]);
          }
          if (input.phones !== undefined) {
            await client.query('DELETE FROM phones WHERE contact_id = $1', [contactId]);
          }
          await insertChildren(client, contactId, input);

          return requireContact(client, contactId);
        }),
      translateContactError
    );
  }

  async delete(contactId: number, ownerId?: number): Promise<Contact> {
    return repositoryCall('deleteContact', () =>
      withTransaction(this.db, async (client) => {
        const contact = await findContact(client, contactId, ownerId);
        if (!contact) {
          throw contactNotFound();
        }

        await client.query('DELETE FROM emails WHERE contact_id = $1', [contactId]);
        await client.query('DELETE FROM phones WHERE contact_id = $1', [contactId]);
        await client.query('DELETE FROM contacts WHERE id = $1', [contactId]);

        return contact;
      })
    );
  }

  async birthdaysWithin({
    days = BIRTHDAY_WINDOW_DAYS,
    limit,
    offset,
    ownerId,
    today = new Date(),
  }: BirthdayQuery): Promise<Contact[]> {
    const page = clampPage(limit, offset);
    const keys = upcomingBirthdayKeys(today, days);

    return repositoryCall('birthdaysWithin', async () => {
      const params = new QueryParams(ownerId);
      const keysParam = params.add(keys);
      params.conditions.push(`to_char(c.birthday, 'MM-DD') = ANY(${keysParam}::text[])`);

      const result = await this.db.query<ContactRow>(
        `SELECT ${CONTACT_COLUMNS} FROM contacts c ${params.where()}
         ORDER BY array_position(${keysParam}::text[], to_char(c.birthday, 'MM-DD')), c.id
         LIMIT ${params.add(page.limit)} OFFSET ${params.add(page.offset)}`,
        params.values
      );
      return withChildren(this.db, result.rows);
    });
  }

  async search(query: string, ownerId?: number): Promise<Contact[]> {
    return repositoryCall('searchContacts', async () => {
      const params = new QueryParams(ownerId);
      const pattern = params.add(`%${escapeLikePattern(query)}%`);
      params.conditions.push(`(
        c.firstname ILIKE ${pattern}
        OR c.lastname ILIKE ${pattern}
        OR EXISTS (SELECT 1 FROM emails e WHERE e.contact_id = c.id AND e.email ILIKE ${pattern})
        OR EXISTS (SELECT 1 FROM phones p WHERE p.contact_id = c.id AND p.phone ILIKE ${pattern})
      )`);

      const result = await this.db.query<ContactRow>(
        `SELECT ${CONTACT_COLUMNS} FROM contacts c ${params.where()} ORDER BY c.id`,
        params.values
      );
      return withChildren(this.db, result.rows);
    });
  }
}
