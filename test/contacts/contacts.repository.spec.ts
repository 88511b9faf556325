import { describe, it, expect } from 'vitest';
import { escapeLikePattern, PgContactRepository } from '../../src/modules/contacts/contacts.repository';
import { DuplicateEmailError, NotFoundError, RepositoryError } from '../../src/utils/errors';
import { FakeDatabase, uniqueViolation } from '../helpers/database';

const contactRow = {
  id: 4,
  firstname: 'Bob',
  lastname: 'Lee',
  birthday: '1990-05-01',
  description: null,
  owner_id: 3,
};

const input = { firstname: 'Bob', lastname: 'Lee', birthday: '1990-05-01' };

describe('PgContactRepository', () => {
  it('scopes and clamps list pages', async () => {
    const db = new FakeDatabase();

    await new PgContactRepository(db).list({ limit: 1000, offset: -5, ownerId: 3 });

    expect(db.queries).toHaveLength(1);
    expect(db.queries[0].text).toContain('WHERE c.owner_id = $1 ORDER BY c.id LIMIT $2 OFFSET $3');
    expect(db.queries[0].values).toEqual([3, 500, 0]);
  });

  it('lists every contact when no owner is given', async () => {
    const db = new FakeDatabase();

    await new PgContactRepository(db).list({ limit: 0, offset: 20 });

    expect(db.queries[0].text).not.toContain('WHERE');
    expect(db.queries[0].values).toEqual([1, 20]);
  });

  it('loads emails and phones with the contact', async () => {
    const db = new FakeDatabase()
      .on(/FROM contacts c WHERE/, [contactRow])
      .on(/FROM emails/, [
        { id: 1, email: 'bob@example.com', contact_id: 4 },
        { id: 2, email: 'other@example.com', contact_id: 9 },
      ])
      .on(/FROM phones/, [{ id: 3, phone: '555-0100', contact_id: 4 }]);

    const contact = await new PgContactRepository(db).get(4, 3);

    expect(contact).toEqual({
      ...contactRow,
      emails: [{ id: 1, email: 'bob@example.com' }],
      phones: [{ id: 3, phone: '555-0100' }],
    });
    expect(db.queries[0].values).toEqual([3, 4]);
    expect(db.queries[1].values).toEqual([[4]]);
  });

  it('reports a missing or foreign contact as NotFound', async () => {
    await expect(new PgContactRepository(new FakeDatabase()).get(4, 99)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('maps a duplicate contact email to DuplicateEmailError and rolls back', async () => {
    const db = new FakeDatabase()
      .on(/^INSERT INTO contacts/, [{ id: 5 }])
      .on(/^INSERT INTO emails/, uniqueViolation('emails_email_key'));

    await expect(
      new PgContactRepository(db).create({ ...input, emails: [{ email: 'bob@example.com' }] }, 3)
    ).rejects.toBeInstanceOf(DuplicateEmailError);
    expect(db.statements().at(-1)).toBe('ROLLBACK');
    expect(db.released).toBe(1);
  });

  it('inserts children after the parent row', async () => {
    const db = new FakeDatabase()
      .on(/^INSERT INTO contacts/, [{ id: 5 }])
      .on(/FROM contacts c WHERE/, [{ ...contactRow, id: 5 }]);

    await new PgContactRepository(db).create(
      { ...input, emails: [{ email: 'bob@example.com' }], phones: [{ phone: '555-0100' }] },
      3
    );

    const statements = db.statements();
    const parent = statements.findIndex((sql) => sql.startsWith('INSERT INTO contacts'));
    const emails = db.queries.find((query) => query.text.startsWith('INSERT INTO emails'));
    expect(parent).toBeGreaterThan(0);
    expect(statements.findIndex((sql) => sql.startsWith('INSERT INTO emails'))).toBeGreaterThan(parent);
    expect(emails?.values).toEqual([['bob@example.com'], 5]);
    expect(statements.at(-1)).toBe('COMMIT');
  });

  it('rolls back and hides unexpected failures', async () => {
    const db = new FakeDatabase().on(/^INSERT INTO contacts/, new Error('connection terminated'));

    await expect(new PgContactRepository(db).create(input, 3)).rejects.toBeInstanceOf(RepositoryError);
    expect(db.statements().at(-1)).toBe('ROLLBACK');
  });

  it('does not update a contact owned by someone else', async () => {
    const db = new FakeDatabase();

    await expect(new PgContactRepository(db).update(4, input, 99)).rejects.toBeInstanceOf(NotFoundError);
    expect(db.ran(/^UPDATE contacts/)).toBe(false);
    expect(db.statements().at(-1)).toBe('ROLLBACK');
  });

  it('replaces supplied collections and keeps omitted ones', async () => {
    const db = new FakeDatabase()
      .on(/FOR UPDATE$/, [{ id: 4 }])
      .on(/FROM contacts c WHERE/, [contactRow]);

    const contact = await new PgContactRepository(db).update(4, { ...input, emails: [] }, 3);

    expect(contact.emails).toEqual([]);
    expect(db.ran(/^DELETE FROM emails WHERE contact_id = \$1$/)).toBe(true);
    expect(db.ran(/^DELETE FROM phones/)).toBe(false);
    expect(db.ran(/^INSERT INTO emails/)).toBe(false);
    const update = db.queries.find((query) => query.text.startsWith('UPDATE contacts'));
    expect(update?.values).toEqual(['Bob', 'Lee', '1990-05-01', null, 4]);
  });

  it('deletes emails and phones before the contact', async () => {
    const db = new FakeDatabase().on(/FROM contacts c WHERE/, [contactRow]);

    const deleted = await new PgContactRepository(db).delete(4, 3);

    expect(deleted.id).toBe(4);
    const deletes = db.statements().filter((sql) => sql.startsWith('DELETE'));
    expect(deletes).toEqual([
      'DELETE FROM emails WHERE contact_id = $1',
      'DELETE FROM phones WHERE contact_id = $1',
      'DELETE FROM contacts WHERE id = $1',
    ]);
  });

  it('matches birthdays by month and day over the window', async () => {
    const db = new FakeDatabase();

    await new PgContactRepository(db).birthdaysWithin({
      days: 7,
      limit: 10,
      offset: 0,
      today: new Date('2024-12-29T00:00:00Z'),
    });

    const [query] = db.queries;
    expect(query.text).toContain("to_char(c.birthday, 'MM-DD') = ANY($1::text[])");
    expect(query.text).toContain("array_position($1::text[], to_char(c.birthday, 'MM-DD'))");
    expect(query.values).toEqual([
      ['12-29', '12-30', '12-31', '01-01', '01-02', '01-03', '01-04', '01-05'],
      10,
      0,
    ]);
  });

  it('searches names, emails and phones with wildcards escaped', async () => {
    const db = new FakeDatabase();

    await new PgContactRepository(db).search('50%_off', 7);

    const [query] = db.queries;
    expect(query.values).toEqual([7, '%50\\%\\_off%']);
    expect(query.text).toContain('c.firstname ILIKE $2');
    expect(query.text).toContain('e.email ILIKE $2');
    expect(query.text).toContain('p.phone ILIKE $2');
  });

  it('escapes backslashes in search input', () => {
    expect(escapeLikePattern('a\\b')).toBe('a\\\\b');
  });
});
