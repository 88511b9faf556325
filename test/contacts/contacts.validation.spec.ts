import { describe, it, expect } from 'vitest';
import { contactSchema } from '../../src/modules/contacts/contacts.validation';

const contact = { firstname: 'Bob', lastname: 'Lee', birthday: '1990-05-01' };

describe('contactSchema', () => {
  it('accepts free-form phone numbers up to the column width', () => {
    const parsed = contactSchema.parse({ ...contact, phones: [{ phone: ' 555-0100 ext. 2 ' }] });

    expect(parsed.phones).toEqual([{ phone: '555-0100 ext. 2' }]);
  });

  it('rejects phone numbers longer than 20 characters', () => {
    const result = contactSchema.safeParse({ ...contact, phones: [{ phone: `+${'1'.repeat(20)}` }] });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0].message).toBe('Phone number must be at most 20 characters');
    expect(result.error?.issues[0].path).toEqual(['phones', 0, 'phone']);
  });

  it('rejects blank phone numbers', () => {
    expect(contactSchema.safeParse({ ...contact, phones: [{ phone: '   ' }] }).success).toBe(false);
  });

  it('rejects contact emails longer than 150 characters', () => {
    const email = `${'a'.repeat(140)}@example.com`;

    expect(contactSchema.safeParse({ ...contact, emails: [{ email }] }).success).toBe(false);
  });
});
