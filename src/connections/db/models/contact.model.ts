// Contact Models - Based on migrations 20250101_000003 .. 20250101_000005

export interface ContactEmail {
  id: number;
  email: string; // unique across all contacts
}

export interface ContactPhone {
  id: number;
  phone: string;
}

export interface Contact {
  id: number;
  firstname: string;
  lastname: string;
  birthday: string; // YYYY-MM-DD
  description: string | null;
  owner_id: number | null; // null for rows seeded without an owner
  emails: ContactEmail[];
  phones: ContactPhone[];
}

/**
 * Create/update payload. On update, emails/phones left undefined keep the
 * stored set; any array (empty included) replaces it.
 */
export interface ContactInput {
  firstname: string;
  lastname: string;
  birthday: string;
  description?: string | null;
  emails?: Array<{ email: string }>;
  phones?: Array<{ phone: string }>;
}
