import { z } from 'zod';
import { CONTACTS_DEFAULT_PAGE_SIZE, CONTACTS_MAX_PAGE_SIZE } from '../constants/contacts.constants';

export const isValidIsoDate = (value: string): boolean => {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
};

export const isoDateSchema = z
  .string()
  .refine(isValidIsoDate, { message: 'Invalid date format. Date must be in YYYY-MM-DD format.' });

export const idParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const paginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(CONTACTS_MAX_PAGE_SIZE).default(CONTACTS_DEFAULT_PAGE_SIZE),
  offset: z.coerce.number().int().min(0).default(0),
});

export const searchQuerySchema = z.object({
  query: z.string().trim().min(1, 'Search query must not be empty').max(100),
});
