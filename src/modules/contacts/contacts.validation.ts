import { z } from 'zod';
import { BIRTHDAY_WINDOW_DAYS, BIRTHDAY_WINDOW_MAX_DAYS } from '../../constants/contacts.constants';
import { isoDateSchema, paginationSchema } from '../../utils/validation';

const emailEntrySchema = z.object({
  email: z.string().trim().toLowerCase().email('Invalid email address').max(150),
});

const phoneEntrySchema = z.object({
  phone: z
    .string()
    .trim()
    .min(1, 'Phone number must not be empty')
    .max(20, 'Phone number must be at most 20 characters'),
});

// Same body for create and update: update replaces every scalar field
export const contactSchema = z.object({
  firstname: z.string().trim().min(3, 'First name must be at least 3 characters').max(50),
  lastname: z.string().trim().min(3, 'Last name must be at least 3 characters').max(50),
  birthday: isoDateSchema,
  description: z.string().trim().min(3).max(250).nullish(),
  emails: z.array(emailEntrySchema).optional(),
  phones: z.array(phoneEntrySchema).optional(),
});

export const birthdayQuerySchema = paginationSchema.extend({
  days: z.coerce.number().int().min(0).max(BIRTHDAY_WINDOW_MAX_DAYS).default(BIRTHDAY_WINDOW_DAYS),
});

export type ContactBody = z.infer<typeof contactSchema>;
