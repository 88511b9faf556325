import { z } from 'zod';

export const registerSchema = z.object({
  username: z.string().trim().min(3, 'Username must be at least 3 characters').max(50),
  email: z.string().trim().toLowerCase().email('Invalid email address').max(150),
  password: z.string().min(6, 'Password must be at least 6 characters').max(72),
});

// OAuth2 password form: sent urlencoded by most clients, JSON accepted too
export const tokenSchema = z.object({
  username: z.string().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

export const refreshSchema = z.object({
  refresh_token: z.string().min(1, 'refresh_token is required'),
});

export const confirmEmailParamsSchema = z.object({
  token: z.string().min(1),
});

export const requestEmailSchema = z.object({
  email: z.string().trim().toLowerCase().email('Invalid email address').max(150),
});
