import bcrypt from 'bcryptjs';
import { PASSWORD_SALT_ROUNDS } from '../constants/auth.constants';

export const hashPassword = (password: string): Promise<string> =>
  bcrypt.hash(password, PASSWORD_SALT_ROUNDS);

export const verifyPassword = (password: string, passwordHash: string): Promise<boolean> =>
  bcrypt.compare(password, passwordHash);
