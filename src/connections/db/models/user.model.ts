// User Model - Based on migration 20250101_000002_create_users_table

import { RoleName } from '../../../constants/user.constants';

export interface User {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  is_active: boolean; // false until the email address is confirmed
  avatar_url: string | null;
  role_id: number | null;
  role: RoleName | null; // joined from roles.name
  created_at: Date;
  updated_at: Date;
}

export interface CreateUserInput {
  username: string;
  email: string;
  password: string; // plaintext, hashed by the directory
}

/**
 * Public shape of a user. Also the payload of the user cache.
 */
export interface UserResponse {
  id: number;
  username: string;
  email: string;
  is_active: boolean;
  avatar_url: string | null;
  role: RoleName | null;
}

export const toUserResponse = (user: UserResponse): UserResponse => ({
  id: user.id,
  username: user.username,
  email: user.email,
  is_active: user.is_active,
  avatar_url: user.avatar_url,
  role: user.role,
});
