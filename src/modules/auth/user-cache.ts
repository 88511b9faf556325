import { z } from 'zod';
import { UserResponse } from '../../connections/db/models/user.model';
import { RedisClient } from '../../connections/redis/redis.connection';
import { USER_ROLE } from '../../constants/user.constants';

export interface UserCache {
  get(email: string): Promise<UserResponse | null>;
  set(email: string, user: UserResponse, ttlSeconds: number): Promise<void>;
}

export const USER_CACHE_VERSION = 1;

// Bump the version when the payload changes; old entries then simply miss
export const userCacheKey = (email: string): string => `user:v${USER_CACHE_VERSION}:${email}`;

const cachedUserSchema = z.object({
  version: z.literal(USER_CACHE_VERSION),
  user: z.object({
    id: z.number().int(),
    username: z.string(),
    email: z.string(),
    is_active: z.boolean(),
    avatar_url: z.string().nullable(),
    role: z.enum([USER_ROLE.USER, USER_ROLE.ADMIN, USER_ROLE.MODERATOR]).nullable(),
  }),
});

export type CachedUser = z.infer<typeof cachedUserSchema>;

export const serializeCachedUser = (user: UserResponse): string => {
  const payload: CachedUser = {
    version: USER_CACHE_VERSION,
    user: {
      id: user.id,
      username: user.username,
      email: user.email,
      is_active: user.is_active,
      avatar_url: user.avatar_url,
      role: user.role,
    },
  };
  return JSON.stringify(payload);
};

/**
 * Returns null for anything that is not a current-version payload.
 */
export const parseCachedUser = (raw: string): UserResponse | null => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = cachedUserSchema.safeParse(json);
  return parsed.success ? parsed.data.user : null;
};

export class RedisUserCache implements UserCache {
  constructor(private readonly client: RedisClient) {}

  async get(email: string): Promise<UserResponse | null> {
    const raw = await this.client.get(userCacheKey(email));
    return raw === null ? null : parseCachedUser(raw);
  }

  async set(email: string, user: UserResponse, ttlSeconds: number): Promise<void> {
    await this.client.set(userCacheKey(email), serializeCachedUser(user), { EX: ttlSeconds });
  }
}
