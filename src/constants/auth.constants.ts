export const TOKEN_SCOPE = {
  ACCESS: 'access_token',
  REFRESH: 'refresh_token',
} as const;

export type TokenScope = typeof TOKEN_SCOPE[keyof typeof TOKEN_SCOPE];

export const ACCESS_TOKEN_TTL_SECONDS = 300 * 60;
export const REFRESH_TOKEN_TTL_SECONDS = 7 * 24 * 60 * 60;
export const EMAIL_TOKEN_TTL_SECONDS = 24 * 60 * 60;

export const USER_CACHE_TTL_SECONDS = 300;

export const PASSWORD_SALT_ROUNDS = 10;
