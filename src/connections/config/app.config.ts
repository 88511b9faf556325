import dotenv from 'dotenv';
import path from 'path';
import { ConfigError } from '../../utils/errors';

dotenv.config();

export const JWT_ALGORITHMS = ['HS256', 'HS512'] as const;

export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

/**
 * Only HMAC algorithms are accepted; anything else aborts startup.
 */
export const parseJwtAlgorithm = (value: string): JwtAlgorithm => {
  const algorithm = JWT_ALGORITHMS.find((candidate) => candidate === value);
  if (!algorithm) {
    throw new ConfigError(`JWT_ALGORITHM must be HS256 or HS512, got "${value}"`);
  }
  return algorithm;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
};

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  return corsOrigins
    .split(/[,\s]+/)
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
};

const port = parseInt(process.env.APP_PORT || process.env.PORT || '3000', 10);

export const appConfig = {
  port,
  nodeEnv: process.env.NODE_ENV || 'development',
  baseUrl: process.env.BASE_URL || `http://localhost:${port}/`,
  jwtSecret: process.env.JWT_SECRET || 'secret',
  jwtAlgorithm: parseJwtAlgorithm(process.env.JWT_ALGORITHM || 'HS256'),
  requireConfirmedEmail: parseBoolean(process.env.AUTH_REQUIRE_CONFIRMED_EMAIL, false),
  rateLimitEnabled: parseBoolean(process.env.RATE_LIMIT_ENABLED, true),
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:5173',
  corsOrigins: parseCorsOrigins(),
  maxFileSize: parseInt(process.env.MAX_FILE_SIZE || '5242880', 10), // 5MB
  uploadDir: process.env.UPLOAD_DIR || path.join(process.cwd(), 'uploads'),
};

export const emailConfig = {
  host: process.env.SMTP_HOST || 'smtp.gmail.com',
  port: parseInt(process.env.SMTP_PORT || '465', 10),
  secure: parseBoolean(process.env.SMTP_SECURE, true),
  user: process.env.SMTP_USER || '',
  pass: process.env.SMTP_PASS || '',
  from: process.env.SMTP_FROM || process.env.SMTP_USER || '',
  fromName: 'Contacts API',
};

export const dbConfig = process.env.DATABASE_URL
  ? { connectionString: process.env.DATABASE_URL }
  : {
      host: process.env.DB_HOST || 'localhost',
      port: parseInt(process.env.DB_PORT || '5432', 10),
      user: process.env.DB_USER || 'postgres',
      password: process.env.DB_PASSWORD || 'postgres',
      database: process.env.DB_NAME || 'contacts',
    };

export const redisConfig = {
  host: process.env.REDIS_HOST || 'localhost',
  port: parseInt(process.env.REDIS_PORT || '6379', 10),
  password: process.env.REDIS_PASSWORD || '',
  db: parseInt(process.env.REDIS_DB || '0', 10),
};

export const storageConfig = {
  type: (process.env.STORAGE_TYPE || 'local').toLowerCase(),
  cloudflareAccountId: process.env.CLOUDFLARE_ACCOUNT_ID || '',
  cloudflareApiToken: process.env.CLOUDFLARE_API_TOKEN || '',
  uploadDir: appConfig.uploadDir,
  baseUrl: appConfig.baseUrl,
};

export const seedConfig = {
  adminUsername: process.env.ADMIN_USERNAME || 'admin',
  adminEmail: process.env.ADMIN_EMAIL || '',
  adminPassword: process.env.ADMIN_PASSWORD || '',
};
