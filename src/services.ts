import { appConfig, storageConfig } from './connections/config/app.config';
import { pingDatabase, pool } from './connections/db/connection';
import { redisClient } from './connections/redis/redis.connection';
import { CurrentUserResolver } from './modules/auth/current-user.service';
import { TokenService } from './modules/auth/token.service';
import { RedisUserCache } from './modules/auth/user-cache';
import { PgContactRepository } from './modules/contacts/contacts.repository';
import { CloudflareImageUploader } from './modules/upload/cloudflare.service';
import { LocalFileStorage } from './modules/upload/localStorage.service';
import { resolveStorageMode } from './modules/upload/storage.config';
import { ConfiguredAvatarStorage } from './modules/upload/storage.service';
import { PgRoleRepository } from './modules/users/roles.repository';
import { PgUserRepository } from './modules/users/users.repository';
import type { AppServices } from './types/services.types';
import { createMailTransport, NodemailerConfirmationMailer } from './utils/email.service';

/**
 * Production wiring: pg pool, Redis, SMTP and the configured image storage.
 */
export const buildServices = (): AppServices => {
  const tokens = new TokenService({ secret: appConfig.jwtSecret, algorithm: appConfig.jwtAlgorithm });
  const users = new PgUserRepository(pool);
  const resolver = new CurrentUserResolver(tokens, users, new RedisUserCache(redisClient));

  const hasCloudflareConfig = Boolean(storageConfig.cloudflareAccountId && storageConfig.cloudflareApiToken);
  const avatars = new ConfiguredAvatarStorage(resolveStorageMode(storageConfig.type, hasCloudflareConfig), {
    cloudflare: hasCloudflareConfig
      ? new CloudflareImageUploader({
          accountId: storageConfig.cloudflareAccountId,
          apiToken: storageConfig.cloudflareApiToken,
        })
      : undefined,
    local: new LocalFileStorage({ uploadDir: storageConfig.uploadDir, baseUrl: storageConfig.baseUrl }),
  });

  return {
    users,
    roles: new PgRoleRepository(pool),
    contacts: new PgContactRepository(pool),
    tokens,
    resolver,
    mailer: new NodemailerConfirmationMailer(createMailTransport(), tokens),
    avatars,
    settings: {
      requireConfirmedEmail: appConfig.requireConfirmedEmail,
      rateLimitEnabled: appConfig.rateLimitEnabled,
      baseUrl: appConfig.baseUrl,
      frontendUrl: appConfig.frontendUrl,
      corsOrigins: appConfig.corsOrigins,
      nodeEnv: appConfig.nodeEnv,
      uploadDir: appConfig.uploadDir,
    },
    checkHealth: pingDatabase,
  };
};
