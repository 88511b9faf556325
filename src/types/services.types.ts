import type { ContactRepository } from '../modules/contacts/contacts.repository';
import type { CurrentUserResolver } from '../modules/auth/current-user.service';
import type { TokenService } from '../modules/auth/token.service';
import type { AvatarStorage } from '../modules/upload/storage.service';
import type { RoleRepository } from '../modules/users/roles.repository';
import type { UserRepository } from '../modules/users/users.repository';
import type { ConfirmationMailer } from '../utils/email.service';

export interface AppSettings {
  requireConfirmedEmail: boolean;
  rateLimitEnabled: boolean;
  // Prefix for confirmation links; the request's own origin when empty
  baseUrl: string;
  frontendUrl: string;
  corsOrigins: string[];
  nodeEnv: string;
  uploadDir: string;
}

/**
 * Everything a request handler may use. Built once by `buildServices` and
 * handed to `createApp`.
 */
export interface AppServices {
  users: UserRepository;
  roles: RoleRepository;
  contacts: ContactRepository;
  tokens: TokenService;
  resolver: CurrentUserResolver;
  mailer: ConfirmationMailer;
  avatars: AvatarStorage;
  settings: AppSettings;
  checkHealth: () => Promise<void>;
}
