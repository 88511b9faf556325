import request from 'supertest';
import { createApp } from '../../src/app';
import { RoleName } from '../../src/constants/user.constants';
import { CurrentUserResolver } from '../../src/modules/auth/current-user.service';
import { TokenService } from '../../src/modules/auth/token.service';
import type { AppServices, AppSettings } from '../../src/types/services.types';
import {
  FakeAvatarStorage,
  InMemoryContactRepository,
  InMemoryRoleRepository,
  InMemoryUserCache,
  InMemoryUserRepository,
  RecordingMailer,
} from './memory';

export const TEST_SECRET = 'test-secret';

export const createTestContext = (settings: Partial<AppSettings> = {}) => {
  const tokens = new TokenService({ secret: TEST_SECRET, algorithm: 'HS256' });
  const roles = new InMemoryRoleRepository();
  const users = new InMemoryUserRepository(roles);
  const contacts = new InMemoryContactRepository();
  const cache = new InMemoryUserCache();
  const mailer = new RecordingMailer();
  const avatars = new FakeAvatarStorage();
  const resolver = new CurrentUserResolver(tokens, users, cache);

  const services: AppServices = {
    users,
    roles,
    contacts,
    tokens,
    resolver,
    mailer,
    avatars,
    settings: {
      requireConfirmedEmail: false,
      rateLimitEnabled: false,
      baseUrl: 'http://contacts.test/',
      frontendUrl: '',
      corsOrigins: [],
      nodeEnv: 'test',
      uploadDir: 'uploads',
      ...settings,
    },
    checkHealth: async () => undefined,
  };

  return { app: createApp(services), services, tokens, roles, users, contacts, cache, mailer, avatars };
};

export type TestContext = ReturnType<typeof createTestContext>;

/**
 * Registers a user through the API, optionally gives it another role, and
 * returns the user together with a valid access token.
 */
export const signUp = async (
  ctx: TestContext,
  username: string,
  options: { role?: RoleName; password?: string } = {}
) => {
  const password = options.password ?? 'pw123456';
  const email = `${username}@example.com`;

  const registered = await request(ctx.app).post('/api/auth/register').send({ username, email, password });
  if (registered.status !== 201) {
    throw new Error(`register failed with ${registered.status}`);
  }

  if (options.role) {
    await ctx.roles.ensureRole(options.role);
    const user = await ctx.users.getUserByEmail(email);
    if (!user) {
      throw new Error('registered user not found');
    }
    await ctx.users.assignRole(user.id, options.role);
  }

  const user = await ctx.users.getUserByEmail(email);
  if (!user) {
    throw new Error('registered user not found');
  }
  return { user, token: ctx.tokens.createAccessToken({ sub: email }) };
};
