import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CurrentUserResolver } from '../../src/modules/auth/current-user.service';
import { TokenService } from '../../src/modules/auth/token.service';
import { RepositoryError, UnauthenticatedError } from '../../src/utils/errors';
import { InMemoryRoleRepository, InMemoryUserCache, InMemoryUserRepository } from '../helpers/memory';

describe('CurrentUserResolver', () => {
  const tokens = new TokenService({ secret: 'test-secret', algorithm: 'HS256' });
  let users: InMemoryUserRepository;
  let cache: InMemoryUserCache;
  let resolver: CurrentUserResolver;

  beforeEach(async () => {
    users = new InMemoryUserRepository(new InMemoryRoleRepository());
    cache = new InMemoryUserCache();
    resolver = new CurrentUserResolver(tokens, users, cache);
    await users.createUser({ username: 'alice', email: 'alice@example.com', password: 'pw123456' });
  });

  it('loads the user on a cache miss and caches it for 300 seconds', async () => {
    const user = await resolver.resolve(tokens.createAccessToken({ sub: 'alice@example.com' }));

    expect(user).toEqual({
      id: 1,
      username: 'alice',
      email: 'alice@example.com',
      is_active: false,
      avatar_url: null,
      role: 'User',
    });
    expect(cache.entries.get('alice@example.com')).toEqual({ user, ttlSeconds: 300 });
  });

  it('serves cached users without consulting the directory', async () => {
    await cache.set(
      'alice@example.com',
      { id: 1, username: 'alice', email: 'alice@example.com', is_active: true, avatar_url: null, role: 'Admin' },
      300
    );
    const lookup = vi.spyOn(users, 'getUserByEmail');

    const user = await resolver.resolve(tokens.createAccessToken({ sub: 'alice@example.com' }));

    expect(user.role).toBe('Admin');
    expect(lookup).not.toHaveBeenCalled();
  });

  it('rejects refresh tokens and garbage as unauthenticated', async () => {
    await expect(resolver.resolve(tokens.createRefreshToken({ sub: 'alice@example.com' }))).rejects.toBeInstanceOf(
      UnauthenticatedError
    );
    await expect(resolver.resolve('garbage')).rejects.toBeInstanceOf(UnauthenticatedError);
  });

  it('rejects tokens for users that no longer exist', async () => {
    await expect(resolver.resolve(tokens.createAccessToken({ sub: 'ghost@example.com' }))).rejects.toBeInstanceOf(
      UnauthenticatedError
    );
    expect(cache.entries.size).toBe(0);
  });

  it('falls back to the directory when the cache is unavailable', async () => {
    vi.spyOn(cache, 'get').mockRejectedValue(new Error('cache down'));
    vi.spyOn(cache, 'set').mockRejectedValue(new Error('cache down'));

    const user = await resolver.resolve(tokens.createAccessToken({ sub: 'alice@example.com' }));

    expect(user.email).toBe('alice@example.com');
  });

  it('propagates directory failures instead of reporting them as bad credentials', async () => {
    vi.spyOn(users, 'getUserByEmail').mockRejectedValue(new RepositoryError());

    await expect(resolver.resolve(tokens.createAccessToken({ sub: 'alice@example.com' }))).rejects.toBeInstanceOf(
      RepositoryError
    );
  });

  it('remember() overwrites the cached entry', async () => {
    await resolver.resolve(tokens.createAccessToken({ sub: 'alice@example.com' }));
    await resolver.remember({
      id: 1,
      username: 'alice',
      email: 'alice@example.com',
      is_active: false,
      avatar_url: 'https://images.test/avatars/alice',
      role: 'User',
    });

    expect(cache.entries.get('alice@example.com')?.user.avatar_url).toBe('https://images.test/avatars/alice');
  });
});
