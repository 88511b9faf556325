import { toUserResponse, UserResponse } from '../../connections/db/models/user.model';
import { TOKEN_SCOPE, USER_CACHE_TTL_SECONDS } from '../../constants/auth.constants';
import { AppError, UnauthenticatedError } from '../../utils/errors';
import { logger } from '../../utils/logging';
import { UserRepository } from '../users/users.repository';
import { TokenService } from './token.service';
import { UserCache } from './user-cache';

/**
 * Bearer token -> user, reading through the user cache.
 *
 * Cached entries are not invalidated on writes, so a role or activation change
 * reaches already-cached sessions only after the TTL.
 */
export class CurrentUserResolver {
  constructor(
    private readonly tokens: TokenService,
    private readonly users: Pick<UserRepository, 'getUserByEmail'>,
    private readonly cache: UserCache,
    private readonly ttlSeconds: number = USER_CACHE_TTL_SECONDS
  ) {}

  async resolve(token: string): Promise<UserResponse> {
    let email: string;
    try {
      email = this.tokens.decode(token, TOKEN_SCOPE.ACCESS).subject;
    } catch (error) {
      if (error instanceof AppError) {
        throw new UnauthenticatedError();
      }
      throw error;
    }

    const cached = await this.readCache(email);
    if (cached) {
      return cached;
    }

    const user = await this.users.getUserByEmail(email);
    if (!user) {
      throw new UnauthenticatedError();
    }

    const response = toUserResponse(user);
    await this.remember(response);
    return response;
  }

  async remember(user: UserResponse): Promise<void> {
    try {
      await this.cache.set(user.email, toUserResponse(user), this.ttlSeconds);
    } catch (error) {
      logger.warn('User cache write failed', {
        email: user.email,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async readCache(email: string): Promise<UserResponse | null> {
    try {
      return await this.cache.get(email);
    } catch (error) {
      logger.warn('User cache read failed, falling back to database', {
        email,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
