import { NextFunction, Request, Response } from 'express';
import { toUserResponse } from '../../connections/db/models/user.model';
import { TOKEN_SCOPE } from '../../constants/auth.constants';
import { requireUser } from '../../middlewares/auth.middleware';
import type { AppServices } from '../../types/services.types';
import { AuthRequest } from '../../types/request.types';
import { AppError, ForbiddenError, InvalidTokenError, UnauthenticatedError } from '../../utils/errors';
import { auditLog, logger } from '../../utils/logging';
import { verifyPassword } from '../../utils/password';
import { ResponseHandler } from '../../utils/response';
import {
  confirmEmailParamsSchema,
  refreshSchema,
  registerSchema,
  requestEmailSchema,
  tokenSchema,
} from './auth.validation';

type AuthControllerDeps = Pick<AppServices, 'users' | 'tokens' | 'resolver' | 'mailer' | 'avatars' | 'settings'>;

const requestBaseUrl = (req: Request): string => `${req.protocol}://${req.get('host')}/`;

export const createAuthController = ({ users, tokens, resolver, mailer, avatars, settings }: AuthControllerDeps) => {
  const sendConfirmation = (email: string, username: string, req: Request) => {
    // Delivered after the response; failures only reach the log
    mailer
      .sendConfirmation({ email, username }, settings.baseUrl || requestBaseUrl(req))
      .catch((error: unknown) => {
        logger.error('Failed to send confirmation email', {
          email,
          error: error instanceof Error ? error.message : String(error),
        });
      });
  };

  // POST /auth/register
  const register = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = registerSchema.parse(req.body);
      const user = await users.createUser(input);

      auditLog('user.register', { userId: user.id, username: user.username, ip: req.ip });
      sendConfirmation(user.email, user.username, req);

      return ResponseHandler.created(res, toUserResponse(user), 'Registration successful. Check your email for confirmation.');
    } catch (error) {
      next(error);
    }
  };

  // POST /auth/token
  const login = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { username, password } = tokenSchema.parse(req.body);
      const user = await users.getUserByUsername(username);

      if (!user || !(await verifyPassword(password, user.password_hash))) {
        auditLog('user.login_failed', { username, ip: req.ip });
        throw new UnauthenticatedError('Incorrect username or password');
      }
      if (settings.requireConfirmedEmail && !user.is_active) {
        throw new ForbiddenError('Email address is not confirmed');
      }

      auditLog('user.login', { userId: user.id, ip: req.ip });
      return ResponseHandler.success(res, tokens.createTokenPair(user.email), 'Login successful');
    } catch (error) {
      next(error);
    }
  };

  // POST /auth/refresh
  const refresh = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { refresh_token } = refreshSchema.parse({
        refresh_token: req.body?.refresh_token ?? req.query.refresh_token,
      });

      let email: string;
      try {
        email = tokens.decode(refresh_token, TOKEN_SCOPE.REFRESH).subject;
      } catch (error) {
        if (error instanceof InvalidTokenError) {
          throw new UnauthenticatedError('Invalid refresh token');
        }
        throw error;
      }

      const user = await users.getUserByEmail(email);
      if (!user) {
        throw new UnauthenticatedError('Invalid refresh token');
      }

      return ResponseHandler.success(res, tokens.createTokenPair(user.email), 'Token refreshed');
    } catch (error) {
      next(error);
    }
  };

  // GET /auth/confirmed_email/:token
  const confirmedEmail = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { token } = confirmEmailParamsSchema.parse(req.params);

      let email: string;
      try {
        email = tokens.decodeEmailToken(token);
      } catch (error) {
        if (error instanceof AppError) {
          return ResponseHandler.badRequest(res, 'Verification error');
        }
        throw error;
      }

      const user = await users.getUserByEmail(email);
      if (!user) {
        logger.warn('Confirmation token for unknown email', { email });
        return ResponseHandler.badRequest(res, 'Verification error');
      }
      if (user.is_active) {
        return ResponseHandler.success(res, undefined, 'Your email is already confirmed');
      }

      await users.confirmEmail(email);
      auditLog('user.email_confirmed', { userId: user.id });

      return ResponseHandler.success(res, undefined, 'Email confirmed');
    } catch (error) {
      next(error);
    }
  };

  // POST /auth/request_email
  const requestEmail = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { email } = requestEmailSchema.parse(req.body);
      const user = await users.getUserByEmail(email);

      if (user?.is_active) {
        return ResponseHandler.success(res, undefined, 'Your email is already confirmed');
      }
      if (user) {
        sendConfirmation(user.email, user.username, req);
      }

      return ResponseHandler.success(res, undefined, 'Check your email for confirmation.');
    } catch (error) {
      next(error);
    }
  };

  // GET /auth/me
  const me = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      return ResponseHandler.success(res, requireUser(req));
    } catch (error) {
      next(error);
    }
  };

  // PATCH /auth/avatar
  const updateAvatar = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const current = requireUser(req);
      if (!req.file) {
        return ResponseHandler.badRequest(res, 'No file provided');
      }

      const { buffer, originalname, mimetype } = req.file;
      const url = await avatars.upload({ buffer, fileName: originalname, mimeType: mimetype }, current.username);
      const user = toUserResponse(await users.setAvatarUrl(current.email, url));

      await resolver.remember(user);
      auditLog('user.avatar_updated', { userId: user.id });

      return ResponseHandler.success(res, user, 'Avatar updated');
    } catch (error) {
      next(error);
    }
  };

  return { register, login, refresh, confirmedEmail, requestEmail, me, updateAvatar };
};
