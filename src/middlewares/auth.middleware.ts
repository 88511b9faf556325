import { Request, Response, NextFunction } from 'express';
import { UserResponse } from '../connections/db/models/user.model';
import { RoleName } from '../constants/user.constants';
import { authorize } from '../modules/auth/authorize';
import { CurrentUserResolver } from '../modules/auth/current-user.service';
import { AuthRequest } from '../types/request.types';
import { UnauthenticatedError } from '../utils/errors';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

export const bearerToken = (req: Request): string | null => {
  const header = req.headers.authorization;
  if (!header) {
    return null;
  }
  const [scheme, token] = header.split(' ');
  if (scheme.toLowerCase() !== 'bearer' || !token) {
    return null;
  }
  return token;
};

/**
 * The authenticated user, for handlers mounted behind `authenticate`.
 */
export const requireUser = (req: AuthRequest): UserResponse => {
  if (!req.user) {
    throw new UnauthenticatedError();
  }
  return req.user;
};

export const createAuthMiddleware = (resolver: CurrentUserResolver) => {
  const authenticate = async (req: AuthRequest, res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token) {
      return ResponseHandler.unauthorized(res);
    }

    try {
      req.user = await resolver.resolve(token);
    } catch (error) {
      if (error instanceof UnauthenticatedError) {
        return ResponseHandler.unauthorized(res);
      }
      return next(error);
    }

    next();
  };

  const requireRole = (...roles: RoleName[]) => {
    return (req: AuthRequest, res: Response, next: NextFunction) => {
      if (!req.user) {
        return ResponseHandler.unauthorized(res);
      }

      const decision = authorize(req.user, roles);
      if (!decision.allowed) {
        logger.warn('[Forbidden]', { userId: req.user.id, path: req.originalUrl, reason: decision.reason });
        return ResponseHandler.forbidden(res);
      }

      next();
    };
  };

  return { authenticate, requireRole };
};

export type AuthMiddleware = ReturnType<typeof createAuthMiddleware>;
