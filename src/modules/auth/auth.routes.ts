import express from 'express';
import { AuthMiddleware } from '../../middlewares/auth.middleware';
import { RateLimiters } from '../../middlewares/rateLimit.middleware';
import type { AppServices } from '../../types/services.types';
import { avatarUploadMiddleware } from '../upload/upload.middleware';
import { createAuthController } from './auth.controller';

export const createAuthRoutes = (services: AppServices, auth: AuthMiddleware, limiters: RateLimiters) => {
  const router = express.Router();
  const authController = createAuthController(services);

  router.post('/register', limiters.auth, authController.register);
  router.post('/token', limiters.auth, authController.login);
  router.post('/refresh', authController.refresh);

  // Email confirmation
  router.get('/confirmed_email/:token', authController.confirmedEmail);
  router.post('/request_email', authController.requestEmail);

  router.get('/me', auth.authenticate, limiters.profile, authController.me);
  router.patch(
    '/avatar',
    auth.authenticate,
    limiters.profile,
    avatarUploadMiddleware,
    authController.updateAvatar
  );

  return router;
};
