import express from 'express';
import { createAuthMiddleware } from '../middlewares/auth.middleware';
import { createRateLimiters } from '../middlewares/rateLimit.middleware';
import { createAdminRoutes } from '../modules/admin/admin.routes';
import { createAuthRoutes } from '../modules/auth/auth.routes';
import { createContactsRoutes } from '../modules/contacts/contacts.routes';
import type { AppServices } from '../types/services.types';

export const createRoutes = (services: AppServices) => {
  const router = express.Router();
  const auth = createAuthMiddleware(services.resolver);
  const limiters = createRateLimiters(services.settings.rateLimitEnabled);

  // API Routes
  router.use('/auth', createAuthRoutes(services, auth, limiters));
  router.use('/contacts', createContactsRoutes(services, auth, limiters));
  router.use('/admin', createAdminRoutes(services, auth));

  return router;
};
