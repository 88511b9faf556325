import express from 'express';
import { CONTACT_ROLES } from '../../constants/user.constants';
import { AuthMiddleware } from '../../middlewares/auth.middleware';
import { RateLimiters } from '../../middlewares/rateLimit.middleware';
import type { AppServices } from '../../types/services.types';
import { createContactsController } from './contacts.controller';

export const createContactsRoutes = (services: AppServices, auth: AuthMiddleware, limiters: RateLimiters) => {
  const router = express.Router();
  const contactsController = createContactsController(services.contacts);

  router.use(auth.authenticate, auth.requireRole(...CONTACT_ROLES), limiters.contacts);

  // Fixed paths before /:id
  router.get('/birthdays', contactsController.getBirthdays);
  router.get('/search', contactsController.searchContacts);

  router.get('/', contactsController.getContacts);
  router.get('/:id', contactsController.getContactById);
  router.post('/', contactsController.createContact);
  router.put('/:id', contactsController.updateContact);
  router.delete('/:id', contactsController.deleteContact);

  return router;
};
