import express from 'express';
import { USER_ROLE } from '../../constants/user.constants';
import { AuthMiddleware } from '../../middlewares/auth.middleware';
import type { AppServices } from '../../types/services.types';
import { createContactsController } from '../contacts/contacts.controller';
import { createAdminController } from './admin.controller';

export const createAdminRoutes = (services: AppServices, auth: AuthMiddleware) => {
  const router = express.Router();
  const adminController = createAdminController(services);
  const contactsController = createContactsController(services.contacts, 'all');

  // All admin routes require admin role
  router.use(auth.authenticate);
  router.use(auth.requireRole(USER_ROLE.ADMIN));

  // Roles
  router.post('/roles', adminController.createRole);
  router.get('/roles', adminController.getRoles);
  router.patch('/users/:id/role', adminController.assignRole);

  // Contacts of every user
  router.get('/contacts', contactsController.getContacts);
  router.get('/contacts/birthdays', contactsController.getBirthdays);
  router.get('/contacts/search', contactsController.searchContacts);

  return router;
};
