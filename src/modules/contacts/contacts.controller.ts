import { NextFunction, Response } from 'express';
import { requireUser } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { auditLog } from '../../utils/logging';
import { ResponseHandler } from '../../utils/response';
import { idParamSchema, paginationSchema, searchQuerySchema } from '../../utils/validation';
import { ContactRepository } from './contacts.repository';
import { birthdayQuerySchema, contactSchema } from './contacts.validation';

/**
 * `owner` handlers act on the caller's contacts only; `all` handlers (admin
 * routes) see every contact.
 */
export type ContactScope = 'owner' | 'all';

export const createContactsController = (contacts: ContactRepository, scope: ContactScope = 'owner') => {
  const ownerOf = (req: AuthRequest): number | undefined =>
    scope === 'owner' ? requireUser(req).id : undefined;

  // GET /contacts
  const getContacts = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { limit, offset } = paginationSchema.parse(req.query);
      const result = await contacts.list({ limit, offset, ownerId: ownerOf(req) });

      return ResponseHandler.success(res, result, 'Contacts retrieved', 200, { limit, offset });
    } catch (error) {
      next(error);
    }
  };

  // GET /contacts/birthdays
  const getBirthdays = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { days, limit, offset } = birthdayQuerySchema.parse(req.query);
      const result = await contacts.birthdaysWithin({ days, limit, offset, ownerId: ownerOf(req) });

      return ResponseHandler.success(res, result, 'Upcoming birthdays retrieved', 200, { days, limit, offset });
    } catch (error) {
      next(error);
    }
  };

  // GET /contacts/search?query=
  const searchContacts = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { query } = searchQuerySchema.parse(req.query);
      const result = await contacts.search(query, ownerOf(req));

      if (result.length === 0) {
        return ResponseHandler.notFound(res, 'No contacts found');
      }
      return ResponseHandler.success(res, result, 'Contacts found');
    } catch (error) {
      next(error);
    }
  };

  // GET /contacts/:id
  const getContactById = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const contact = await contacts.get(id, ownerOf(req));

      return ResponseHandler.success(res, contact);
    } catch (error) {
      next(error);
    }
  };

  // POST /contacts
  const createContact = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const user = requireUser(req);
      const input = contactSchema.parse(req.body);
      const contact = await contacts.create(input, user.id);

      return ResponseHandler.created(res, contact, 'Contact created');
    } catch (error) {
      next(error);
    }
  };

  // PUT /contacts/:id
  const updateContact = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const input = contactSchema.parse(req.body);
      const contact = await contacts.update(id, input, ownerOf(req));

      return ResponseHandler.success(res, contact, 'Contact updated');
    } catch (error) {
      next(error);
    }
  };

  // DELETE /contacts/:id
  const deleteContact = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const contact = await contacts.delete(id, ownerOf(req));

      auditLog('contact.delete', { contactId: contact.id, userId: req.user?.id });
      return ResponseHandler.noContent(res);
    } catch (error) {
      next(error);
    }
  };

  return {
    getContacts,
    getBirthdays,
    searchContacts,
    getContactById,
    createContact,
    updateContact,
    deleteContact,
  };
};
