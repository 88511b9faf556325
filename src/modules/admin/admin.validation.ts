import { z } from 'zod';
import { USER_ROLE } from '../../constants/user.constants';

const roleNameSchema = z.enum([USER_ROLE.USER, USER_ROLE.ADMIN, USER_ROLE.MODERATOR], {
  errorMap: () => ({ message: 'Role must be one of User, Admin, Moderator' }),
});

export const createRoleSchema = z.object({
  name: roleNameSchema,
});

export const assignRoleSchema = z.object({
  role: roleNameSchema,
});
