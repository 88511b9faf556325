import { NextFunction, Response } from 'express';
import { toUserResponse } from '../../connections/db/models/user.model';
import type { AppServices } from '../../types/services.types';
import { AuthRequest } from '../../types/request.types';
import { auditLog } from '../../utils/logging';
import { ResponseHandler } from '../../utils/response';
import { idParamSchema } from '../../utils/validation';
import { assignRoleSchema, createRoleSchema } from './admin.validation';

export const createAdminController = ({ roles, users }: Pick<AppServices, 'roles' | 'users'>) => {
  // POST /admin/roles
  const createRole = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { name } = createRoleSchema.parse(req.body);
      const role = await roles.createRole(name);

      auditLog('role.create', { roleId: role.id, name, adminId: req.user?.id });
      return ResponseHandler.created(res, role, 'Role created');
    } catch (error) {
      next(error);
    }
  };

  // GET /admin/roles
  const getRoles = async (_req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      return ResponseHandler.success(res, await roles.listRoles());
    } catch (error) {
      next(error);
    }
  };

  // PATCH /admin/users/:id/role
  const assignRole = async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const { role } = assignRoleSchema.parse(req.body);
      const user = await users.assignRole(id, role);

      auditLog('user.role_assigned', { userId: user.id, role, adminId: req.user?.id });
      return ResponseHandler.success(res, toUserResponse(user), 'Role assigned');
    } catch (error) {
      next(error);
    }
  };

  return { createRole, getRoles, assignRole };
};
