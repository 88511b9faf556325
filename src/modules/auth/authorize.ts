import { UserResponse } from '../../connections/db/models/user.model';
import { RoleName } from '../../constants/user.constants';

export type Authorization = { allowed: true } | { allowed: false; reason: string };

export const authorize = (
  user: Pick<UserResponse, 'role'>,
  allowedRoles: readonly RoleName[]
): Authorization => {
  if (user.role === null) {
    return { allowed: false, reason: 'User has no role' };
  }
  if (!allowedRoles.includes(user.role)) {
    return { allowed: false, reason: `Role ${user.role} is not allowed` };
  }
  return { allowed: true };
};
