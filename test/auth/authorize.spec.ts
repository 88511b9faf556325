import { describe, it, expect } from 'vitest';
import { USER_ROLE } from '../../src/constants/user.constants';
import { authorize } from '../../src/modules/auth/authorize';

describe('authorize', () => {
  it('allows a role on the list', () => {
    expect(authorize({ role: USER_ROLE.USER }, [USER_ROLE.USER, USER_ROLE.ADMIN])).toEqual({ allowed: true });
  });

  it('refuses a role missing from the list', () => {
    expect(authorize({ role: USER_ROLE.MODERATOR }, [USER_ROLE.ADMIN])).toEqual({
      allowed: false,
      reason: 'Role Moderator is not allowed',
    });
  });

  it('refuses a user without a role', () => {
    expect(authorize({ role: null }, [USER_ROLE.USER, USER_ROLE.ADMIN, USER_ROLE.MODERATOR])).toEqual({
      allowed: false,
      reason: 'User has no role',
    });
  });
});
