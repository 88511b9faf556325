/**
 * Role names. Stored in the roles table, unique by name.
 */
export const USER_ROLE = {
  USER: 'User', // default for new registrations
  ADMIN: 'Admin',
  MODERATOR: 'Moderator',
} as const;

export type RoleName = typeof USER_ROLE[keyof typeof USER_ROLE];

export const ROLE_NAMES: readonly RoleName[] = Object.values(USER_ROLE);

export const isRoleName = (value: string): value is RoleName =>
  ROLE_NAMES.some((role) => role === value);

// Roles allowed on the per-user contact endpoints
export const CONTACT_ROLES: readonly RoleName[] = [USER_ROLE.USER, USER_ROLE.ADMIN, USER_ROLE.MODERATOR];
