import { ROLES, type Role } from '../types/permissions';

export function roleRank(role: Role): number {
  return ROLES.indexOf(role);
}

/**
 * Negative when `a` ranks below `b`, zero when equal, positive when above.
 */
export function compareRoles(a: Role, b: Role): number {
  return roleRank(a) - roleRank(b);
}

export function hasAtLeastRole(role: Role, required: Role): boolean {
  return compareRoles(role, required) >= 0;
}

export function isRole(value: unknown): value is Role {
  return ROLES.some(role => role === value);
}
