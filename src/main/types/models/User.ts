import type { Role } from '../permissions';

export interface LeanUser {
  id: string;
  email: string;
  name: string;
  passwordHash: string;
  isActive: boolean;
  defaultOrganizationId: string | null;
  createdAt: Date;
}

export type PublicUser = Omit<LeanUser, 'passwordHash'>;

export interface NewUser {
  email: string;
  name: string;
  passwordHash: string;
}

/**
 * Identity triple carried inside a bearer token. Never read from request bodies.
 */
export interface Principal {
  userId: string;
  organizationId: string;
  role: Role;
}

export interface AuthenticatedSession {
  accessToken: string;
  tokenType: 'bearer';
  expiresAt: string;
  user: PublicUser;
  organizationId: string;
  role: Role;
}

export function toPublicUser(user: LeanUser): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}
