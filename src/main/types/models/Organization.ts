import type { Role } from '../permissions';

export interface OrganizationMember {
  userId: string;
  role: Role;
  joinedAt: Date;
}

export interface LeanOrganization {
  id: string;
  name: string;
  description: string | null;
  owner: string;
  members: OrganizationMember[];
  createdAt: Date;
}

export interface NewOrganization {
  name: string;
  description?: string | null;
  owner: string;
}

export interface Membership {
  userId: string;
  organizationId: string;
  organizationName: string;
  role: Role;
}

/**
 * Resolved tenant scope of a request: the organization the token selects and the
 * role the caller currently holds in it.
 */
export interface OrganizationContext {
  organizationId: string;
  userId: string;
  role: Role;
}

export interface OrganizationMemberView extends OrganizationMember {
  name: string;
  email: string;
  isOwner: boolean;
}
