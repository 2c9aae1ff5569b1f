import type { AcceptedCollaboration } from '../types/models/Collaboration';
import type { InvitationStatus, LeanInvitation, NewInvitation } from '../types/models/Invitation';
import type { LeanOrganization, NewOrganization, OrganizationMember } from '../types/models/Organization';
import type { LeanUser, NewUser } from '../types/models/User';
import type { Role } from '../types/permissions';

export interface UserRepository {
  findById(id: string): Promise<LeanUser | null>;
  findByIds(ids: string[]): Promise<LeanUser[]>;
  findByEmail(email: string): Promise<LeanUser | null>;
  create(data: NewUser): Promise<LeanUser>;
  setDefaultOrganization(userId: string, organizationId: string): Promise<void>;
}

export interface OrganizationRepository {
  findById(id: string): Promise<LeanOrganization | null>;
  findByMember(userId: string): Promise<LeanOrganization[]>;
  create(data: NewOrganization, ownerRole: Role): Promise<LeanOrganization>;
  /** Adds the member unless already present; returns the membership now stored. */
  addMember(organizationId: string, userId: string, role: Role): Promise<OrganizationMember>;
  updateMemberRole(organizationId: string, userId: string, role: Role): Promise<boolean>;
  removeMember(organizationId: string, userId: string): Promise<boolean>;
}

export interface InvitationRepository {
  findById(id: string): Promise<LeanInvitation | null>;
  findByOrganization(organizationId: string): Promise<LeanInvitation[]>;
  findPendingByEmail(email: string): Promise<LeanInvitation[]>;
  findPending(organizationId: string, email: string): Promise<LeanInvitation | null>;
  create(data: NewInvitation): Promise<LeanInvitation>;
  /**
   * Moves a pending invitation to a terminal status. Resolves to null when the
   * invitation is no longer pending, so that only one responder wins.
   */
  resolvePending(id: string, status: Exclude<InvitationStatus, 'pending'>, respondedAt: Date): Promise<LeanInvitation | null>;
  /** Puts an invitation answered with `status` back to pending. */
  reopen(id: string, status: Exclude<InvitationStatus, 'pending'>): Promise<void>;
}

export interface CollaborationRepository {
  findByScope(scopeKey: string): Promise<AcceptedCollaboration[]>;
  /** Idempotent: returns the stored decision when the pair was already accepted. */
  markAccepted(decision: AcceptedCollaboration): Promise<AcceptedCollaboration>;
}
