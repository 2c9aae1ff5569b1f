import type { Role } from '../permissions';

export type InvitationStatus = 'pending' | 'accepted' | 'rejected';

export interface LeanInvitation {
  id: string;
  organizationId: string;
  email: string;
  role: Role;
  status: InvitationStatus;
  invitedBy: string;
  createdAt: Date;
  respondedAt: Date | null;
}

export interface NewInvitation {
  organizationId: string;
  email: string;
  role: Role;
  invitedBy: string;
}

export interface InvitationView extends LeanInvitation {
  organizationName: string;
}
