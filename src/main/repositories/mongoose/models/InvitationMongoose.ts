import mongoose, { Schema } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import type { InvitationStatus } from '../../../types/models/Invitation';
import { ROLES, type Role } from '../../../types/permissions';

export interface InvitationDocument {
  _id: string;
  organizationId: string;
  email: string;
  role: Role;
  status: InvitationStatus;
  invitedBy: string;
  createdAt: Date;
  respondedAt: Date | null;
}

const invitationSchema = new Schema<InvitationDocument>(
  {
    _id: { type: String, default: () => uuidv4() },
    organizationId: { type: String, ref: 'Organization', required: true },
    email: { type: String, required: true, lowercase: true, trim: true },
    role: { type: String, enum: [...ROLES], default: 'member' },
    status: { type: String, enum: ['pending', 'accepted', 'rejected'], default: 'pending' },
    invitedBy: { type: String, ref: 'User', required: true },
    createdAt: { type: Date, default: () => new Date() },
    respondedAt: { type: Date, default: null },
  },
  { versionKey: false }
);

invitationSchema.index({ email: 1, status: 1 });
invitationSchema.index({ organizationId: 1 });

const invitationModel = mongoose.model<InvitationDocument>('Invitation', invitationSchema, 'invitations');

export default invitationModel;
