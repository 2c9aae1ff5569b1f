import { Schema } from 'mongoose';
import { ROLES, type Role } from '../../../../types/permissions';

export interface OrganizationMemberDocument {
  userId: string;
  role: Role;
  joinedAt: Date;
}

const organizationMemberSchema = new Schema<OrganizationMemberDocument>(
  {
    userId: {
      type: String,
      ref: 'User',
      required: true,
    },
    role: {
      type: String,
      enum: [...ROLES],
      required: true,
      default: 'member',
    },
    joinedAt: { type: Date, required: true, default: () => new Date() },
  },
  { _id: false }
);

export default organizationMemberSchema;
