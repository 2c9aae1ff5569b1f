import mongoose, { Schema } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import organizationMemberSchema, { type OrganizationMemberDocument } from './schemas/OrganizationMember';

export interface OrganizationDocument {
  _id: string;
  name: string;
  description: string | null;
  owner: string;
  members: OrganizationMemberDocument[];
  createdAt: Date;
}

const organizationSchema = new Schema<OrganizationDocument>(
  {
    _id: { type: String, default: () => uuidv4() },
    name: { type: String, required: true },
    description: { type: String, default: null },
    owner: {
      type: String,
      ref: 'User',
      required: true,
    },
    members: {
      type: [organizationMemberSchema],
      default: [],
    },
    createdAt: { type: Date, default: () => new Date() },
  },
  { versionKey: false }
);

organizationSchema.index({ name: 1 });
organizationSchema.index({ 'members.userId': 1 });

const organizationModel = mongoose.model<OrganizationDocument>('Organization', organizationSchema, 'organizations');

export default organizationModel;
