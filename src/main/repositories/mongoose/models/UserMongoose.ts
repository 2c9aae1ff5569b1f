import mongoose, { Schema } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';

export interface UserDocument {
  _id: string;
  email: string;
  name: string;
  passwordHash: string;
  isActive: boolean;
  defaultOrganizationId: string | null;
  createdAt: Date;
}

const userSchema = new Schema<UserDocument>(
  {
    _id: { type: String, default: () => uuidv4() },
    email: { type: String, required: true, unique: true, lowercase: true, trim: true },
    name: { type: String, required: true },
    passwordHash: { type: String, required: true },
    isActive: { type: Boolean, default: true },
    defaultOrganizationId: { type: String, ref: 'Organization', default: null },
    createdAt: { type: Date, default: () => new Date() },
  },
  { versionKey: false }
);

const userModel = mongoose.model<UserDocument>('User', userSchema, 'users');

export default userModel;
