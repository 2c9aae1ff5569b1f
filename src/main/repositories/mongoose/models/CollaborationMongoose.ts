import mongoose, { Schema } from 'mongoose';

export interface CollaborationDocument {
  scopeKey: string;
  labAId: string;
  labBId: string;
  acceptedBy: string;
  acceptedAt: Date;
}

const collaborationSchema = new Schema<CollaborationDocument>(
  {
    scopeKey: { type: String, required: true },
    labAId: { type: String, required: true },
    labBId: { type: String, required: true },
    acceptedBy: { type: String, ref: 'User', required: true },
    acceptedAt: { type: Date, required: true },
  },
  { versionKey: false }
);

collaborationSchema.index({ scopeKey: 1, labAId: 1, labBId: 1 }, { unique: true });

const collaborationModel = mongoose.model<CollaborationDocument>('Collaboration', collaborationSchema, 'collaborations');

export default collaborationModel;
