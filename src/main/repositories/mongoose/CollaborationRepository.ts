import type { AcceptedCollaboration } from '../../types/models/Collaboration';
import type { CollaborationRepository } from '../types';
import CollaborationMongoose, { type CollaborationDocument } from './models/CollaborationMongoose';

function toAcceptedCollaboration(doc: CollaborationDocument): AcceptedCollaboration {
  return {
    scopeKey: doc.scopeKey,
    labAId: doc.labAId,
    labBId: doc.labBId,
    acceptedBy: doc.acceptedBy,
    acceptedAt: doc.acceptedAt,
  };
}

class MongooseCollaborationRepository implements CollaborationRepository {
  async findByScope(scopeKey: string): Promise<AcceptedCollaboration[]> {
    const collaborations = await CollaborationMongoose.find({ scopeKey })
      .sort({ acceptedAt: 1 })
      .lean<CollaborationDocument[]>()
      .exec();
    return collaborations.map(toAcceptedCollaboration);
  }

  async markAccepted(decision: AcceptedCollaboration): Promise<AcceptedCollaboration> {
    const stored = await CollaborationMongoose.findOneAndUpdate(
      { scopeKey: decision.scopeKey, labAId: decision.labAId, labBId: decision.labBId },
      { $setOnInsert: { acceptedBy: decision.acceptedBy, acceptedAt: decision.acceptedAt } },
      { upsert: true, new: true }
    )
      .lean<CollaborationDocument>()
      .exec();

    return stored ? toAcceptedCollaboration(stored) : decision;
  }
}

export default MongooseCollaborationRepository;
