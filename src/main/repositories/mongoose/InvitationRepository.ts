import type { InvitationStatus, LeanInvitation, NewInvitation } from '../../types/models/Invitation';
import type { InvitationRepository } from '../types';
import InvitationMongoose, { type InvitationDocument } from './models/InvitationMongoose';

function toLeanInvitation(doc: InvitationDocument): LeanInvitation {
  return {
    id: doc._id,
    organizationId: doc.organizationId,
    email: doc.email,
    role: doc.role,
    status: doc.status,
    invitedBy: doc.invitedBy,
    createdAt: doc.createdAt,
    respondedAt: doc.respondedAt ?? null,
  };
}

class MongooseInvitationRepository implements InvitationRepository {
  async findById(invitationId: string): Promise<LeanInvitation | null> {
    const invitation = await InvitationMongoose.findOne({ _id: invitationId }).lean<InvitationDocument>().exec();
    return invitation ? toLeanInvitation(invitation) : null;
  }

  async findByOrganization(organizationId: string): Promise<LeanInvitation[]> {
    const invitations = await InvitationMongoose.find({ organizationId })
      .sort({ createdAt: -1 })
      .lean<InvitationDocument[]>()
      .exec();
    return invitations.map(toLeanInvitation);
  }

  async findPendingByEmail(email: string): Promise<LeanInvitation[]> {
    const invitations = await InvitationMongoose.find({ email: email.toLowerCase(), status: 'pending' })
      .sort({ createdAt: -1 })
      .lean<InvitationDocument[]>()
      .exec();
    return invitations.map(toLeanInvitation);
  }

  async findPending(organizationId: string, email: string): Promise<LeanInvitation | null> {
    const invitation = await InvitationMongoose.findOne({
      organizationId,
      email: email.toLowerCase(),
      status: 'pending',
    })
      .lean<InvitationDocument>()
      .exec();
    return invitation ? toLeanInvitation(invitation) : null;
  }

  async create(invitationData: NewInvitation): Promise<LeanInvitation> {
    const invitation = await new InvitationMongoose(invitationData).save();
    return toLeanInvitation(invitation);
  }

  async resolvePending(
    invitationId: string,
    status: Exclude<InvitationStatus, 'pending'>,
    respondedAt: Date
  ): Promise<LeanInvitation | null> {
    const invitation = await InvitationMongoose.findOneAndUpdate(
      { _id: invitationId, status: 'pending' },
      { $set: { status, respondedAt } },
      { new: true }
    )
      .lean<InvitationDocument>()
      .exec();

    return invitation ? toLeanInvitation(invitation) : null;
  }

  async reopen(invitationId: string, status: Exclude<InvitationStatus, 'pending'>): Promise<void> {
    await InvitationMongoose.updateOne({ _id: invitationId, status }, { $set: { status: 'pending', respondedAt: null } }).exec();
  }
}

export default MongooseInvitationRepository;
