import type { LeanOrganization, NewOrganization, OrganizationMember } from '../../types/models/Organization';
import type { Role } from '../../types/permissions';
import type { OrganizationRepository } from '../types';
import OrganizationMongoose, { type OrganizationDocument } from './models/OrganizationMongoose';

function toLeanOrganization(doc: OrganizationDocument): LeanOrganization {
  return {
    id: doc._id,
    name: doc.name,
    description: doc.description ?? null,
    owner: doc.owner,
    members: doc.members.map(member => ({
      userId: member.userId,
      role: member.role,
      joinedAt: member.joinedAt,
    })),
    createdAt: doc.createdAt,
  };
}

class MongooseOrganizationRepository implements OrganizationRepository {
  async findById(organizationId: string): Promise<LeanOrganization | null> {
    const organization = await OrganizationMongoose.findOne({ _id: organizationId })
      .lean<OrganizationDocument>()
      .exec();

    return organization ? toLeanOrganization(organization) : null;
  }

  async findByMember(userId: string): Promise<LeanOrganization[]> {
    const organizations = await OrganizationMongoose.find({ 'members.userId': userId })
      .sort({ createdAt: 1 })
      .lean<OrganizationDocument[]>()
      .exec();

    return organizations.map(toLeanOrganization);
  }

  async create(organizationData: NewOrganization, ownerRole: Role): Promise<LeanOrganization> {
    const organization = await new OrganizationMongoose({
      name: organizationData.name,
      description: organizationData.description ?? null,
      owner: organizationData.owner,
      members: [{ userId: organizationData.owner, role: ownerRole, joinedAt: new Date() }],
    }).save();

    return toLeanOrganization(organization);
  }

  async addMember(organizationId: string, userId: string, role: Role): Promise<OrganizationMember> {
    await OrganizationMongoose.updateOne(
      { _id: organizationId, 'members.userId': { $ne: userId } },
      { $push: { members: { userId, role, joinedAt: new Date() } } }
    ).exec();

    const organization = await this.findById(organizationId);
    const member = organization?.members.find(m => m.userId === userId);
    if (!member) {
      throw new Error(`Organization with id ${organizationId} not found.`);
    }

    return member;
  }

  async updateMemberRole(organizationId: string, userId: string, role: Role): Promise<boolean> {
    const result = await OrganizationMongoose.updateOne(
      { _id: organizationId, 'members.userId': userId },
      { $set: { 'members.$.role': role } }
    ).exec();

    return result.matchedCount > 0;
  }

  async removeMember(organizationId: string, userId: string): Promise<boolean> {
    const result = await OrganizationMongoose.updateOne(
      { _id: organizationId },
      { $pull: { members: { userId } } }
    ).exec();

    return result.modifiedCount > 0;
  }
}

export default MongooseOrganizationRepository;
