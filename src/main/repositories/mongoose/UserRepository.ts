import type { LeanUser, NewUser } from '../../types/models/User';
import type { UserRepository } from '../types';
import UserMongoose, { type UserDocument } from './models/UserMongoose';

function toLeanUser(doc: UserDocument): LeanUser {
  return {
    id: doc._id,
    email: doc.email,
    name: doc.name,
    passwordHash: doc.passwordHash,
    isActive: doc.isActive,
    defaultOrganizationId: doc.defaultOrganizationId ?? null,
    createdAt: doc.createdAt,
  };
}

class MongooseUserRepository implements UserRepository {
  async findById(userId: string): Promise<LeanUser | null> {
    const user = await UserMongoose.findOne({ _id: userId }).lean<UserDocument>().exec();
    return user ? toLeanUser(user) : null;
  }

  async findByIds(userIds: string[]): Promise<LeanUser[]> {
    const users = await UserMongoose.find({ _id: { $in: userIds } }).lean<UserDocument[]>().exec();
    return users.map(toLeanUser);
  }

  async findByEmail(email: string): Promise<LeanUser | null> {
    const user = await UserMongoose.findOne({ email: email.trim().toLowerCase() }).lean<UserDocument>().exec();
    return user ? toLeanUser(user) : null;
  }

  async create(userData: NewUser): Promise<LeanUser> {
    const user = await new UserMongoose(userData).save();
    return toLeanUser(user);
  }

  async setDefaultOrganization(userId: string, organizationId: string): Promise<void> {
    await UserMongoose.updateOne({ _id: userId }, { $set: { defaultOrganizationId: organizationId } }).exec();
  }
}

export default MongooseUserRepository;
