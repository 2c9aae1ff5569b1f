import { faker } from '@faker-js/faker';
import container from '../../../main/config/container';
import type { LeanOrganization } from '../../../main/types/models/Organization';
import type { LeanUser } from '../../../main/types/models/User';
import type { Role } from '../../../main/types/permissions';

export const TEST_PASSWORD = 'test-password';

export interface TestAccount {
  user: LeanUser;
  organization: LeanOrganization;
  token: string;
}

export const uniqueEmail = (): string => `user.${faker.string.alphanumeric(12).toLowerCase()}@example.test`;

export const tokenFor = (userId: string, organizationId: string, role: Role): string =>
  container.resolve('credentialService').issueToken({ userId, organizationId, role }).token;

export const bearer = (token: string): string => `Bearer ${token}`;

// Creates a user directly through the repositories, owning an organization of their own
export const createTestAccount = async (name: string = faker.person.firstName()): Promise<TestAccount> => {
  const userRepository = container.resolve('userRepository');
  const organizationRepository = container.resolve('organizationRepository');
  const credentialService = container.resolve('credentialService');

  const created = await userRepository.create({
    email: uniqueEmail(),
    name,
    passwordHash: await credentialService.hashPassword(TEST_PASSWORD),
  });
  const organization = await organizationRepository.create({ name: `${name}'s Organization`, owner: created.id }, 'admin');
  await userRepository.setDefaultOrganization(created.id, organization.id);

  return {
    user: { ...created, defaultOrganizationId: organization.id },
    organization,
    token: tokenFor(created.id, organization.id, 'admin'),
  };
};
