import type { Logger } from 'pino';
import type { Cradle } from '../config/container';
import type {
  LeanOrganization,
  Membership,
  OrganizationContext,
  OrganizationMember,
  OrganizationMemberView,
} from '../types/models/Organization';
import type { Principal } from '../types/models/User';
import type { Role } from '../types/permissions';
import { AuthzError, NotFoundError } from '../utils/errors';
import { hasAtLeastRole } from '../utils/roles';

export interface OrganizationInput {
  name: string;
  description?: string | null;
}

function toMembership(organization: LeanOrganization, member: OrganizationMember): Membership {
  return {
    userId: member.userId,
    organizationId: organization.id,
    organizationName: organization.name,
    role: member.role,
  };
}

class OrganizationService {
  private readonly organizationRepository: Cradle['organizationRepository'];
  private readonly userRepository: Cradle['userRepository'];
  private readonly logger: Logger;

  constructor({ organizationRepository, userRepository, logger }: Pick<Cradle, 'organizationRepository' | 'userRepository' | 'logger'>) {
    this.organizationRepository = organizationRepository;
    this.userRepository = userRepository;
    this.logger = logger.child({ component: 'organizations' });
  }

  /**
   * Resolves the organization selected by the token into the role the caller
   * holds there now. The role inside the token is never trusted on its own.
   */
  async resolveScope(principal: Principal): Promise<OrganizationContext> {
    const membership = await this.membership(principal.userId, principal.organizationId);
    if (!membership) {
      throw new AuthzError(
        'NoActiveOrganization',
        `You are no longer a member of organization ${principal.organizationId}`
      );
    }

    return {
      organizationId: membership.organizationId,
      userId: membership.userId,
      role: membership.role,
    };
  }

  authorize(context: OrganizationContext, requiredRole: Role): void {
    if (!hasAtLeastRole(context.role, requiredRole)) {
      throw new AuthzError(
        'Forbidden',
        `Your organization role (${context.role}) is below the required role (${requiredRole})`
      );
    }
  }

  async membership(userId: string, organizationId: string): Promise<Membership | null> {
    const organization = await this.organizationRepository.findById(organizationId);
    const member = organization?.members.find(m => m.userId === userId);
    return organization && member ? toMembership(organization, member) : null;
  }

  async listMine(userId: string): Promise<Membership[]> {
    const organizations = await this.organizationRepository.findByMember(userId);
    return organizations.flatMap(organization =>
      organization.members.filter(m => m.userId === userId).map(member => toMembership(organization, member))
    );
  }

  async create(userId: string, data: OrganizationInput): Promise<LeanOrganization> {
    const organization = await this.organizationRepository.create(
      { name: data.name.trim(), description: data.description ?? null, owner: userId },
      'admin'
    );
    this.logger.info({ organizationId: organization.id, owner: userId }, 'Organization created');
    return organization;
  }

  /**
   * Only the organization of the request scope is visible; any other id is
   * reported as missing.
   */
  async getScoped(context: OrganizationContext, organizationId: string): Promise<LeanOrganization> {
    const organization =
      organizationId === context.organizationId
        ? await this.organizationRepository.findById(organizationId)
        : null;

    if (!organization) {
      throw new NotFoundError(`Organization with ID ${organizationId} not found`);
    }
    return organization;
  }

  async current(context: OrganizationContext): Promise<LeanOrganization> {
    return this.getScoped(context, context.organizationId);
  }

  async listMembers(context: OrganizationContext, organizationId: string): Promise<OrganizationMemberView[]> {
    const organization = await this.getScoped(context, organizationId);
    const users = await this.userRepository.findByIds(organization.members.map(m => m.userId));
    const usersById = new Map(users.map(user => [user.id, user]));

    return organization.members.map(member => ({
      ...member,
      name: usersById.get(member.userId)?.name ?? '',
      email: usersById.get(member.userId)?.email ?? '',
      isOwner: member.userId === organization.owner,
    }));
  }

  async updateMemberRole(
    context: OrganizationContext,
    organizationId: string,
    userId: string,
    role: Role
  ): Promise<OrganizationMember> {
    const organization = await this.getScoped(context, organizationId);
    this.authorize(context, 'admin');
    this.protectOwner(organization, userId, 'demoted');

    const updated = await this.organizationRepository.updateMemberRole(organizationId, userId, role);
    const member = updated ? organization.members.find(m => m.userId === userId) : undefined;
    if (!member) {
      throw new NotFoundError(`User ${userId} is not a member of organization ${organizationId}`);
    }

    this.logger.info({ organizationId, userId, role, changedBy: context.userId }, 'Member role changed');
    return { ...member, role };
  }

  async removeMember(context: OrganizationContext, organizationId: string, userId: string): Promise<void> {
    const organization = await this.getScoped(context, organizationId);
    this.authorize(context, 'admin');
    this.protectOwner(organization, userId, 'removed');

    const removed = await this.organizationRepository.removeMember(organizationId, userId);
    if (!removed) {
      throw new NotFoundError(`User ${userId} is not a member of organization ${organizationId}`);
    }

    this.logger.info({ organizationId, userId, removedBy: context.userId }, 'Member removed');
  }

  private protectOwner(organization: LeanOrganization, userId: string, action: string): void {
    if (organization.owner === userId) {
      throw new AuthzError('Forbidden', `The owner of an organization cannot be ${action}`);
    }
  }
}

export default OrganizationService;
