import type { Logger } from 'pino';
import type { Cradle } from '../config/container';
import type { InvitationView, LeanInvitation } from '../types/models/Invitation';
import type { LeanOrganization, Membership, OrganizationContext, OrganizationMember } from '../types/models/Organization';
import type { AuthenticatedSession, LeanUser, Principal } from '../types/models/User';
import type { Role } from '../types/permissions';
import { AuthError, AuthzError, ConflictError, InvalidStateError, NotFoundError } from '../utils/errors';
import { compareRoles } from '../utils/roles';
import { normalizeEmail } from './UserService';

export interface InvitationInput {
  email: string;
  role: Role;
}

export interface AcceptedInvitation {
  invitation: LeanInvitation;
  membership: Membership;
  session: AuthenticatedSession;
}

class InvitationService {
  private readonly invitationRepository: Cradle['invitationRepository'];
  private readonly organizationRepository: Cradle['organizationRepository'];
  private readonly userRepository: Cradle['userRepository'];
  private readonly organizationService: Cradle['organizationService'];
  private readonly userService: Cradle['userService'];
  private readonly logger: Logger;

  constructor({
    invitationRepository,
    organizationRepository,
    userRepository,
    organizationService,
    userService,
    logger,
  }: Pick<
    Cradle,
    'invitationRepository' | 'organizationRepository' | 'userRepository' | 'organizationService' | 'userService' | 'logger'
  >) {
    this.invitationRepository = invitationRepository;
    this.organizationRepository = organizationRepository;
    this.userRepository = userRepository;
    this.organizationService = organizationService;
    this.userService = userService;
    this.logger = logger.child({ component: 'invitations' });
  }

  async create(context: OrganizationContext, organizationId: string, input: InvitationInput): Promise<LeanInvitation> {
    const organization = await this.organizationService.getScoped(context, organizationId);
    this.organizationService.authorize(context, 'manager');

    if (compareRoles(input.role, context.role) > 0) {
      throw new AuthzError('Forbidden', `You cannot invite with a role above your own (${context.role})`);
    }

    const email = normalizeEmail(input.email);
    const existingUser = await this.userRepository.findByEmail(email);
    if (existingUser && organization.members.some(m => m.userId === existingUser.id)) {
      throw new ConflictError(`${email} is already a member of this organization`);
    }
    if (await this.invitationRepository.findPending(organizationId, email)) {
      throw new ConflictError(`${email} already has a pending invitation to this organization`);
    }

    const invitation = await this.invitationRepository.create({
      organizationId,
      email,
      role: input.role,
      invitedBy: context.userId,
    });
    this.logger.info({ invitationId: invitation.id, organizationId, role: input.role }, 'Invitation created');
    return invitation;
  }

  async listForOrganization(context: OrganizationContext, organizationId: string): Promise<LeanInvitation[]> {
    await this.organizationService.getScoped(context, organizationId);
    this.organizationService.authorize(context, 'manager');
    return this.invitationRepository.findByOrganization(organizationId);
  }

  async listMine(principal: Principal): Promise<InvitationView[]> {
    const user = await this.requireUser(principal);
    const invitations = await this.invitationRepository.findPendingByEmail(user.email);

    return Promise.all(
      invitations.map(async invitation => {
        const organization = await this.organizationRepository.findById(invitation.organizationId);
        return { ...invitation, organizationName: organization?.name ?? '' };
      })
    );
  }

  async accept(principal: Principal, invitationId: string): Promise<AcceptedInvitation> {
    const { user } = await this.respondable(principal, invitationId);

    const invitation = await this.invitationRepository.resolvePending(invitationId, 'accepted', new Date());
    if (!invitation) {
      throw new InvalidStateError('This invitation has already been answered');
    }

    let organization: LeanOrganization;
    let member: OrganizationMember;
    try {
      const found = await this.organizationRepository.findById(invitation.organizationId);
      if (!found) {
        throw new NotFoundError(`Organization with ID ${invitation.organizationId} not found`);
      }
      organization = found;
      member = await this.organizationRepository.addMember(organization.id, user.id, invitation.role);
    } catch (err) {
      // Membership was not granted, so the invitation stays answerable
      await this.invitationRepository.reopen(invitationId, 'accepted');
      throw err;
    }

    if (!user.defaultOrganizationId) {
      await this.userRepository.setDefaultOrganization(user.id, organization.id);
    }

    const membership: Membership = {
      userId: user.id,
      organizationId: organization.id,
      organizationName: organization.name,
      role: member.role,
    };
    this.logger.info({ invitationId, organizationId: organization.id, userId: user.id }, 'Invitation accepted');

    return {
      invitation,
      membership,
      session: this.userService.issueSession(user, membership),
    };
  }

  async reject(principal: Principal, invitationId: string): Promise<LeanInvitation> {
    await this.respondable(principal, invitationId);

    const invitation = await this.invitationRepository.resolvePending(invitationId, 'rejected', new Date());
    if (!invitation) {
      throw new InvalidStateError('This invitation has already been answered');
    }

    this.logger.info({ invitationId, organizationId: invitation.organizationId }, 'Invitation rejected');
    return invitation;
  }

  /**
   * Loads an invitation the principal may answer: addressed to their email
   * and still pending.
   */
  private async respondable(
    principal: Principal,
    invitationId: string
  ): Promise<{ user: LeanUser; invitation: LeanInvitation }> {
    const invitation = await this.invitationRepository.findById(invitationId);
    if (!invitation) {
      throw new NotFoundError(`Invitation with ID ${invitationId} not found`);
    }

    const user = await this.requireUser(principal);
    if (normalizeEmail(user.email) !== invitation.email) {
      throw new AuthzError('Forbidden', 'This invitation was sent to another email address');
    }
    if (invitation.status !== 'pending') {
      throw new InvalidStateError(`This invitation has already been ${invitation.status}`);
    }

    return { user, invitation };
  }

  private async requireUser(principal: Principal): Promise<LeanUser> {
    const user = await this.userRepository.findById(principal.userId);
    if (!user) {
      throw new AuthError('Invalid', 'The user of this token no longer exists');
    }
    return user;
  }
}

export default InvitationService;
