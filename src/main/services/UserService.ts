import type { Logger } from 'pino';
import type { Cradle } from '../config/container';
import type { Membership } from '../types/models/Organization';
import { toPublicUser, type AuthenticatedSession, type LeanUser, type Principal, type PublicUser } from '../types/models/User';
import { AuthError, AuthzError, ConflictError, NotFoundError } from '../utils/errors';

export interface RegistrationInput {
  email: string;
  name: string;
  password: string;
}

export interface Profile {
  user: PublicUser;
  organizationId: string;
  role: Principal['role'];
  memberships: Membership[];
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

class UserService {
  private readonly userRepository: Cradle['userRepository'];
  private readonly organizationRepository: Cradle['organizationRepository'];
  private readonly organizationService: Cradle['organizationService'];
  private readonly credentialService: Cradle['credentialService'];
  private readonly userSyncService: Cradle['userSyncService'];
  private readonly logger: Logger;

  constructor({
    userRepository,
    organizationRepository,
    organizationService,
    credentialService,
    userSyncService,
    logger,
  }: Pick<
    Cradle,
    'userRepository' | 'organizationRepository' | 'organizationService' | 'credentialService' | 'userSyncService' | 'logger'
  >) {
    this.userRepository = userRepository;
    this.organizationRepository = organizationRepository;
    this.organizationService = organizationService;
    this.credentialService = credentialService;
    this.userSyncService = userSyncService;
    this.logger = logger.child({ component: 'users' });
  }

  async register(input: RegistrationInput): Promise<AuthenticatedSession> {
    const email = normalizeEmail(input.email);
    if (await this.userRepository.findByEmail(email)) {
      throw new ConflictError(`A user with email ${email} already exists`);
    }

    const name = input.name.trim();
    const created = await this.userRepository.create({
      email,
      name,
      passwordHash: await this.credentialService.hashPassword(input.password),
    });

    const organization = await this.organizationRepository.create(
      { name: `${name}'s Organization`, owner: created.id },
      'admin'
    );
    await this.userRepository.setDefaultOrganization(created.id, organization.id);
    const user: LeanUser = { ...created, defaultOrganizationId: organization.id };

    const membership: Membership = {
      userId: user.id,
      organizationId: organization.id,
      organizationName: organization.name,
      role: 'admin',
    };

    this.logger.info({ userId: user.id, organizationId: organization.id }, 'User registered');
    await this.userSyncService.syncUser(toPublicUser(user), {
      userId: user.id,
      organizationId: organization.id,
      role: 'admin',
    });

    return this.issueSession(user, membership);
  }

  async login(email: string, password: string): Promise<AuthenticatedSession> {
    const user = await this.userRepository.findByEmail(normalizeEmail(email));
    const valid = user ? await this.credentialService.verifyPassword(password, user.passwordHash) : false;
    if (!user || !valid) {
      throw new AuthError('Invalid', 'Invalid email or password');
    }
    if (!user.isActive) {
      throw new AuthzError('Forbidden', 'This account has been deactivated');
    }

    const memberships = await this.organizationService.listMine(user.id);
    const membership =
      memberships.find(m => m.organizationId === user.defaultOrganizationId) ?? memberships[0];
    if (!membership) {
      throw new AuthzError('NoActiveOrganization', 'You do not belong to any organization');
    }

    return this.issueSession(user, membership);
  }

  async me(principal: Principal): Promise<Profile> {
    const user = await this.activeUser(principal.userId);
    const memberships = await this.organizationService.listMine(user.id);
    const current = memberships.find(m => m.organizationId === principal.organizationId);

    return {
      user: toPublicUser(user),
      organizationId: principal.organizationId,
      role: current?.role ?? principal.role,
      memberships,
    };
  }

  async switchOrganization(principal: Principal, organizationId: string): Promise<AuthenticatedSession> {
    const user = await this.activeUser(principal.userId);
    const membership = await this.organizationService.membership(user.id, organizationId);
    if (!membership) {
      throw new NotFoundError(`Organization with ID ${organizationId} not found`);
    }

    await this.userRepository.setDefaultOrganization(user.id, organizationId);
    return this.issueSession({ ...user, defaultOrganizationId: organizationId }, membership);
  }

  issueSession(user: LeanUser, membership: Membership): AuthenticatedSession {
    const { token, expiresAt } = this.credentialService.issueToken({
      userId: user.id,
      organizationId: membership.organizationId,
      role: membership.role,
    });

    return {
      accessToken: token,
      tokenType: 'bearer',
      expiresAt: expiresAt.toISOString(),
      user: toPublicUser(user),
      organizationId: membership.organizationId,
      role: membership.role,
    };
  }

  private async activeUser(userId: string): Promise<LeanUser> {
    const user = await this.userRepository.findById(userId);
    if (!user) {
      throw new AuthError('Invalid', 'The user of this token no longer exists');
    }
    if (!user.isActive) {
      throw new AuthzError('Forbidden', 'This account has been deactivated');
    }
    return user;
  }
}

export default UserService;
