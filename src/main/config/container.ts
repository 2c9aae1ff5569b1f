import { asClass, asValue, createContainer, type AwilixContainer } from 'awilix';
import fetch from 'node-fetch';
import type { Logger } from 'pino';

import MongooseCollaborationRepository from '../repositories/mongoose/CollaborationRepository';
import MongooseInvitationRepository from '../repositories/mongoose/InvitationRepository';
import MongooseOrganizationRepository from '../repositories/mongoose/OrganizationRepository';
import MongooseUserRepository from '../repositories/mongoose/UserRepository';
import type {
  CollaborationRepository,
  InvitationRepository,
  OrganizationRepository,
  UserRepository,
} from '../repositories/types';

import AggregationService from '../services/AggregationService';
import CollaborationService from '../services/CollaborationService';
import CredentialService from '../services/CredentialService';
import InvitationService from '../services/InvitationService';
import OrganizationService from '../services/OrganizationService';
import ServiceProxy, { type FetchLike } from '../services/ServiceProxy';
import TenantProxyService from '../services/TenantProxyService';
import UserService from '../services/UserService';
import UserSyncService from '../services/UserSyncService';
import { createLogger } from '../utils/logger';
import { loadSettings, type GatewaySettings } from './settings';

export interface Cradle {
  settings: Readonly<GatewaySettings>;
  logger: Logger;
  httpFetch: FetchLike;
  userRepository: UserRepository;
  organizationRepository: OrganizationRepository;
  invitationRepository: InvitationRepository;
  collaborationRepository: CollaborationRepository;
  credentialService: CredentialService;
  serviceProxy: ServiceProxy;
  tenantProxyService: TenantProxyService;
  aggregationService: AggregationService;
  collaborationService: CollaborationService;
  userSyncService: UserSyncService;
  userService: UserService;
  organizationService: OrganizationService;
  invitationService: InvitationService;
}

function initContainer(databaseType: string): AwilixContainer<Cradle> {
  const container = createContainer<Cradle>();
  let userRepository: UserRepository;
  let organizationRepository: OrganizationRepository;
  let invitationRepository: InvitationRepository;
  let collaborationRepository: CollaborationRepository;
  switch (databaseType) {
    case 'mongoDB':
      userRepository = new MongooseUserRepository();
      organizationRepository = new MongooseOrganizationRepository();
      invitationRepository = new MongooseInvitationRepository();
      collaborationRepository = new MongooseCollaborationRepository();
      break;
    default:
      throw new Error(`Unsupported database type: ${databaseType}`);
  }

  const settings = loadSettings();

  container.register({
    settings: asValue(settings),
    logger: asValue(createLogger('gateway')),
    httpFetch: asValue<FetchLike>(fetch),
    userRepository: asValue(userRepository),
    organizationRepository: asValue(organizationRepository),
    invitationRepository: asValue(invitationRepository),
    collaborationRepository: asValue(collaborationRepository),
    credentialService: asClass(CredentialService).singleton(),
    serviceProxy: asClass(ServiceProxy).singleton(),
    tenantProxyService: asClass(TenantProxyService).singleton(),
    aggregationService: asClass(AggregationService).singleton(),
    collaborationService: asClass(CollaborationService).singleton(),
    userSyncService: asClass(UserSyncService).singleton(),
    userService: asClass(UserService).singleton(),
    organizationService: asClass(OrganizationService).singleton(),
    invitationService: asClass(InvitationService).singleton(),
  });
  return container;
}

const container = initContainer(process.env.DATABASE_TECHNOLOGY ?? 'mongoDB');

export default container;
