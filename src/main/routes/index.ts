import express from 'express';

import container from '../config/container';
import loadAuthRoutes from './AuthRoutes';
import loadCollaborationRoutes from './CollaborationRoutes';
import loadGatewayRoutes from './GatewayRoutes';
import loadInvitationRoutes from './InvitationRoutes';
import loadOrganizationRoutes from './OrganizationRoutes';
import loadProxyRoutes from './ProxyRoutes';

const loadRoutes = function (app: express.Application) {
  const baseUrl = container.resolve('settings').baseUrlPath;

  loadAuthRoutes(app, baseUrl);
  loadGatewayRoutes(app, baseUrl);
  loadOrganizationRoutes(app, baseUrl);
  loadInvitationRoutes(app, baseUrl);
  loadCollaborationRoutes(app, baseUrl);
  loadProxyRoutes(app, baseUrl);
};

export default loadRoutes;
