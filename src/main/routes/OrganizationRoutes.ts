import express from 'express';

import * as OrganizationValidation from '../controllers/validation/OrganizationValidation';
import { handleValidation } from '../middlewares/ValidationHandlingMiddleware';
import OrganizationController from '../controllers/OrganizationController';

const loadFileRoutes = function (app: express.Application, baseUrl: string) {
  const organizationController = new OrganizationController();

  app
    .route(`${baseUrl}/organizations`)
    .get(organizationController.listMine)
    .post(OrganizationValidation.create, handleValidation, organizationController.create);

  // Declared before /:organizationId so that "current" is not taken for an id
  app.route(`${baseUrl}/organizations/current`).get(organizationController.getCurrent);

  app
    .route(`${baseUrl}/organizations/:organizationId`)
    .get(OrganizationValidation.getById, handleValidation, organizationController.getById);

  app
    .route(`${baseUrl}/organizations/:organizationId/members`)
    .get(OrganizationValidation.getById, handleValidation, organizationController.listMembers);

  app
    .route(`${baseUrl}/organizations/:organizationId/members/:userId`)
    .put(OrganizationValidation.updateMemberRole, handleValidation, organizationController.updateMemberRole)
    .delete(OrganizationValidation.member, handleValidation, organizationController.removeMember);

  app
    .route(`${baseUrl}/organizations/:organizationId/invitations`)
    .get(OrganizationValidation.getById, handleValidation, organizationController.listInvitations)
    .post(OrganizationValidation.createInvitation, handleValidation, organizationController.createInvitation);
};

export default loadFileRoutes;
