import express from 'express';

import * as InvitationValidation from '../controllers/validation/InvitationValidation';
import { handleValidation } from '../middlewares/ValidationHandlingMiddleware';
import InvitationController from '../controllers/InvitationController';

const loadFileRoutes = function (app: express.Application, baseUrl: string) {
  const invitationController = new InvitationController();

  app.route(`${baseUrl}/invitations/mine`).get(invitationController.listMine);

  app
    .route(`${baseUrl}/invitations/:invitationId/accept`)
    .post(InvitationValidation.respond, handleValidation, invitationController.accept);

  app
    .route(`${baseUrl}/invitations/:invitationId/reject`)
    .post(InvitationValidation.respond, handleValidation, invitationController.reject);
};

export default loadFileRoutes;
