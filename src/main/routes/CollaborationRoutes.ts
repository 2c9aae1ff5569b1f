import express from 'express';

import * as CollaborationValidation from '../controllers/validation/CollaborationValidation';
import { handleValidation } from '../middlewares/ValidationHandlingMiddleware';
import CollaborationController from '../controllers/CollaborationController';

const loadFileRoutes = function (app: express.Application, baseUrl: string) {
  const collaborationController = new CollaborationController();

  app.route(`${baseUrl}/collaborations/suggestions`).get(collaborationController.suggestions);
  app.route(`${baseUrl}/collaborations/active`).get(collaborationController.active);

  app
    .route(`${baseUrl}/collaborations/:labAId/:labBId/accept`)
    .post(CollaborationValidation.labPair, handleValidation, collaborationController.accept);

  app
    .route(`${baseUrl}/collaborations/:labAId/:labBId/email`)
    .post(CollaborationValidation.labPair, handleValidation, collaborationController.email);
};

export default loadFileRoutes;
