import express from 'express';

import * as AuthValidation from '../controllers/validation/AuthValidation';
import { handleValidation } from '../middlewares/ValidationHandlingMiddleware';
import AuthController from '../controllers/AuthController';

const loadFileRoutes = function (app: express.Application, baseUrl: string) {
  const authController = new AuthController();

  app.route(`${baseUrl}/auth/register`).post(AuthValidation.register, handleValidation, authController.register);

  app.route(`${baseUrl}/auth/login`).post(AuthValidation.login, handleValidation, authController.login);

  app.route(`${baseUrl}/auth/me`).get(authController.me);

  app
    .route(`${baseUrl}/auth/switch-organization`)
    .post(AuthValidation.switchOrganization, handleValidation, authController.switchOrganization);
};

export default loadFileRoutes;
