import express from 'express';

import GatewayController from '../controllers/GatewayController';

const loadFileRoutes = function (app: express.Application, baseUrl: string) {
  const gatewayController = new GatewayController();

  app.route(`${baseUrl}/health`).get(gatewayController.health);
  app.route(`${baseUrl}/services`).get(gatewayController.services);
  app.route(`${baseUrl}/dashboard`).get(gatewayController.dashboard);
};

export default loadFileRoutes;
