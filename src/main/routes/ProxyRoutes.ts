import express from 'express';

import { PROXY_ROUTES } from '../config/proxyRoutes';
import ProxyController from '../controllers/ProxyController';

const loadFileRoutes = function (app: express.Application, baseUrl: string) {
  const proxyController = new ProxyController();

  for (const route of PROXY_ROUTES) {
    const path = `${baseUrl}${route.path}`;
    if (route.method === 'POST') {
      app.post(path, proxyController.forward(route));
    } else {
      app.get(path, proxyController.forward(route));
    }
  }
};

export default loadFileRoutes;
