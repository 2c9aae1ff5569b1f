import express from 'express';
import loadGlobalMiddlewares from './middlewares/GlobalMiddlewaresLoader';
import loadRoutes from './routes';

export function initializeApp(): express.Application {
  const app = express();
  app.disable('x-powered-by');

  loadGlobalMiddlewares(app);
  loadRoutes(app);

  return app;
}
