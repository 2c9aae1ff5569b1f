import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import container from '../config/container';
import { authenticateBearerToken } from './AuthMiddleware';
import { requestLogger } from './RequestLoggerMiddleware';

interface OriginValidatorCallback {
  (err: Error | null, allow?: boolean): void;
}

const loadGlobalMiddlewares = (app: express.Application) => {
  const { allowedOrigins } = container.resolve('settings');

  // Requests without an Origin (curl, server to server) are always allowed
  const originValidator = (origin: string | undefined, cb: OriginValidatorCallback): void => {
    if (!origin || allowedOrigins.length === 0 || allowedOrigins.includes(origin)) {
      return cb(null, true);
    }
    return cb(null, false);
  };

  const corsOptions: cors.CorsOptions = {
    origin: originValidator,
    methods: ['GET', 'HEAD', 'OPTIONS', 'POST', 'PUT', 'DELETE'],
    allowedHeaders: ['Authorization', 'Content-Type'],
    credentials: true,
  };

  app.use(requestLogger(container.resolve('logger')));
  app.use(express.json({ limit: '1mb' }));
  app.use(cors(corsOptions));
  app.options('*', cors(corsOptions));

  // Preflight requests never carry a token
  app.use((req, res, next) => {
    if (req.method === 'OPTIONS') return res.sendStatus(204);
    next();
  });

  app.use(helmet());

  app.use(authenticateBearerToken);
};

export default loadGlobalMiddlewares;
