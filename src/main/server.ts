import { initializeApp } from './app';
import container from './config/container';
import { connectDatabase, disconnectDatabase } from './config/mongoose';

const settings = container.resolve('settings');
const logger = container.resolve('logger');

await connectDatabase();

const app = initializeApp();
const server = app.listen(settings.port, () => {
  logger.info({ port: settings.port, baseUrl: settings.baseUrlPath, backends: settings.backends }, 'Gateway listening');
});

const shutdown = (signal: NodeJS.Signals) => {
  logger.info({ signal }, 'Shutting down');
  server.close(() => {
    disconnectDatabase()
      .then(() => process.exit(0))
      .catch(err => {
        logger.error({ err }, 'Error while closing the database connection');
        process.exit(1);
      });
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
