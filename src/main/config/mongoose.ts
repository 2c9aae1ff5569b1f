import mongoose from 'mongoose';
import container from './container';

export function getMongoDBConnectionURI(): string {
  return container.resolve('settings').mongoUri;
}

export async function connectDatabase(): Promise<void> {
  const logger = container.resolve('logger');
  mongoose.set('strictQuery', true);
  await mongoose.connect(getMongoDBConnectionURI());
  logger.info({ database: mongoose.connection.name }, 'Connected to MongoDB');
}

export async function disconnectDatabase(): Promise<void> {
  await mongoose.disconnect();
}
