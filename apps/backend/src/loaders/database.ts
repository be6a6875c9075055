import mongoose from 'mongoose';
import type { ILogger } from '@homehub/types';

let listenersAttached = false;

/**
 * Open the shared mongoose connection the repositories use.
 */
export async function connectDatabase(uri: string, logger: ILogger): Promise<void> {
  const log = logger.child({ module: 'database' });
  if (!listenersAttached) {
    mongoose.connection.on('connected', () => log.info('MongoDB connected'));
    mongoose.connection.on('error', error => log.error({ error }, 'MongoDB connection error'));
    mongoose.connection.on('disconnected', () => log.warn('MongoDB disconnected'));
    listenersAttached = true;
  }
  await mongoose.connect(uri, {
    maxPoolSize: 20,
    serverSelectionTimeoutMS: 5000
  });
}

export async function disconnectDatabase(): Promise<void> {
  await mongoose.disconnect();
}
