/**
 * MongoDB connection (mongoose)
 */

import mongoose from 'mongoose';
import type { Logger } from '../common/logger.js';

export { mongoose };

export async function connectMongo(url: string, logger: Logger): Promise<void> {
  if (mongoose.connection.readyState === 1) return;

  await mongoose.connect(url, {
    serverSelectionTimeoutMS: 5000,
  });
  logger.info({ db: mongoose.connection.name }, '[DB] MongoDB connected');
}

export async function disconnectMongo(logger: Logger): Promise<void> {
  if (mongoose.connection.readyState === 0) return;

  await mongoose.disconnect();
  logger.info({}, '[DB] MongoDB disconnected');
}

export function isMongoConnected(): boolean {
  return mongoose.connection.readyState === 1;
}
