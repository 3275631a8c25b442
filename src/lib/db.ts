import mongoose from 'mongoose';
import type { AppConfig } from '../config.js';

export async function connectToDatabase(config: Pick<AppConfig, 'mongoUri' | 'mongoDbName'>) {
  await mongoose.connect(config.mongoUri, { dbName: config.mongoDbName });
  console.log('✅ MongoDB connected');
  return mongoose.connection;
}

export async function disconnectFromDatabase() {
  await mongoose.disconnect();
}
