import mongoose from 'mongoose';
import { config } from './env';

export async function connectMongo(dbUrl = config.dbUrl, dbName = config.dbName) {
  if (!dbUrl) throw new Error('DATABASE_URL not set');
  if (mongoose.connection.readyState === 1) return;
  await mongoose.connect(dbUrl, dbName ? { dbName } : {});
}

export async function disconnectMongo() {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
}
