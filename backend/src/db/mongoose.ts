/**
 * MongoDB connection (mongoose)
 */

import mongoose from 'mongoose';

export { mongoose };

export async function connectMongo(url: string, dbName: string): Promise<void> {
  if (mongoose.connection.readyState === 1) return;

  mongoose.set('strictQuery', true);

  await mongoose.connect(url, {
    dbName,
    serverSelectionTimeoutMS: 10_000,
  });

  console.log(`[DB] Connected to MongoDB (${dbName})`);
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
  console.log('[DB] Disconnected from MongoDB');
}

export function isMongoConnected(): boolean {
  return mongoose.connection.readyState === 1;
}

/**
 * E11000: unique index violation.
 */
export function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 11000;
}
