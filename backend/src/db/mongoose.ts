/**
 * MongoDB connection (mongoose). Only opened when STORAGE_BACKEND=document
 * or a migration script names the document store.
 */

import mongoose from 'mongoose';

export async function connectMongo(url: string, dbName: string): Promise<void> {
  if (mongoose.connection.readyState === 1) return;
  await mongoose.connect(url, { dbName });
  console.log(`[DB] Connected to MongoDB (${dbName})`);
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
  console.log('[DB] Disconnected from MongoDB');
}
