import mongoose from 'mongoose';
import { ClientInitializationError } from './exceptions';

export function isDbConnected(): boolean {
  return mongoose.connection.readyState === mongoose.ConnectionStates.connected;
}

/**
 * Connects the shared mongoose client. Any driver failure surfaces as a
 * ClientInitializationError carrying the driver's message.
 */
export async function connectMongo(uri: string, dbName: string): Promise<void> {
  if (isDbConnected()) return;
  try {
    await mongoose.connect(uri, { dbName, serverSelectionTimeoutMS: 5000 });
  } catch (e) {
    throw new ClientInitializationError(e instanceof Error ? e : String(e));
  }
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === mongoose.ConnectionStates.disconnected) return;
  await mongoose.disconnect();
}
