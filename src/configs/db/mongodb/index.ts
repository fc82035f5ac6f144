import getEnv from '@/configs/env';
import mongoose from 'mongoose';
import logger from '@/configs/logger';

/**
 * Opens the default mongoose connection with pooled options.
 * Counters created by `createSequenceCounter()` run on this connection.
 */
export default async function connectDB(
  uri: string = getEnv().MONGO_URI
): Promise<mongoose.Connection> {
  mongoose.set('strictQuery', false);

  const connectionOptions: mongoose.ConnectOptions = {
    // Connection pool settings
    maxPoolSize: 10,
    minPoolSize: 2,
    maxIdleTimeMS: 30000,
    serverSelectionTimeoutMS: 5000,
    socketTimeoutMS: 45000,
    retryWrites: true,
    retryReads: true,
    bufferCommands: false,
    // Counter values are int64, read them back as bigint
    useBigInt64: true,
  };

  try {
    await mongoose.connect(uri, connectionOptions);
  } catch (error) {
    logger.error('MongoDB connection failed:', error);
    throw error;
  }

  const connection = mongoose.connection;

  logger.info('MongoDB connected successfully', {
    host: connection.host,
    port: connection.port,
    name: connection.name,
  });

  connection.on('error', (error) => {
    logger.error('MongoDB connection error:', error);
  });

  connection.on('disconnected', () => {
    logger.warn('MongoDB disconnected');
  });

  connection.on('reconnected', () => {
    logger.info('MongoDB reconnected');
  });

  return connection;
}

export async function disconnectDB(): Promise<void> {
  await mongoose.connection.close();
  logger.info('MongoDB connection closed');
}
