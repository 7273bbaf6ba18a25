import mongoose from 'mongoose';
import { createLogger } from '../utils/logger';

const logger = createLogger('database');

const connectDB = async (uri: string): Promise<typeof mongoose> => {
  mongoose.connection.on('disconnected', () => logger.warn('MongoDB disconnected'));
  mongoose.connection.on('error', (error: Error) =>
    logger.error('MongoDB connection error', { error: error.message })
  );

  const connection = await mongoose.connect(uri, {
    serverSelectionTimeoutMS: 10000,
  });
  logger.info('MongoDB connected', { host: connection.connection.host });
  return connection;
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
};

export default connectDB;
