import mongoose from 'mongoose';
import { log } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export interface DatabaseHealth {
  status: 'healthy' | 'disconnected' | 'error';
  details: Record<string, unknown>;
}

class DatabaseConnection {
  private static instance: DatabaseConnection;
  private isConnected: boolean = false;

  private constructor() {}

  public static getInstance(): DatabaseConnection {
    if (!DatabaseConnection.instance) {
      DatabaseConnection.instance = new DatabaseConnection();
    }
    return DatabaseConnection.instance;
  }

  public async connect(uri: string): Promise<void> {
    if (this.isConnected) {
      log.info('Already connected to MongoDB');
      return;
    }

    await mongoose.connect(uri);
    // Builds the slot-exclusivity index before the first booking is taken.
    await mongoose.connection.syncIndexes();
    this.isConnected = true;
    log.info({ host: mongoose.connection.host, name: mongoose.connection.name }, 'Connected to MongoDB');

    mongoose.connection.on('error', (error: unknown) => {
      log.error({ err: error }, 'MongoDB connection error');
      this.isConnected = false;
    });

    mongoose.connection.on('disconnected', () => {
      log.warn('MongoDB disconnected');
      this.isConnected = false;
    });

    mongoose.connection.on('reconnected', () => {
      log.info('MongoDB reconnected');
      this.isConnected = true;
    });
  }

  public async disconnect(): Promise<void> {
    if (!this.isConnected) {
      return;
    }

    await mongoose.disconnect();
    this.isConnected = false;
    log.info('Disconnected from MongoDB');
  }

  public async healthCheck(): Promise<DatabaseHealth> {
    if (!this.isConnected) {
      return {
        status: 'disconnected',
        details: { readyState: mongoose.connection.readyState }
      };
    }

    try {
      const db = mongoose.connection.db;
      if (!db) {
        return { status: 'disconnected', details: { readyState: mongoose.connection.readyState } };
      }
      await db.admin().ping();
      return {
        status: 'healthy',
        details: {
          readyState: mongoose.connection.readyState,
          host: mongoose.connection.host,
          name: mongoose.connection.name
        }
      };
    } catch (error) {
      return {
        status: 'error',
        details: { error: errorMessage(error) }
      };
    }
  }
}

export default DatabaseConnection;
