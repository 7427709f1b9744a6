/**
 * @stackwright/db - MongoDB Client
 */

import { MongoClient, type Db } from 'mongodb';
import logger from '@stackwright/logger';

// ============================================================================
// Configuration
// ============================================================================

export interface MongoConfig {
  uri: string;
  dbName: string;
}

export function resolveMongoConfig(env: Record<string, string | undefined> = process.env): MongoConfig {
  return {
    uri: env.MONGO_URI || 'mongodb://localhost:27017',
    dbName: env.DB_NAME || 'giveaway',
  };
}

// ============================================================================
// Client Singleton
// ============================================================================

let client: MongoClient | null = null;

export async function getDatabase(config: MongoConfig = resolveMongoConfig()): Promise<Db> {
  if (!client) {
    client = new MongoClient(config.uri, {
      serverSelectionTimeoutMS: 5000,
      connectTimeoutMS: 5000,
    });
    await client.connect();
    logger.info('Database connected successfully', { dbName: config.dbName });
  }
  return client.db(config.dbName);
}

export async function closeDatabase(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
    logger.info('Database connection closed');
  }
}
