/**
 * @stackwright/db - MongoDB client and one-time bootstrap
 */

export { getDatabase, closeDatabase, resolveMongoConfig, type MongoConfig } from './client.js';

export {
  bootstrapDatabase,
  parseOwnerId,
  INDEXES,
  SETTINGS_COLLECTION,
  type BootstrapDatabase,
  type BootstrapCollection,
  type BootstrapOptions,
  type BootstrapResult,
  type IndexDeclaration,
} from './bootstrap/index.js';
