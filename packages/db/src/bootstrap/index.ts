/**
 * @stackwright/db - Database Bootstrap
 *
 * One-time schema setup for a fresh database: declares the indexed
 * collections and seeds the settings document. Re-running is safe:
 * createIndex is a no-op for an identical index and the settings
 * document is only inserted into an empty collection.
 */

import logger from '@stackwright/logger';
import { INDEXES, SETTINGS_COLLECTION } from './001_init.js';

// ============================================================================
// Types
// ============================================================================

/** The slice of a MongoDB `Db` the bootstrap needs. */
export interface BootstrapDatabase {
  collection(name: string): BootstrapCollection;
}

export interface BootstrapCollection {
  createIndex(keys: Record<string, 1 | -1>, options?: { unique?: boolean }): Promise<string>;
  countDocuments(): Promise<number>;
  insertOne(doc: Record<string, unknown>): Promise<unknown>;
}

export interface BootstrapOptions {
  ownerId: number;
  now?: () => Date;
}

export interface BootstrapResult {
  indexes: string[];
  settingsSeeded: boolean;
}

// ============================================================================
// Runner
// ============================================================================

export async function bootstrapDatabase(
  db: BootstrapDatabase,
  options: BootstrapOptions,
): Promise<BootstrapResult> {
  const now = options.now ?? (() => new Date());
  const indexes: string[] = [];

  for (const index of INDEXES) {
    const name = await db
      .collection(index.collection)
      .createIndex(index.keys, index.unique ? { unique: true } : undefined);
    indexes.push(`${index.collection}.${name}`);
  }

  const settings = db.collection(SETTINGS_COLLECTION);
  const existing = await settings.countDocuments();
  let settingsSeeded = false;

  if (existing === 0) {
    await settings.insertOne({
      monitoring_enabled: true,
      owner_id: options.ownerId,
      created_at: now(),
    });
    settingsSeeded = true;
  }

  logger.info('Database initialized successfully', { indexes: indexes.length, settingsSeeded });
  return { indexes, settingsSeeded };
}

/**
 * OWNER_ID as an integer, 0 when absent or not numeric.
 */
export function parseOwnerId(raw: string | undefined): number {
  const parsed = parseInt(raw || '0', 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

export { INDEXES, SETTINGS_COLLECTION, type IndexDeclaration } from './001_init.js';
