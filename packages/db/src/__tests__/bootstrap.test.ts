/**
 * Database Bootstrap Tests
 */

import { bootstrapDatabase, parseOwnerId, type BootstrapCollection, type BootstrapDatabase } from '../bootstrap/index.js';

interface FakeCollection extends BootstrapCollection {
  indexes: Array<{ keys: Record<string, 1 | -1>; unique: boolean }>;
  docs: Array<Record<string, unknown>>;
}

function createFakeDatabase() {
  const collections = new Map<string, FakeCollection>();

  const db: BootstrapDatabase = {
    collection(name) {
      let collection = collections.get(name);
      if (!collection) {
        const created: FakeCollection = {
          indexes: [],
          docs: [],
          async createIndex(keys, options) {
            const indexName = Object.entries(keys).map(([k, v]) => `${k}_${v}`).join('_');
            const exists = created.indexes.some((i) => JSON.stringify(i.keys) === JSON.stringify(keys));
            if (!exists) created.indexes.push({ keys, unique: options?.unique === true });
            return indexName;
          },
          async countDocuments() {
            return created.docs.length;
          },
          async insertOne(doc) {
            created.docs.push(doc);
            return { acknowledged: true };
          },
        };
        collections.set(name, created);
        collection = created;
      }
      return collection;
    },
  };

  return { db, collections };
}

const fixedNow = () => new Date('2026-01-01T00:00:00.000Z');

describe('bootstrapDatabase', () => {
  it('should declare every collection index', async () => {
    const { db, collections } = createFakeDatabase();

    const result = await bootstrapDatabase(db, { ownerId: 12345, now: fixedNow });

    expect(result.indexes).toEqual([
      'users.user_id_1',
      'accounts.user_id_1',
      'accounts.phone_number_1',
      'sessions.account_id_1',
      'sessions.created_at_1',
      'logs.timestamp_1',
      'logs.user_id_1',
      'logs.event_type_1',
    ]);
    expect(collections.get('users')?.indexes).toEqual([{ keys: { user_id: 1 }, unique: true }]);
    expect(collections.get('accounts')?.indexes.every((i) => !i.unique)).toBe(true);
  });

  it('should seed the settings document with the owner id', async () => {
    const { db, collections } = createFakeDatabase();

    const result = await bootstrapDatabase(db, { ownerId: 12345, now: fixedNow });

    expect(result.settingsSeeded).toBe(true);
    expect(collections.get('settings')?.docs).toEqual([
      { monitoring_enabled: true, owner_id: 12345, created_at: new Date('2026-01-01T00:00:00.000Z') },
    ]);
  });

  it('should be idempotent when run twice', async () => {
    const { db, collections } = createFakeDatabase();

    await bootstrapDatabase(db, { ownerId: 1, now: fixedNow });
    const second = await bootstrapDatabase(db, { ownerId: 2, now: fixedNow });

    expect(second.settingsSeeded).toBe(false);
    expect(collections.get('settings')?.docs).toHaveLength(1);
    expect(collections.get('logs')?.indexes).toHaveLength(3);
  });
});

describe('parseOwnerId', () => {
  it('should parse numeric ids and default to 0', () => {
    expect(parseOwnerId('987654')).toBe(987654);
    expect(parseOwnerId(undefined)).toBe(0);
    expect(parseOwnerId('')).toBe(0);
    expect(parseOwnerId('owner')).toBe(0);
  });
});
