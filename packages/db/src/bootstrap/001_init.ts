/**
 * @stackwright/db - Bootstrap 001: Collections & Indexes
 */

export interface IndexDeclaration {
  collection: string;
  keys: Record<string, 1 | -1>;
  unique?: boolean;
}

export const INDEXES: IndexDeclaration[] = [
  // Users (one document per bot user)
  { collection: 'users', keys: { user_id: 1 }, unique: true },

  // Linked accounts
  { collection: 'accounts', keys: { user_id: 1 } },
  { collection: 'accounts', keys: { phone_number: 1 } },

  // Sessions
  { collection: 'sessions', keys: { account_id: 1 } },
  { collection: 'sessions', keys: { created_at: 1 } },

  // Event logs
  { collection: 'logs', keys: { timestamp: 1 } },
  { collection: 'logs', keys: { user_id: 1 } },
  { collection: 'logs', keys: { event_type: 1 } },
];

export const SETTINGS_COLLECTION = 'settings';
