import type { Collection } from 'mongodb';

export const IndexNames = {
  STATUS_TIMESTAMP_INDEXES: {
    createdAt: 'tally-status-created-at-index',
    updatedAt: 'tally-status-updated-at-index',
  },
} as const;

/**
 * Indexes backing the staleness queries of the sweeper and the recovery pass.
 */
export async function ensureIndexes(collection: Collection): Promise<void> {
  await collection.createIndex({ status: 1, createdAt: 1 }, { name: IndexNames.STATUS_TIMESTAMP_INDEXES.createdAt });

  await collection.createIndex({ status: 1, updatedAt: 1 }, { name: IndexNames.STATUS_TIMESTAMP_INDEXES.updatedAt });
}
