import type { StorageConfig } from '../config.js';
import { createPool } from '../db.js';
import { PostgresTableStore } from './postgres-store.js';
import { SqliteTableStore } from './sqlite-store.js';
import type { TableStore } from './sql.js';

export type { TableStore } from './sql.js';

export function openTableStore(config: StorageConfig): TableStore {
  if (config.driver === 'postgres') {
    return new PostgresTableStore(createPool(config.postgres));
  }
  return new SqliteTableStore(config.sqlitePath);
}

/** Opens the configured store for a single operation and closes it afterwards. */
export async function withTableStore<T>(config: StorageConfig, fn: (store: TableStore) => Promise<T>): Promise<T> {
  const store = openTableStore(config);
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
