import { Pool } from 'pg';
import type { PostgresConfig } from './config.js';

export type SqlClient = {
  query(text: string, params?: unknown[]): Promise<unknown>;
  release(): void;
};

export type SqlPool = {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
};

export function createPool(config: PostgresConfig): SqlPool {
  return new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: 1,
  });
}

export async function withTransaction<T>(pool: SqlPool, fn: (client: SqlClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('begin');
    const result = await fn(client);
    await client.query('commit');
    return result;
  } catch (error) {
    await client.query('rollback');
    throw error;
  } finally {
    client.release();
  }
}
