import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { promises as fsp } from 'node:fs';
import Database from 'better-sqlite3';
import { SqliteTableStore } from './sqlite-store.js';
import { withTableStore } from './table-store.js';
import type { TableSchema } from './sql.js';
import { instantAt } from '../test-support.js';

const SCHEMA: TableSchema = {
  table: 'sample',
  columns: [
    { name: 'label', type: 'text' },
    { name: 'at', type: 'timestamp' },
    { name: 'score', type: 'real' },
  ],
};

describe('SqliteTableStore', () => {
  let dir: string;
  let filename: string;

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'sqlite-store-'));
    filename = path.join(dir, 'nested', 'results.sqlite');
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  function readRows(table: string): unknown[] {
    const db = new Database(filename, { readonly: true });
    try {
      return db.prepare(`select * from ${table}`).all();
    } finally {
      db.close();
    }
  }

  it('creates the table and stores typed values', async () => {
    const store = new SqliteTableStore(filename);
    const written = await store.replaceTable(SCHEMA, [
      { label: 'north', at: instantAt('2024-01-01T00:00:00Z'), score: 0.5 },
      { label: null, at: null, score: 'not-a-number' },
    ]);
    await store.close();

    expect(written).toBe(2);
    expect(readRows('sample')).toEqual([
      { label: 'north', at: '2024-01-01T00:00:00.000Z', score: 0.5 },
      { label: null, at: null, score: null },
    ]);
  });

  it('replaces previous contents of the table', async () => {
    await withTableStore({ driver: 'sqlite', sqlitePath: filename }, async (store) => {
      await store.replaceTable(SCHEMA, [{ label: 'old', at: null, score: 1 }]);
      await store.replaceTable(SCHEMA, [{ label: 'new', at: null, score: 2 }]);
    });

    expect(readRows('sample')).toEqual([{ label: 'new', at: null, score: 2 }]);
  });

  it('rejects unsafe table names', async () => {
    const store = new SqliteTableStore(filename);
    await expect(store.replaceTable({ ...SCHEMA, table: 'sample; drop' }, [])).rejects.toThrow(
      'invalid table name: sample; drop'
    );
    await store.close();
  });

  it('quotes arbitrary column names', async () => {
    await withTableStore({ driver: 'sqlite', sqlitePath: filename }, (store) =>
      store.replaceTable({ table: 'raw_snapshot', columns: [{ name: 'odd "name"', type: 'text' }] }, [
        { 'odd "name"': 42 },
      ])
    );
    expect(readRows('raw_snapshot')).toEqual([{ 'odd "name"': '42' }]);
  });
});
