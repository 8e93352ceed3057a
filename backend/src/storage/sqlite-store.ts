import path from 'node:path';
import { mkdirSync } from 'node:fs';
import Database from 'better-sqlite3';
import {
  assertTableName,
  quoteIdentifier,
  toSqlValue,
  type ColumnType,
  type TableRow,
  type TableSchema,
  type TableStore,
} from './sql.js';

// Instants are stored as ISO-8601 text.
const SQLITE_TYPES: Record<ColumnType, string> = {
  text: 'TEXT',
  timestamp: 'TEXT',
  real: 'REAL',
};

export class SqliteTableStore implements TableStore {
  readonly driver = 'sqlite' as const;
  private readonly db: Database.Database;

  constructor(filename: string) {
    if (filename !== ':memory:') {
      mkdirSync(path.dirname(filename), { recursive: true });
    }
    this.db = new Database(filename);
    this.db.pragma('journal_mode = WAL');
  }

  async replaceTable(schema: TableSchema, rows: readonly TableRow[]): Promise<number> {
    const table = quoteIdentifier(assertTableName(schema.table));
    const columnSql = schema.columns
      .map((column) => `${quoteIdentifier(column.name)} ${SQLITE_TYPES[column.type]}`)
      .join(', ');
    const insert = `insert into ${table} (${schema.columns.map((c) => quoteIdentifier(c.name)).join(', ')})
      values (${schema.columns.map(() => '?').join(', ')})`;

    const replace = this.db.transaction((batch: readonly TableRow[]) => {
      this.db.exec(`drop table if exists ${table}`);
      this.db.exec(`create table ${table} (${columnSql})`);
      const statement = this.db.prepare(insert);
      for (const row of batch) {
        statement.run(schema.columns.map((column) => toSqlValue(row[column.name], column.type)));
      }
      return batch.length;
    });

    return replace(rows);
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
