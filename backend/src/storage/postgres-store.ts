import { withTransaction, type SqlPool } from '../db.js';
import {
  assertTableName,
  quoteIdentifier,
  toSqlValue,
  type ColumnType,
  type TableRow,
  type TableSchema,
  type TableStore,
} from './sql.js';

const POSTGRES_TYPES: Record<ColumnType, string> = {
  text: 'text',
  timestamp: 'timestamptz',
  real: 'double precision',
};

// Postgres caps bind parameters per statement at 65535.
const MAX_PARAMETERS = 60000;

export class PostgresTableStore implements TableStore {
  readonly driver = 'postgres' as const;

  constructor(private readonly pool: SqlPool) {}

  async replaceTable(schema: TableSchema, rows: readonly TableRow[]): Promise<number> {
    const table = quoteIdentifier(assertTableName(schema.table));
    const columnSql = schema.columns
      .map((column) => `${quoteIdentifier(column.name)} ${POSTGRES_TYPES[column.type]}`)
      .join(', ');
    const columnList = schema.columns.map((column) => quoteIdentifier(column.name)).join(', ');
    const batchSize = Math.max(1, Math.floor(MAX_PARAMETERS / Math.max(1, schema.columns.length)));

    return withTransaction(this.pool, async (client) => {
      await client.query(`drop table if exists ${table}`);
      await client.query(`create table ${table} (${columnSql})`);

      for (let start = 0; start < rows.length; start += batchSize) {
        const batch = rows.slice(start, start + batchSize);
        const values: unknown[] = [];
        const tuples = batch.map((row) => {
          const placeholders = schema.columns.map((column) => {
            values.push(toSqlValue(row[column.name], column.type));
            return `$${values.length}`;
          });
          return `(${placeholders.join(', ')})`;
        });
        await client.query(`insert into ${table} (${columnList}) values ${tuples.join(', ')}`, values);
      }

      return rows.length;
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
