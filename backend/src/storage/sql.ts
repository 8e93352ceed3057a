import { toText } from '../pipeline/coerce.js';
import type { RawValue } from '../pipeline/types.js';
import type { StorageConfig } from '../config.js';

export type ColumnType = 'text' | 'timestamp' | 'real';

export type TableColumn = {
  name: string;
  type: ColumnType;
};

export type TableSchema = {
  table: string;
  columns: TableColumn[];
};

export type TableRow = Record<string, RawValue | undefined>;

export interface TableStore {
  readonly driver: StorageConfig['driver'];
  /** Drops and recreates `schema.table`, then inserts `rows`. Returns the row count written. */
  replaceTable(schema: TableSchema, rows: readonly TableRow[]): Promise<number>;
  close(): Promise<void>;
}

const TABLE_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;

export function assertTableName(table: string): string {
  if (!TABLE_NAME_PATTERN.test(table)) {
    throw new Error(`invalid table name: ${table}`);
  }
  return table;
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function toSqlValue(value: RawValue | undefined, type: ColumnType): string | number | null {
  if (value == null) return null;
  if (type === 'real') {
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
  }
  return toText(value);
}
