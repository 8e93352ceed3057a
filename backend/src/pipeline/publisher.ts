import path from 'node:path';
import type { PipelineConfig } from '../config.js';
import type { TableColumn, TableSchema } from '../storage/sql.js';
import { withTableStore } from '../storage/table-store.js';
import type { RunLogger } from '../utils/logger.js';
import { normalizeColumnName } from './standardizer.js';
import { writeCsv } from './csv-io.js';
import { lastSalePerAddress, regionRiskAverage, topRecentSales } from './transforms.js';
import type { Dataset, TransactionRecord } from './types.js';

export const STAGING_TABLE: TableSchema = {
  table: 'stg_transactions',
  columns: [
    { name: 'timestamp', type: 'timestamp' },
    { name: 'receiving_address', type: 'text' },
    { name: 'location_region', type: 'text' },
    { name: 'transaction_type', type: 'text' },
    { name: 'amount', type: 'real' },
    { name: 'risk_score', type: 'real' },
  ],
};

export const REGION_RISK_TABLE: TableSchema = {
  table: 'region_risk_avg',
  columns: [
    { name: 'location_region', type: 'text' },
    { name: 'avg_risk_score', type: 'real' },
  ],
};

const LAST_SALE_COLUMNS: TableSchema['columns'] = [
  { name: 'receiving_address', type: 'text' },
  { name: 'amount', type: 'real' },
  { name: 'timestamp', type: 'timestamp' },
];

export const LAST_SALE_TABLE: TableSchema = { table: 'last_sale_per_address', columns: LAST_SALE_COLUMNS };

export const TOP_SALES_TABLE: TableSchema = { table: 'top3_recent_sales_by_receiving', columns: LAST_SALE_COLUMNS };

export const RAW_SNAPSHOT_TABLE = 'raw_snapshot';

export const EXPORTED_VIEWS = ['region_risk_avg', 'top3_recent_sales_by_receiving'] as const;

export type ExportedView = (typeof EXPORTED_VIEWS)[number];

export type PublishSummary = {
  tables: Record<string, number>;
  exports: Record<ExportedView, string>;
};

export type PublisherDeps = {
  config: Pick<PipelineConfig, 'storage' | 'curatedDir'>;
  logger: RunLogger;
};

function columnNames(schema: TableSchema): string[] {
  return schema.columns.map((column) => column.name);
}

export function exportPath(curatedDir: string, view: ExportedView): string {
  return path.join(curatedDir, `${view}.csv`);
}

export async function publishViews(
  records: readonly TransactionRecord[],
  { config, logger }: PublisherDeps
): Promise<PublishSummary> {
  logger.info(`Writing staging and result tables (${config.storage.driver})`);

  const regionRisk = regionRiskAverage(records);
  const lastSales = lastSalePerAddress(records);
  const topSales = topRecentSales(lastSales);

  const tables = await withTableStore(config.storage, async (store) => ({
    [STAGING_TABLE.table]: await store.replaceTable(STAGING_TABLE, records),
    [REGION_RISK_TABLE.table]: await store.replaceTable(REGION_RISK_TABLE, regionRisk),
    [LAST_SALE_TABLE.table]: await store.replaceTable(LAST_SALE_TABLE, lastSales),
    [TOP_SALES_TABLE.table]: await store.replaceTable(TOP_SALES_TABLE, topSales),
  }));

  const exports: PublishSummary['exports'] = {
    region_risk_avg: await writeCsv(
      exportPath(config.curatedDir, 'region_risk_avg'),
      columnNames(REGION_RISK_TABLE),
      regionRisk
    ),
    top3_recent_sales_by_receiving: await writeCsv(
      exportPath(config.curatedDir, 'top3_recent_sales_by_receiving'),
      columnNames(TOP_SALES_TABLE),
      topSales
    ),
  };

  logger.info(`Results exported to ${config.curatedDir}`);
  return { tables, exports };
}

// Normalized names, with blanks named by position and collisions suffixed `_2`, `_3`, ...
function snapshotColumnNames(columns: readonly string[]): string[] {
  const used = new Set<string>();
  return columns.map((column, index) => {
    const base = normalizeColumnName(column) || `column_${index + 1}`;
    let name = base;
    for (let suffix = 2; used.has(name); suffix += 1) {
      name = `${base}_${suffix}`;
    }
    used.add(name);
    return name;
  });
}

/** Persists every ingested column and row untouched (as text) for inspection. */
export async function publishRawSnapshot(dataset: Dataset, { config, logger }: PublisherDeps): Promise<number> {
  const names = snapshotColumnNames(dataset.columns);
  const schema: TableSchema = {
    table: RAW_SNAPSHOT_TABLE,
    columns: names.map((name): TableColumn => ({ name, type: 'text' })),
  };
  const rows = dataset.rows.map((row) =>
    Object.fromEntries(dataset.columns.map((column, index) => [names[index], row[column] ?? null]))
  );

  const count = await withTableStore(config.storage, (store) => store.replaceTable(schema, rows));
  logger.warn(`Raw snapshot persisted to ${RAW_SNAPSHOT_TABLE} (${count} rows)`);
  return count;
}
