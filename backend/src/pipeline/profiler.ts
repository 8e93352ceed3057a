import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { isMissing, toDecimal } from './coerce.js';
import { resolveColumns } from './standardizer.js';
import type { Dataset, DQProfile, DQRuleName, DQRuleResult, PipelinePhase, TransactionColumn } from './types.js';
import type { RunLogger } from '../utils/logger.js';

const PROFILED_COLUMNS: TransactionColumn[] = [
  'timestamp',
  'transaction_type',
  'amount',
  'receiving_address',
  'location_region',
  'risk_score',
];

const NOT_NULL_RULES: [DQRuleName, TransactionColumn][] = [
  ['timestamp_not_null', 'timestamp'],
  ['transaction_type_not_null', 'transaction_type'],
  ['amount_not_null', 'amount'],
];

export const CONFORMITY_EPSILON = 1e-9;

export function conformityRate(failedRowsEstimate: number, totalRows: number): number {
  return Math.max(0, 1 - failedRowsEstimate / (totalRows + CONFORMITY_EPSILON));
}

/**
 * Profiles the dataset as it stands. Rule violations are summed without deduplicating
 * rows, so a row failing two rules counts twice in `failed_rows_estimate`.
 */
export function computeProfile(dataset: Dataset, phase: PipelinePhase): DQProfile {
  const columns = resolveColumns(dataset.columns);
  const totalRows = dataset.rows.length;

  const countNulls = (source: string) =>
    dataset.rows.reduce((count, row) => (isMissing(row[source]) ? count + 1 : count), 0);

  const nulls: Partial<Record<TransactionColumn, number>> = {};
  for (const column of PROFILED_COLUMNS) {
    const source = columns.get(column);
    if (source !== undefined) {
      nulls[column] = countNulls(source);
    }
  }

  const rules: Record<DQRuleName, DQRuleResult | null> = {
    timestamp_not_null: null,
    transaction_type_not_null: null,
    amount_not_null: null,
    amount_non_negative: null,
  };
  let failed = 0;

  for (const [rule, column] of NOT_NULL_RULES) {
    const violations = nulls[column];
    if (violations !== undefined) {
      rules[rule] = { violations };
      failed += violations;
    }
  }

  const amountSource = columns.get('amount');
  if (amountSource !== undefined) {
    const violations = dataset.rows.reduce((count, row) => {
      const amount = toDecimal(row[amountSource]);
      return amount !== null && amount < 0 ? count + 1 : count;
    }, 0);
    rules.amount_non_negative = { violations };
    failed += violations;
  }

  return {
    phase,
    total_rows: totalRows,
    nulls,
    rules,
    failed_rows_estimate: failed,
    conformity_rate: conformityRate(failed, totalRows),
  };
}

export function profileFilePath(dataDir: string, phase: PipelinePhase): string {
  return path.join(dataDir, `dq_metrics_${phase}.json`);
}

export type ProfilerDeps = {
  dataDir: string;
  logger: RunLogger;
};

export async function profileDataset(
  dataset: Dataset,
  phase: PipelinePhase,
  { dataDir, logger }: ProfilerDeps
): Promise<DQProfile> {
  logger.info(`Running data quality checks (${phase})`);
  const profile = computeProfile(dataset, phase);
  const serialized = JSON.stringify(profile, null, 2);

  const target = profileFilePath(dataDir, phase);
  await fsp.mkdir(dataDir, { recursive: true });
  await fsp.writeFile(target, serialized, 'utf8');

  logger.info(`DQ metrics -> ${target}`);
  logger.info(serialized);
  return profile;
}

/** Removes a phase's profile left by an earlier run that this run never reached. */
export async function discardProfile(dataDir: string, phase: PipelinePhase): Promise<void> {
  await fsp.rm(profileFilePath(dataDir, phase), { force: true });
}
