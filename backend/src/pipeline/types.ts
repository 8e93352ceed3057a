import type { Instant } from './instant.js';

export type RawValue = string | number | Instant | null;

export type DataRow = Record<string, RawValue>;

export type Dataset = {
  columns: string[];
  rows: DataRow[];
};

export type TransactionRecord = {
  timestamp: Instant;
  receiving_address: string | null;
  location_region: string | null;
  transaction_type: string;
  amount: number;
  risk_score: number | null;
};

export const TRANSACTION_COLUMNS = [
  'timestamp',
  'receiving_address',
  'location_region',
  'transaction_type',
  'amount',
  'risk_score',
] as const;

export type TransactionColumn = (typeof TRANSACTION_COLUMNS)[number];

export type PipelinePhase = 'pre_clean' | 'post_clean';

export type DQRuleName =
  | 'timestamp_not_null'
  | 'transaction_type_not_null'
  | 'amount_not_null'
  | 'amount_non_negative';

export type DQRuleResult = {
  readonly violations: number;
};

export type DQProfile = {
  readonly phase: PipelinePhase;
  readonly total_rows: number;
  readonly nulls: Readonly<Partial<Record<TransactionColumn, number>>>;
  readonly rules: Readonly<Record<DQRuleName, DQRuleResult | null>>;
  readonly failed_rows_estimate: number;
  readonly conformity_rate: number;
};

export function toDataset(records: readonly TransactionRecord[]): Dataset {
  return {
    columns: [...TRANSACTION_COLUMNS],
    rows: records.map((record) => ({ ...record })),
  };
}
