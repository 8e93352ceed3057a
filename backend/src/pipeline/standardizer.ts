import { toDecimal, toInstant, toText } from './coerce.js';
import { detectTimestampUnit, epochToInstant, isEpochColumn, type TimestampUnit } from './timestamp-unit.js';
import type { Instant } from './instant.js';
import type { DataRow, Dataset, RawValue, TransactionRecord } from './types.js';
import type { RunLogger } from '../utils/logger.js';

const NULL_TOKENS = new Set(['', 'nan', 'None']);

export type StandardizeResult = {
  records: TransactionRecord[];
  before: number;
  after: number;
  removed: number;
  timestampUnit: TimestampUnit | null;
};

export function normalizeColumnName(name: string): string {
  return name.trim().toLowerCase().replace(/ /g, '_');
}

/** Maps each normalized column name to the first header that produces it. */
export function resolveColumns(columns: readonly string[]): Map<string, string> {
  const resolved = new Map<string, string>();
  for (const column of columns) {
    const normalized = normalizeColumnName(column);
    if (!resolved.has(normalized)) {
      resolved.set(normalized, column);
    }
  }
  return resolved;
}

function normalizeLabel(value: RawValue | undefined, zeroIsNull: boolean): string | null {
  const text = toText(value);
  if (text === null) return null;
  const trimmed = text.trim();
  if (NULL_TOKENS.has(trimmed)) return null;
  if (zeroIsNull && trimmed === '0') return null;
  return trimmed;
}

// Tokens are matched before lowercasing ("NONE" becomes "none"); a value that lowercases
// into a token ("NaN") is nulled too.
function normalizeTransactionType(value: RawValue | undefined): string | null {
  const label = normalizeLabel(value, false);
  if (label === null) return null;
  const lowered = label.toLowerCase();
  return NULL_TOKENS.has(lowered) ? null : lowered;
}

function columnReader(columns: Map<string, string>, name: string): ((row: DataRow) => RawValue) | null {
  const source = columns.get(name);
  if (source === undefined) return null;
  return (row) => row[source] ?? null;
}

function parseTimestamps(
  rows: readonly DataRow[],
  read: ((row: DataRow) => RawValue) | null,
  logger: RunLogger
): { values: (Instant | null)[]; unit: TimestampUnit | null } {
  if (!read) {
    return { values: rows.map(() => null), unit: null };
  }
  const raw = rows.map(read);
  if (isEpochColumn(raw)) {
    const unit = detectTimestampUnit(raw);
    logger.info(`Detected timestamp unit: ${unit}`);
    return {
      values: raw.map((value) => epochToInstant(value, unit)),
      unit,
    };
  }
  return { values: raw.map(toInstant), unit: null };
}

function dedupeKey(record: TransactionRecord): string {
  return JSON.stringify([
    record.timestamp.epochNanos.toString(),
    record.receiving_address,
    record.transaction_type,
    record.amount,
  ]);
}

export function standardize(dataset: Dataset, logger: RunLogger): StandardizeResult {
  logger.info('Starting cleaning and standardization');

  const columns = resolveColumns(dataset.columns);
  const readAddress = columnReader(columns, 'receiving_address');
  const readRegion = columnReader(columns, 'location_region');
  const readType = columnReader(columns, 'transaction_type');
  const readAmount = columnReader(columns, 'amount');
  const readRisk = columnReader(columns, 'risk_score');

  const timestamps = parseTimestamps(dataset.rows, columnReader(columns, 'timestamp'), logger);

  const before = dataset.rows.length;
  const seen = new Set<string>();
  const records: TransactionRecord[] = [];

  dataset.rows.forEach((row, index) => {
    const timestamp = timestamps.values[index];
    const transactionType = readType ? normalizeTransactionType(readType(row)) : null;
    const amount = readAmount ? toDecimal(readAmount(row)) : null;
    if (timestamp === null || transactionType === null || amount === null || amount < 0) {
      return;
    }

    const record: TransactionRecord = {
      timestamp,
      receiving_address: readAddress ? normalizeLabel(readAddress(row), true) : null,
      location_region: readRegion ? normalizeLabel(readRegion(row), true) : null,
      transaction_type: transactionType,
      amount,
      risk_score: readRisk ? toDecimal(readRisk(row)) : null,
    };

    const key = dedupeKey(record);
    if (seen.has(key)) return;
    seen.add(key);
    records.push(record);
  });

  const after = records.length;
  logger.info(`Cleaning finished. Rows before: ${before} | after: ${after} | removed: ${before - after}`);

  return { records, before, after, removed: before - after, timestampUnit: timestamps.unit };
}
