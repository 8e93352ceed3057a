import { toDecimal } from './coerce.js';
import { Instant, scaleDecimal, scaleNumber } from './instant.js';
import type { RawValue } from './types.js';

export type TimestampUnit = 'ns' | 'us' | 'ms' | 's';

// Decimal places between each unit and nanoseconds.
const NANO_DIGITS: Record<TimestampUnit, number> = {
  ns: 0,
  us: 3,
  ms: 6,
  s: 9,
};

const EPOCH_DIGITS = /^\d+(\.\d+)?$/;

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return (sorted[middle - 1] + sorted[middle]) / 2;
  }
  return sorted[middle];
}

export function detectTimestampUnit(values: readonly RawValue[]): TimestampUnit {
  const numeric: number[] = [];
  for (const value of values) {
    const parsed = toDecimal(value);
    if (parsed !== null) numeric.push(Math.abs(parsed));
  }
  if (!numeric.length) return 's';

  const magnitude = median(numeric);
  if (magnitude > 1e17) return 'ns';
  if (magnitude > 1e14) return 'us';
  if (magnitude > 1e11) return 'ms';
  return 's';
}

/** True when every non-null value is a number or an unsigned integer/decimal literal. */
export function isEpochColumn(values: readonly RawValue[]): boolean {
  return values.every((value) => {
    if (value == null) return true;
    if (typeof value === 'number') return true;
    return typeof value === 'string' && EPOCH_DIGITS.test(value);
  });
}

/** Converts an epoch number or digit string exactly, down to the nanosecond. */
export function epochToInstant(value: RawValue | undefined, unit: TimestampUnit): Instant | null {
  const digits = NANO_DIGITS[unit];
  let nanos: bigint | null = null;
  if (typeof value === 'number') {
    nanos = scaleNumber(value, digits);
  } else if (typeof value === 'string') {
    nanos = scaleDecimal(value, digits);
  }
  return nanos === null ? null : Instant.fromEpochNanos(nanos);
}
