import { Instant, scaleNumber } from './instant.js';
import type { RawValue } from './types.js';

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const NAIVE_ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?$/;
const SECONDS_FRACTION = /:\d{2}\.(\d+)/;

export function toText(value: RawValue | undefined): string | null {
  if (value == null) return null;
  if (value instanceof Instant) return value.toISOString();
  return String(value);
}

export function toDecimal(value: RawValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

// Splits a fraction of a second into whole milliseconds and the nanoseconds below them.
function splitFraction(fraction: string): [number, bigint] {
  const padded = fraction.padEnd(9, '0').slice(0, 9);
  return [Number(padded.slice(0, 3)), BigInt(padded.slice(3))];
}

// Naive date-times carry no offset and are read as UTC.
function parseNaiveIso(text: string): Instant | null {
  const match = NAIVE_ISO_PATTERN.exec(text);
  if (!match) return null;
  const [, year, month, day, hour = '0', minute = '0', second = '0', fraction = ''] = match;
  const [millis, subMilli] = splitFraction(fraction);
  const date = new Date(
    Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second), millis)
  );
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day) ||
    date.getUTCHours() !== Number(hour) ||
    date.getUTCMinutes() !== Number(minute) ||
    date.getUTCSeconds() !== Number(second)
  ) {
    return null;
  }
  return Instant.fromEpochMillis(date.getTime(), subMilli);
}

/**
 * Parses a date-time value into a UTC instant, or null when it cannot be read.
 * Bare numbers are taken as epoch nanoseconds. Fractions of a second keep up to
 * nine digits.
 */
export function toInstant(value: RawValue | undefined): Instant | null {
  if (value == null) return null;
  if (value instanceof Instant) return value;
  if (typeof value === 'number') {
    const nanos = scaleNumber(value, 0);
    return nanos === null ? null : Instant.fromEpochNanos(nanos);
  }
  const trimmed = value.trim();
  if (!trimmed.length) return null;
  if (NAIVE_ISO_PATTERN.test(trimmed)) return parseNaiveIso(trimmed);
  const parsed = Date.parse(trimmed);
  if (Number.isNaN(parsed)) return null;
  const fraction = SECONDS_FRACTION.exec(trimmed)?.[1] ?? '';
  return Instant.fromEpochMillis(parsed, splitFraction(fraction)[1]);
}

export function isMissing(value: RawValue | undefined): boolean {
  if (value == null) return true;
  return typeof value === 'number' && Number.isNaN(value);
}
