const NANOS_PER_MILLI = 1_000_000n;
// Date's range, ±8.64e15 ms.
const MAX_EPOCH_NANOS = 8_640_000_000_000_000n * NANOS_PER_MILLI;

const DECIMAL_TEXT = /^([+-])?(\d+)(?:\.(\d*))?$/;

/**
 * Shifts a plain decimal literal `digits` places to the left of the point and returns
 * the integer part, so `scaleDecimal('1.5', 3)` is `1500n`. Extra fraction digits are
 * truncated. Returns null for anything that is not a plain decimal literal.
 */
export function scaleDecimal(text: string, digits: number): bigint | null {
  const match = DECIMAL_TEXT.exec(text.trim());
  if (!match) return null;
  const [, sign = '', whole, fraction = ''] = match;
  const scaled = BigInt(whole + fraction.padEnd(digits, '0').slice(0, digits));
  return sign === '-' ? -scaled : scaled;
}

/** Same as `scaleDecimal` for a number; exponent forms fall back to float rounding. */
export function scaleNumber(value: number, digits: number): bigint | null {
  if (!Number.isFinite(value)) return null;
  return scaleDecimal(String(value), digits) ?? BigInt(Math.round(value * 10 ** digits));
}

/**
 * A UTC instant with nanosecond resolution. `Date` only holds milliseconds, so sub-millisecond
 * epochs would collapse onto the same value without this.
 */
export class Instant {
  private constructor(readonly epochNanos: bigint) {}

  static fromEpochNanos(epochNanos: bigint): Instant | null {
    const magnitude = epochNanos < 0n ? -epochNanos : epochNanos;
    return magnitude > MAX_EPOCH_NANOS ? null : new Instant(epochNanos);
  }

  static fromEpochMillis(epochMillis: number, subMilliNanos = 0n): Instant | null {
    if (!Number.isInteger(epochMillis)) return null;
    return Instant.fromEpochNanos(BigInt(epochMillis) * NANOS_PER_MILLI + subMilliNanos);
  }

  private millisAndRemainder(): [bigint, bigint] {
    let millis = this.epochNanos / NANOS_PER_MILLI;
    let remainder = this.epochNanos % NANOS_PER_MILLI;
    if (remainder < 0n) {
      millis -= 1n;
      remainder += NANOS_PER_MILLI;
    }
    return [millis, remainder];
  }

  toDate(): Date {
    return new Date(Number(this.millisAndRemainder()[0]));
  }

  compare(other: Instant): number {
    if (this.epochNanos === other.epochNanos) return 0;
    return this.epochNanos < other.epochNanos ? -1 : 1;
  }

  /** ISO-8601 in UTC, with 3, 6 or 9 fraction digits depending on the precision held. */
  toISOString(): string {
    const [, remainder] = this.millisAndRemainder();
    const iso = this.toDate().toISOString();
    if (remainder === 0n) return iso;
    let extra = remainder.toString().padStart(6, '0');
    if (extra.endsWith('000')) extra = extra.slice(0, 3);
    return `${iso.slice(0, -1)}${extra}Z`;
  }

  toJSON(): string {
    return this.toISOString();
  }
}
