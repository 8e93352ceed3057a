import { describe, expect, it } from 'vitest';
import { Instant, scaleDecimal, scaleNumber } from './instant.js';

describe('scaleDecimal', () => {
  it('shifts the decimal point and truncates extra digits', () => {
    expect(scaleDecimal('1.5', 3)).toBe(1500n);
    expect(scaleDecimal('42', 0)).toBe(42n);
    expect(scaleDecimal('0.1234', 2)).toBe(12n);
    expect(scaleDecimal('-2.25', 2)).toBe(-225n);
    expect(scaleDecimal('1e3', 0)).toBeNull();
  });

  it('handles numbers, including exponent forms', () => {
    expect(scaleNumber(1.5, 3)).toBe(1500n);
    expect(scaleNumber(1e21, 0)).toBe(1_000_000_000_000_000_000_000n);
    expect(scaleNumber(Number.POSITIVE_INFINITY, 0)).toBeNull();
  });
});

describe('Instant', () => {
  it('prints only the precision it holds', () => {
    expect(Instant.fromEpochNanos(1_000_000n)?.toISOString()).toBe('1970-01-01T00:00:00.001Z');
    expect(Instant.fromEpochNanos(1_001_000n)?.toISOString()).toBe('1970-01-01T00:00:00.001001Z');
    expect(Instant.fromEpochNanos(1_000_001n)?.toISOString()).toBe('1970-01-01T00:00:00.001000001Z');
  });

  it('floors negative epochs onto the previous millisecond', () => {
    expect(Instant.fromEpochNanos(-1n)?.toISOString()).toBe('1969-12-31T23:59:59.999999999Z');
  });

  it('compares at nanosecond resolution', () => {
    const earlier = Instant.fromEpochMillis(0, 1n);
    const later = Instant.fromEpochMillis(0, 2n);
    expect(earlier && later && earlier.compare(later)).toBe(-1);
    expect(earlier && later && later.compare(earlier)).toBe(1);
    expect(earlier && earlier.compare(earlier)).toBe(0);
  });

  it('rejects instants outside the Date range', () => {
    expect(Instant.fromEpochMillis(8.64e15)).not.toBeNull();
    expect(Instant.fromEpochMillis(8.64e15 + 1)).toBeNull();
    expect(Instant.fromEpochMillis(1.5)).toBeNull();
  });

  it('serializes to its ISO form', () => {
    expect(JSON.stringify({ at: Instant.fromEpochNanos(0n) })).toBe('{"at":"1970-01-01T00:00:00.000Z"}');
  });
});
