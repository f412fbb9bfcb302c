import { DeviceStatusDecodeError } from '../utils/errors.js';

export type StatsValue = [current: number, max: number, min: number, trend: number];
export type MaybeStatsValue = StatsValue | [null, null, null, null];

const STATS_VALUE_REGEX = /^(\d+)\((\d+)\/(\d+)\/(\d+)\)$/;
const INTEGER_REGEX = /^-?\d+$/;

/**
 * Parse the recurring `current(max/min/trend)` encoding, e.g. `781(781/723/1)`.
 * Anything short of a full match yields four nulls.
 */
export function parseStatsValue(s: string): MaybeStatsValue {
  const match = STATS_VALUE_REGEX.exec(s);
  if (match === null) {
    return [null, null, null, null];
  }
  return [Number(match[1]), Number(match[2]), Number(match[3]), Number(match[4])];
}

/**
 * Tenths of a degree Fahrenheit to milliKelvin, rounded to the nearest integer.
 */
export function tempToMilliKelvin(tenthsOfFahrenheit: number): number {
  return Math.round(1000 * ((tenthsOfFahrenheit / 10 - 32) * 5 / 9 + 273.15));
}

export function parseInteger(s: string, field: string): number {
  if (!INTEGER_REGEX.test(s)) {
    throw new DeviceStatusDecodeError(`Expected an integer for ${field}, got '${s}'`, {
      field,
      received: s,
      expected: 'integer',
    });
  }
  return Number(s);
}

export function stripPrefix(s: string, prefix: string, field: string): string {
  if (!s.startsWith(prefix)) {
    throw new DeviceStatusDecodeError(`Expected ${field} to start with '${prefix}', got '${s}'`, {
      field,
      received: s,
      expected: `${prefix}...`,
    });
  }
  return s.slice(prefix.length);
}

/**
 * Split on a delimiter and require an exact (or minimum) number of fields.
 */
export function splitFields(s: string, separator: string, count: number, field: string, atLeast = false): string[] {
  const parts = s.split(separator);
  if (atLeast ? parts.length < count : parts.length !== count) {
    throw new DeviceStatusDecodeError(
      `Expected ${atLeast ? 'at least ' : ''}${count} '${separator}'-separated fields in ${field}, got ${parts.length}`,
      { field, received: s, expected: `${count} fields` }
    );
  }
  return parts;
}

export function mapStats<T>(stats: MaybeStatsValue, fn: (value: number) => T): [T | null, T | null, T | null, T | null] {
  const [current, max, min, trend] = stats;
  return [
    current === null ? null : fn(current),
    max === null ? null : fn(max),
    min === null ? null : fn(min),
    trend === null ? null : fn(trend),
  ];
}
