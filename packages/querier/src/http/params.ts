import { invalidParameter } from "../errors.js";
import { NANOS_PER_MILLISECOND, NANOS_PER_SECOND, parseRFC3339Nano } from "../time.js";
import { DIRECTIONS, type Direction, type UnixNanos } from "../types.js";

/** Parsed query string; repeated keys arrive as arrays. */
export type QueryValues = Record<string, string | string[] | undefined>;

const INTEGER = /^[+-]?\d+$/;

/** Timestamps are signed 64-bit nanosecond counts. */
const MAX_INT64 = 2n ** 63n - 1n;

/** Points a range query without an explicit step resolves to. */
const TARGET_RANGE_POINTS = 250;

/** First value of `name`, "" when absent. */
export function getParam(values: QueryValues, name: string): string {
  const value = values[name];
  if (Array.isArray(value)) return value[0] ?? "";
  return value ?? "";
}

function parseInteger(value: string): bigint | null {
  return INTEGER.test(value) ? BigInt(value) : null;
}

/**
 * Base-10 integer parameter. Empty yields `def`; anything that is not an
 * integer in the safe range is an InvalidParameter.
 */
export function intParam(values: QueryValues, name: string, def: number): number {
  const value = getParam(values, name);
  if (value === "") return def;

  const parsed = parseInteger(value);
  if (
    parsed === null ||
    parsed > BigInt(Number.MAX_SAFE_INTEGER) ||
    parsed < BigInt(Number.MIN_SAFE_INTEGER)
  ) {
    throw invalidParameter(`cannot parse "${value}" as an integer for parameter "${name}"`);
  }
  return Number(parsed);
}

/**
 * Timestamp parameter, in nanoseconds since the epoch.
 *
 * - `1.5` style values are float seconds; the fraction is rounded to the
 *   millisecond before it is scaled to nanoseconds.
 * - Integers of up to 10 characters are seconds, longer ones nanoseconds.
 *   The decision is made on the length of the text, not its magnitude.
 * - Anything else must be RFC 3339.
 */
export function unixNanoTimeParam(
  values: QueryValues,
  name: string,
  def: UnixNanos,
): UnixNanos {
  const value = getParam(values, name);
  if (value === "") return def;

  if (value.includes(".")) {
    const float = Number(value);
    if (value.trim() === value && Number.isFinite(float)) {
      const seconds = Math.trunc(float);
      const millis = Math.round((float - seconds) * 1000);
      return BigInt(seconds) * NANOS_PER_SECOND + BigInt(millis) * NANOS_PER_MILLISECOND;
    }
  }

  const integer = parseInteger(value);
  if (integer === null) {
    const ts = parseRFC3339Nano(value);
    if (ts !== null) return ts;
    throw invalidParameter(`cannot parse "${value}" as a timestamp for parameter "${name}"`);
  }
  if (integer > MAX_INT64 || integer < -MAX_INT64) {
    throw invalidParameter(`cannot parse "${value}" as a timestamp for parameter "${name}"`);
  }

  if (value.length <= 10) return integer * NANOS_PER_SECOND;
  return integer;
}

/** FORWARD or BACKWARD, case-insensitive. */
export function directionParam(values: QueryValues, name: string, def: Direction): Direction {
  const value = getParam(values, name);
  if (value === "") return def;

  const direction = DIRECTIONS.find((d) => d === value.toUpperCase());
  if (direction === undefined) {
    throw invalidParameter(`invalid direction '${value}'`);
  }
  return direction;
}

/**
 * Step in seconds for a range query that gives none: about 250 points over
 * the range, never below one second.
 */
export function defaultQueryRangeStep(start: UnixNanos, end: UnixNanos): number {
  const seconds = Number(end - start) / Number(NANOS_PER_SECOND);
  return Math.max(Math.floor(seconds / TARGET_RANGE_POINTS), 1);
}
