import type { UnixNanos } from "./types.js";

export const NANOS_PER_MILLISECOND = 1_000_000n;
export const NANOS_PER_SECOND = 1_000_000_000n;
export const NANOS_PER_MINUTE = 60n * NANOS_PER_SECOND;
export const NANOS_PER_HOUR = 60n * NANOS_PER_MINUTE;

export function nowNanos(): UnixNanos {
  return BigInt(Date.now()) * NANOS_PER_MILLISECOND;
}

/** Floor division; `divisor` must be positive. */
export function floorDiv(value: bigint, divisor: bigint): bigint {
  const quotient = value / divisor;
  return value % divisor !== 0n && value < 0n ? quotient - 1n : quotient;
}

/** Seconds since the epoch with millisecond precision, as sample timestamps are written. */
export function toUnixSeconds(ts: UnixNanos): number {
  return Number(floorDiv(ts, NANOS_PER_MILLISECOND)) / 1000;
}

const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;

/**
 * Parse an RFC 3339 timestamp with up to nanosecond fractional seconds.
 * Returns null when `text` is not one.
 */
export function parseRFC3339Nano(text: string): UnixNanos | null {
  const match = RFC3339.exec(text);
  if (!match) return null;

  const [, year, month, day, hour, minute, second, fraction, zulu, sign, offH, offM] = match;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);

  if (mo < 1 || mo > 12 || h > 23 || mi > 59 || s > 59) return null;

  const millis = Date.UTC(y, mo - 1, d, h, mi, s);
  const date = new Date(millis);
  // Date.UTC rolls 31 April over to 1 May; reject instead.
  if (date.getUTCDate() !== d || date.getUTCMonth() !== mo - 1) return null;

  let offsetMinutes = 0;
  if (!zulu) {
    const oh = Number(offH);
    const om = Number(offM);
    if (oh > 23 || om > 59) return null;
    offsetMinutes = (oh * 60 + om) * (sign === "-" ? -1 : 1);
  }

  const nanos = fraction ? BigInt(fraction.padEnd(9, "0")) : 0n;
  const utcMillis = millis - offsetMinutes * 60_000;
  return BigInt(utcMillis) * NANOS_PER_MILLISECOND + nanos;
}

/** RFC 3339 in UTC with trailing zeros of the fraction removed. */
export function formatRFC3339Nano(ts: UnixNanos): string {
  const seconds = floorDiv(ts, NANOS_PER_SECOND);
  const nanos = ts - seconds * NANOS_PER_SECOND;
  const base = new Date(Number(seconds) * 1000).toISOString().slice(0, 19);
  const fraction =
    nanos === 0n ? "" : `.${nanos.toString().padStart(9, "0").replace(/0+$/, "")}`;
  return `${base}${fraction}Z`;
}
