import { ERR, QuerierError, errorMessage, invalidParameter } from "../errors.js";
import { formatExpr, parseLogSelector, withLineFilter } from "../logql/index.js";
import { NANOS_PER_HOUR, NANOS_PER_SECOND, nowNanos } from "../time.js";
import type {
  InstantQueryRequest,
  LabelRequest,
  RangeQueryRequest,
  TailRequest,
  UnixNanos,
} from "../types.js";
import {
  type QueryValues,
  defaultQueryRangeStep,
  directionParam,
  getParam,
  intParam,
  unixNanoTimeParam,
} from "./params.js";

export const DEFAULT_QUERY_LIMIT = 100;
export const DEFAULT_SINCE = NANOS_PER_HOUR;
export const DEFAULT_LABEL_SINCE = 6n * NANOS_PER_HOUR;
export const MAX_DELAY_FOR_IN_TAILING = 5;
/** Most points a range query may resolve to per series. */
export const MAX_QUERY_POINTS = 11_000;

const MAX_UINT32 = 0xffff_ffff;

function countParam(values: QueryValues, name: string, def: number): number {
  const value = intParam(values, name, def);
  if (value < 0 || value > MAX_UINT32) {
    throw invalidParameter(`parameter "${name}" must be between 0 and ${MAX_UINT32}, got ${value}`);
  }
  return value;
}

export interface Lookback {
  limit: number;
  start: UnixNanos;
  end: UnixNanos;
}

/** `limit`, `start` and `end` shared by range and tail requests. */
export function lookback(values: QueryValues, now: UnixNanos = nowNanos()): Lookback {
  return {
    limit: countParam(values, "limit", DEFAULT_QUERY_LIMIT),
    start: unixNanoTimeParam(values, "start", now - DEFAULT_SINCE),
    end: unixNanoTimeParam(values, "end", now),
  };
}

export function toInstantQueryRequest(
  values: QueryValues,
  now: UnixNanos = nowNanos(),
): InstantQueryRequest {
  return {
    query: getParam(values, "query"),
    limit: countParam(values, "limit", DEFAULT_QUERY_LIMIT),
    time: unixNanoTimeParam(values, "time", now),
    direction: directionParam(values, "direction", "BACKWARD"),
  };
}

export function toRangeQueryRequest(
  values: QueryValues,
  now: UnixNanos = nowNanos(),
): RangeQueryRequest {
  const { limit, start, end } = lookback(values, now);

  const step = intParam(values, "step", defaultQueryRangeStep(start, end));
  if (step <= 0) {
    throw invalidParameter(
      "zero or negative query resolution step widths are not accepted. Try a positive integer",
    );
  }

  const stepNanos = BigInt(step) * NANOS_PER_SECOND;
  if ((end - start) / stepNanos > BigInt(MAX_QUERY_POINTS)) {
    throw invalidParameter(
      "exceeded maximum resolution of 11,000 points per timeseries. Try decreasing the query resolution (?step=XX)",
    );
  }

  return {
    query: getParam(values, "query"),
    start,
    end,
    step: stepNanos,
    limit,
    direction: directionParam(values, "direction", "BACKWARD"),
  };
}

/**
 * Tail request, with `regexp` folded into the query. A `delay_for` above
 * MAX_DELAY_FOR_IN_TAILING is a DelayTooLarge.
 */
export function toTailRequest(values: QueryValues, now: UnixNanos = nowNanos()): TailRequest {
  const { limit, start } = lookback(values, now);

  const delayFor = countParam(values, "delay_for", 0);
  if (delayFor > MAX_DELAY_FOR_IN_TAILING) {
    throw new QuerierError(
      ERR.DELAY_TOO_LARGE,
      `delay_for can't be greater than ${MAX_DELAY_FOR_IN_TAILING}`,
    );
  }

  return {
    query: parseRegexQuery(values),
    start,
    limit,
    delayFor,
  };
}

/**
 * Label names, or the values of `name` when one is given. `end` defaults to
 * now and `start` to six hours before `end`.
 */
export function toLabelRequest(
  values: QueryValues,
  name: string | undefined,
  now: UnixNanos = nowNanos(),
): LabelRequest {
  const end = unixNanoTimeParam(values, "end", now);
  const start = unixNanoTimeParam(values, "start", end - DEFAULT_LABEL_SINCE);
  return name === undefined
    ? { values: false, start, end }
    : { name, values: true, start, end };
}

/**
 * `query` combined with the deprecated `regexp` parameter: the regexp becomes
 * a `|~` line filter on the selector. Without `regexp` the query is returned
 * untouched.
 */
export function parseRegexQuery(values: QueryValues): string {
  const query = getParam(values, "query");
  const regexp = getParam(values, "regexp");
  if (regexp === "") return query;

  try {
    const selector = parseLogSelector(query);
    return formatExpr(withLineFilter(selector, { type: "|~", match: regexp }));
  } catch (err) {
    throw invalidParameter(errorMessage(err));
  }
}
