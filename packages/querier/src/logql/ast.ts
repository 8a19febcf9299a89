import type { LabelSet, Nanos } from "../types.js";
import { NANOS_PER_HOUR, NANOS_PER_MILLISECOND, NANOS_PER_MINUTE, NANOS_PER_SECOND } from "../time.js";

export type MatchType = "=" | "!=" | "=~" | "!~";

export type FilterType = "|=" | "!=" | "|~" | "!~";

export type RangeOperation = "count_over_time" | "rate";

export interface LabelMatcher {
  name: string;
  type: MatchType;
  value: string;
}

export interface LineFilter {
  type: FilterType;
  match: string;
}

export interface LogSelectorExpr {
  kind: "log";
  matchers: LabelMatcher[];
  filters: LineFilter[];
}

export interface RangeAggregationExpr {
  kind: "range";
  operation: RangeOperation;
  selector: LogSelectorExpr;
  range: Nanos;
}

export type Expr = LogSelectorExpr | RangeAggregationExpr;

/** Double-quoted string literal with backslash escapes. */
export function quote(value: string): string {
  return JSON.stringify(value);
}

const DURATION_UNITS: ReadonlyArray<[string, bigint]> = [
  ["h", NANOS_PER_HOUR],
  ["m", NANOS_PER_MINUTE],
  ["s", NANOS_PER_SECOND],
  ["ms", NANOS_PER_MILLISECOND],
];

/** Shortest `1h30m` style rendering of a duration. */
export function formatDuration(duration: Nanos): string {
  if (duration === 0n) return "0s";
  let rest = duration;
  let text = "";
  for (const [unit, size] of DURATION_UNITS) {
    const count = rest / size;
    if (count > 0n) {
      text += `${count}${unit}`;
      rest -= count * size;
    }
  }
  return text;
}

function formatMatcher(matcher: LabelMatcher): string {
  return `${matcher.name}${matcher.type}${quote(matcher.value)}`;
}

/** Canonical text of an expression, re-parseable by `parseExpr`. */
export function formatExpr(expr: Expr): string {
  if (expr.kind === "range") {
    return `${expr.operation}(${formatExpr(expr.selector)}[${formatDuration(expr.range)}])`;
  }
  let text = `{${expr.matchers.map(formatMatcher).join(",")}}`;
  for (const filter of expr.filters) {
    text += ` ${filter.type} ${quote(filter.match)}`;
  }
  return text;
}

/** Append a line filter, leaving `expr` untouched. */
export function withLineFilter(expr: LogSelectorExpr, filter: LineFilter): LogSelectorExpr {
  return { ...expr, filters: [...expr.filters, filter] };
}

/** `{a="1", b="2"}` rendering of a label set, names sorted. */
export function formatLabels(labels: LabelSet): string {
  const pairs = Object.keys(labels)
    .sort()
    .map((name) => `${name}=${quote(labels[name] ?? "")}`);
  return `{${pairs.join(", ")}}`;
}
