import type { LabelSet } from "../types.js";
import type { LabelMatcher, LineFilter, LogSelectorExpr } from "./ast.js";

const CASE_INSENSITIVE = "(?i)";

/**
 * Compile a pattern. Label matchers are anchored at both ends, line filters
 * are not. A leading `(?i)` turns into the `i` flag. Throws SyntaxError on
 * an invalid pattern.
 */
export function compileRegex(pattern: string, anchored: boolean): RegExp {
  let source = pattern;
  let flags = "";
  if (source.startsWith(CASE_INSENSITIVE)) {
    source = source.slice(CASE_INSENSITIVE.length);
    flags = "i";
  }
  return new RegExp(anchored ? `^(?:${source})$` : source, flags);
}

export type LabelPredicate = (labels: LabelSet) => boolean;
export type LinePredicate = (line: string) => boolean;

function matcherPredicate(matcher: LabelMatcher): LabelPredicate {
  const { name, value } = matcher;
  switch (matcher.type) {
    case "=":
      return (labels) => (labels[name] ?? "") === value;
    case "!=":
      return (labels) => (labels[name] ?? "") !== value;
    case "=~": {
      const re = compileRegex(value, true);
      return (labels) => re.test(labels[name] ?? "");
    }
    case "!~": {
      const re = compileRegex(value, true);
      return (labels) => !re.test(labels[name] ?? "");
    }
  }
}

function filterPredicate(filter: LineFilter): LinePredicate {
  const { match } = filter;
  switch (filter.type) {
    case "|=":
      return (line) => line.includes(match);
    case "!=":
      return (line) => !line.includes(match);
    case "|~": {
      const re = compileRegex(match, false);
      return (line) => re.test(line);
    }
    case "!~": {
      const re = compileRegex(match, false);
      return (line) => !re.test(line);
    }
  }
}

/** Compiled stream selector: one predicate for labels, one for lines. */
export interface SelectorMatcher {
  labels: LabelPredicate;
  line: LinePredicate;
}

export function compileSelector(expr: LogSelectorExpr): SelectorMatcher {
  const labelPredicates = expr.matchers.map(matcherPredicate);
  const linePredicates = expr.filters.map(filterPredicate);
  return {
    labels: (labels) => labelPredicates.every((p) => p(labels)),
    line: (line) => linePredicates.every((p) => p(line)),
  };
}
