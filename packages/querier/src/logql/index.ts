export {
  type Expr,
  type FilterType,
  type LabelMatcher,
  type LineFilter,
  type LogSelectorExpr,
  type MatchType,
  type RangeAggregationExpr,
  type RangeOperation,
  formatDuration,
  formatExpr,
  formatLabels,
  quote,
  withLineFilter,
} from "./ast.js";
export { ParseError, parseExpr, parseLogSelector } from "./parser.js";
export { compileRegex, compileSelector, type SelectorMatcher } from "./match.js";
