import { NANOS_PER_HOUR, NANOS_PER_MILLISECOND, NANOS_PER_MINUTE, NANOS_PER_SECOND } from "../time.js";
import type { Nanos } from "../types.js";
import type {
  Expr,
  FilterType,
  LabelMatcher,
  LineFilter,
  LogSelectorExpr,
  MatchType,
  RangeAggregationExpr,
  RangeOperation,
} from "./ast.js";
import { compileRegex } from "./match.js";

export class ParseError extends Error {
  readonly position: number;

  constructor(message: string, position: number) {
    super(`parse error at position ${position + 1}: ${message}`);
    this.name = "ParseError";
    this.position = position;
  }
}

// Longer operators first so `!=` is not read as `!` followed by `=`.
const MATCH_TYPES: readonly MatchType[] = ["=~", "!~", "!=", "="];
const FILTER_TYPES: readonly FilterType[] = ["|=", "!=", "|~", "!~"];
const RANGE_OPERATIONS: readonly RangeOperation[] = ["count_over_time", "rate"];

const IDENTIFIER = /[a-zA-Z_][a-zA-Z0-9_]*/y;
const DURATION_PART = /(\d+)(ms|s|m|h|d)/y;

const UNIT_NANOS: Record<string, bigint> = {
  ms: NANOS_PER_MILLISECOND,
  s: NANOS_PER_SECOND,
  m: NANOS_PER_MINUTE,
  h: NANOS_PER_HOUR,
  d: 24n * NANOS_PER_HOUR,
};

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  "'": "'",
  "\\": "\\",
  "/": "/",
  n: "\n",
  t: "\t",
  r: "\r",
  b: "\b",
  f: "\f",
  v: "\v",
  a: "\x07",
};

const HEX_ESCAPE_LENGTH: Record<string, number> = { x: 2, u: 4, U: 8 };

class Parser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parse(): Expr {
    this.skipSpace();
    const expr = this.peek() === "{" ? this.logSelector() : this.rangeAggregation();
    this.skipSpace();
    if (this.pos < this.text.length) {
      throw this.error(`unexpected '${this.text.charAt(this.pos)}'`);
    }
    return expr;
  }

  private logSelector(): LogSelectorExpr {
    this.expect("{");
    const matchers: LabelMatcher[] = [];
    this.skipSpace();
    if (this.peek() !== "}") {
      do {
        this.skipSpace();
        matchers.push(this.matcher());
        this.skipSpace();
      } while (this.consume(","));
    }
    this.expect("}");
    if (matchers.length === 0) {
      throw this.error("stream selector must contain at least one label matcher");
    }

    const filters: LineFilter[] = [];
    for (;;) {
      this.skipSpace();
      const type = this.oneOf(FILTER_TYPES);
      if (type === null) break;
      this.skipSpace();
      const start = this.pos;
      const match = this.string();
      if (type === "|~" || type === "!~") this.checkRegex(match, false, start);
      filters.push({ type, match });
    }

    return { kind: "log", matchers, filters };
  }

  private matcher(): LabelMatcher {
    const name = this.identifier("label name");
    this.skipSpace();
    const type = this.oneOf(MATCH_TYPES);
    if (type === null) throw this.error("expected a label matcher operator");
    this.skipSpace();
    const start = this.pos;
    const value = this.string();
    if (type === "=~" || type === "!~") this.checkRegex(value, true, start);
    return { name, type, value };
  }

  private rangeAggregation(): RangeAggregationExpr {
    const start = this.pos;
    const name = this.identifier("stream selector or range aggregation");
    const operation = RANGE_OPERATIONS.find((op) => op === name);
    if (operation === undefined) {
      throw new ParseError(`unknown function '${name}'`, start);
    }
    this.skipSpace();
    this.expect("(");
    this.skipSpace();
    const selector = this.logSelector();
    this.skipSpace();
    this.expect("[");
    const range = this.duration();
    this.expect("]");
    this.skipSpace();
    this.expect(")");
    return { kind: "range", operation, selector, range };
  }

  private duration(): Nanos {
    const start = this.pos;
    let total = 0n;
    DURATION_PART.lastIndex = this.pos;
    let part = DURATION_PART.exec(this.text);
    while (part !== null) {
      const [whole, count, unit] = part;
      total += BigInt(count ?? "0") * (UNIT_NANOS[unit ?? ""] ?? 0n);
      this.pos += whole.length;
      DURATION_PART.lastIndex = this.pos;
      part = DURATION_PART.exec(this.text);
    }
    if (total <= 0n) throw new ParseError("expected a positive duration", start);
    return total;
  }

  private string(): string {
    const open = this.peek();
    if (open === "`") {
      const end = this.text.indexOf("`", this.pos + 1);
      if (end < 0) throw this.error("unterminated raw string");
      const value = this.text.slice(this.pos + 1, end);
      this.pos = end + 1;
      return value;
    }
    if (open !== '"') throw this.error("expected a quoted string");

    let value = "";
    this.pos++;
    for (;;) {
      const ch = this.text.charAt(this.pos);
      if (ch === "") throw this.error("unterminated string");
      this.pos++;
      if (ch === '"') return value;
      if (ch !== "\\") {
        value += ch;
        continue;
      }
      value += this.escape();
    }
  }

  private escape(): string {
    const start = this.pos - 1;
    const code = this.text.charAt(this.pos);
    this.pos++;
    const simple = SIMPLE_ESCAPES[code];
    if (simple !== undefined) return simple;

    const length = HEX_ESCAPE_LENGTH[code];
    if (length !== undefined) {
      const digits = this.text.slice(this.pos, this.pos + length);
      if (digits.length === length && /^[0-9a-fA-F]+$/.test(digits)) {
        this.pos += length;
        const point = parseInt(digits, 16);
        if (point <= 0x10ffff) return String.fromCodePoint(point);
      }
    }
    throw new ParseError(`invalid escape sequence '\\${code}'`, start);
  }

  private identifier(what: string): string {
    IDENTIFIER.lastIndex = this.pos;
    const match = IDENTIFIER.exec(this.text);
    if (match === null) throw this.error(`expected ${what}`);
    this.pos += match[0].length;
    return match[0];
  }

  private checkRegex(pattern: string, anchored: boolean, position: number): void {
    try {
      compileRegex(pattern, anchored);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ParseError(`invalid regex ${JSON.stringify(pattern)}: ${reason}`, position);
    }
  }

  private oneOf<T extends string>(candidates: readonly T[]): T | null {
    for (const candidate of candidates) {
      if (this.text.startsWith(candidate, this.pos)) {
        this.pos += candidate.length;
        return candidate;
      }
    }
    return null;
  }

  private consume(token: string): boolean {
    if (!this.text.startsWith(token, this.pos)) return false;
    this.pos += token.length;
    return true;
  }

  private expect(token: string): void {
    if (!this.consume(token)) throw this.error(`expected '${token}'`);
  }

  private peek(): string {
    return this.text.charAt(this.pos);
  }

  private skipSpace(): void {
    while (/\s/.test(this.peek()) && this.pos < this.text.length) this.pos++;
  }

  private error(message: string): ParseError {
    return new ParseError(message, this.pos);
  }
}

export function parseExpr(text: string): Expr {
  return new Parser(text).parse();
}

/** Parse `text`, which must be a stream selector with optional line filters. */
export function parseLogSelector(text: string): LogSelectorExpr {
  const expr = parseExpr(text);
  if (expr.kind !== "log") {
    throw new ParseError("expected a log selector, got a range aggregation", 0);
  }
  return expr;
}
