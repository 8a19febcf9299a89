import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { createLogger } from "@logquery/shared/utils";
import {
  type LogSelectorExpr,
  type RangeAggregationExpr,
  type SelectorMatcher,
  compileSelector,
  formatLabels,
  parseExpr,
  parseLogSelector,
} from "../logql/index.js";
import { NANOS_PER_HOUR, NANOS_PER_SECOND, nowNanos } from "../time.js";
import type {
  Direction,
  DroppedEntry,
  Entry,
  InstantQueryParams,
  LabelRequest,
  LabelResponse,
  LabelSet,
  Nanos,
  QuerierBackend,
  Query,
  QueryResult,
  RangeQueryParams,
  Sample,
  Series,
  Stream,
  TailRequest,
  TailResponse,
  TailSubscription,
  UnixNanos,
  VectorSample,
} from "../types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const logger = createLogger("memory-store");

const RETENTION_SWEEP_INTERVAL_MS = 3_600_000;
const TAIL_FLUSH_INTERVAL_MS = 250;
const STEPS_PER_YIELD = 1000;
const DEFAULT_RETENTION = 24n * NANOS_PER_HOUR;

/** Entries a delayed tail subscription holds before it starts dropping the oldest. */
export const MAX_BUFFERED_TAIL_ENTRIES = 1000;

export const INSTANT_LOG_QUERY_UNSUPPORTED =
  "log queries are not supported as an instant query type, please change your query to a range query type";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface StoredStream {
  key: string;
  labels: LabelSet;
  /** Sorted by timestamp. */
  entries: Entry[];
}

interface KeyedEntry {
  key: string;
  labels: LabelSet;
  entry: Entry;
}

/** Index of the first entry with timestamp >= ts. */
function lowerBound(entries: Entry[], ts: UnixNanos): number {
  let lo = 0;
  let hi = entries.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const entry = entries[mid];
    if (entry !== undefined && entry.timestamp < ts) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

function compareTimestamps(a: KeyedEntry, b: KeyedEntry): number {
  if (a.entry.timestamp === b.entry.timestamp) return 0;
  return a.entry.timestamp < b.entry.timestamp ? -1 : 1;
}

/** Group entries by stream, keeping the order streams and entries first appear in. */
function groupByStream(items: KeyedEntry[]): Stream[] {
  const streams = new Map<string, Stream>();
  for (const { key, labels, entry } of items) {
    let stream = streams.get(key);
    if (!stream) {
      stream = { labels, entries: [] };
      streams.set(key, stream);
    }
    stream.entries.push(entry);
  }
  return [...streams.values()];
}

// ---------------------------------------------------------------------------
// Tail subscription
// ---------------------------------------------------------------------------

class MemoryTailSubscription implements TailSubscription {
  private responseListener: ((response: TailResponse) => void) | null = null;
  private errorListener: ((err: Error) => void) | null = null;
  private readonly pendingResponses: TailResponse[] = [];
  private pendingError: Error | null = null;
  private held: KeyedEntry[] = [];
  private dropped: DroppedEntry[] = [];
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private closed = false;

  constructor(
    readonly matcher: SelectorMatcher,
    private readonly delay: Nanos,
    private readonly now: () => UnixNanos,
    private readonly onClose: (subscription: MemoryTailSubscription) => void,
  ) {
    if (delay > 0n) {
      this.flushTimer = setInterval(() => this.flush(), TAIL_FLUSH_INTERVAL_MS);
    }
  }

  onResponse(listener: (response: TailResponse) => void): void {
    this.responseListener = listener;
    for (const response of this.pendingResponses.splice(0)) listener(response);
  }

  onError(listener: (err: Error) => void): void {
    this.errorListener = listener;
    if (this.pendingError) {
      const err = this.pendingError;
      this.pendingError = null;
      listener(err);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    this.onClose(this);
  }

  /** Entries of a stream whose labels already matched. */
  offer(key: string, labels: LabelSet, entries: Entry[]): void {
    const matching = entries
      .filter((entry) => this.matcher.line(entry.line))
      .map((entry) => ({ key, labels, entry }));
    if (matching.length === 0) return;

    if (this.delay === 0n) {
      this.emit({ streams: groupByStream(matching), droppedEntries: this.dropped.splice(0) });
      return;
    }

    this.held.push(...matching);
    if (this.held.length > MAX_BUFFERED_TAIL_ENTRIES) {
      this.held.sort(compareTimestamps);
      const overflow = this.held.splice(0, this.held.length - MAX_BUFFERED_TAIL_ENTRIES);
      for (const { labels: dropLabels, entry } of overflow) {
        this.dropped.push({ labels: dropLabels, timestamp: entry.timestamp });
      }
    }
  }

  /** Deliver held entries older than now minus the delay, oldest first. */
  flush(): void {
    const cutoff = this.now() - this.delay;
    const ready = this.held.filter((item) => item.entry.timestamp <= cutoff).sort(compareTimestamps);
    if (ready.length === 0 && this.dropped.length === 0) return;
    this.held = this.held.filter((item) => item.entry.timestamp > cutoff);
    this.emit({ streams: groupByStream(ready), droppedEntries: this.dropped.splice(0) });
  }

  emit(response: TailResponse): void {
    if (this.closed) return;
    if (this.responseListener) this.responseListener(response);
    else this.pendingResponses.push(response);
  }

  fail(err: Error): void {
    if (this.closed) return;
    if (this.errorListener) this.errorListener(err);
    else this.pendingError = err;
  }
}

// ---------------------------------------------------------------------------
// InMemoryLogStore
// ---------------------------------------------------------------------------

export interface InMemoryLogStoreOptions {
  /** How long entries are kept. */
  retention?: Nanos;
  /** Clock, nanoseconds since the epoch. */
  now?: () => UnixNanos;
}

/**
 * Query engine, label source and tailer over streams held in memory.
 */
export class InMemoryLogStore implements QuerierBackend {
  private readonly streams = new Map<string, StoredStream>();
  private readonly subscriptions = new Set<MemoryTailSubscription>();
  private readonly retention: Nanos;
  private readonly now: () => UnixNanos;
  private retentionTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: InMemoryLogStoreOptions = {}) {
    this.retention = options.retention ?? DEFAULT_RETENTION;
    this.now = options.now ?? nowNanos;
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /** Start the retention sweep. */
  start(): void {
    if (this.retentionTimer) return;
    this.retentionTimer = setInterval(() => this.sweep(), RETENTION_SWEEP_INTERVAL_MS);
    logger.info({ retentionHours: Number(this.retention / NANOS_PER_HOUR) }, "Log store started");
  }

  /** Stop timers and fail every open tail subscription. */
  async stop(): Promise<void> {
    if (this.retentionTimer) {
      clearInterval(this.retentionTimer);
      this.retentionTimer = null;
    }
    const open = [...this.subscriptions];
    for (const subscription of open) {
      subscription.fail(new Error("store is shutting down"));
    }
    logger.info({ subscriptions: open.length }, "Log store stopped");
  }

  get subscriptionCount(): number {
    return this.subscriptions.size;
  }

  // -----------------------------------------------------------------------
  // Ingest
  // -----------------------------------------------------------------------

  /** Append entries; returns how many were stored. */
  push(streams: Stream[]): number {
    let count = 0;
    for (const { labels, entries } of streams) {
      if (entries.length === 0) continue;
      const key = formatLabels(labels);
      let stored = this.streams.get(key);
      if (!stored) {
        stored = { key, labels: { ...labels }, entries: [] };
        this.streams.set(key, stored);
      }
      for (const entry of entries) {
        const at = lowerBound(stored.entries, entry.timestamp + 1n);
        stored.entries.splice(at, 0, entry);
      }
      count += entries.length;

      for (const subscription of this.subscriptions) {
        if (subscription.matcher.labels(stored.labels)) {
          subscription.offer(key, stored.labels, entries);
        }
      }
    }
    logger.debug({ count }, "Entries pushed");
    return count;
  }

  /** Drop entries older than the retention window. */
  sweep(): number {
    const cutoff = this.now() - this.retention;
    let removed = 0;
    for (const [key, stored] of this.streams) {
      const keepFrom = lowerBound(stored.entries, cutoff);
      removed += keepFrom;
      stored.entries.splice(0, keepFrom);
      if (stored.entries.length === 0) this.streams.delete(key);
    }
    if (removed > 0) logger.info({ removed }, "Retention sweep completed");
    return removed;
  }

  // -----------------------------------------------------------------------
  // QueryEngine
  // -----------------------------------------------------------------------

  newRangeQuery(params: RangeQueryParams): Query {
    return {
      exec: async (signal: AbortSignal): Promise<QueryResult> => {
        signal.throwIfAborted();
        const expr = parseExpr(params.query);
        if (expr.kind === "log") {
          return {
            resultType: "streams",
            streams: this.select(expr, params.start, params.end, params.direction, params.limit),
          };
        }
        return { resultType: "matrix", matrix: await this.rangeSeries(expr, params, signal) };
      },
    };
  }

  newInstantQuery(params: InstantQueryParams): Query {
    return {
      exec: async (signal: AbortSignal): Promise<QueryResult> => {
        signal.throwIfAborted();
        const expr = parseExpr(params.query);
        if (expr.kind === "log") {
          throw new Error(INSTANT_LOG_QUERY_UNSUPPORTED);
        }
        return { resultType: "vector", vector: this.instantVector(expr, params.time) };
      },
    };
  }

  // -----------------------------------------------------------------------
  // LabelQuerier
  // -----------------------------------------------------------------------

  async label(request: LabelRequest): Promise<LabelResponse> {
    const found = new Set<string>();
    for (const stored of this.streams.values()) {
      const from = lowerBound(stored.entries, request.start);
      const first = stored.entries[from];
      if (first === undefined || first.timestamp > request.end) continue;

      if (request.values && request.name !== undefined) {
        const value = stored.labels[request.name];
        if (value !== undefined) found.add(value);
      } else {
        for (const name of Object.keys(stored.labels)) found.add(name);
      }
    }
    return { values: [...found].sort() };
  }

  // -----------------------------------------------------------------------
  // Tailer
  // -----------------------------------------------------------------------

  async tail(request: TailRequest): Promise<TailSubscription> {
    const expr = parseLogSelector(request.query);
    const subscription = new MemoryTailSubscription(
      compileSelector(expr),
      BigInt(request.delayFor) * NANOS_PER_SECOND,
      this.now,
      (closed) => {
        this.subscriptions.delete(closed);
        logger.debug({ subscriptions: this.subscriptions.size }, "Tail subscription closed");
      },
    );

    const history = this.select(expr, request.start, this.now() + 1n, "FORWARD", Infinity);
    const recent = history.flatMap((stream) =>
      stream.entries.map((entry) => ({ key: formatLabels(stream.labels), labels: stream.labels, entry })),
    );
    recent.sort(compareTimestamps);
    const replay = recent.slice(Math.max(recent.length - request.limit, 0));
    if (replay.length > 0) {
      subscription.emit({ streams: groupByStream(replay), droppedEntries: [] });
    }

    this.subscriptions.add(subscription);
    logger.debug({ query: request.query, subscriptions: this.subscriptions.size }, "Tail subscription opened");
    return subscription;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  /** Entries with start <= ts < end, ordered by direction across streams, at most `limit`. */
  private select(
    expr: LogSelectorExpr,
    start: UnixNanos,
    end: UnixNanos,
    direction: Direction,
    limit: number,
  ): Stream[] {
    const matcher = compileSelector(expr);
    const items: KeyedEntry[] = [];
    for (const stored of this.streams.values()) {
      if (!matcher.labels(stored.labels)) continue;
      const from = lowerBound(stored.entries, start);
      const to = lowerBound(stored.entries, end);
      for (const entry of stored.entries.slice(from, to)) {
        if (matcher.line(entry.line)) items.push({ key: stored.key, labels: stored.labels, entry });
      }
    }

    items.sort(compareTimestamps);
    if (direction === "BACKWARD") items.reverse();
    return groupByStream(items.slice(0, limit));
  }

  /** Matching entries per stream for a range aggregation. */
  private matchingStreams(expr: RangeAggregationExpr): Array<{ labels: LabelSet; entries: Entry[] }> {
    const matcher = compileSelector(expr.selector);
    const result: Array<{ labels: LabelSet; entries: Entry[] }> = [];
    for (const stored of this.streams.values()) {
      if (!matcher.labels(stored.labels)) continue;
      result.push({
        labels: stored.labels,
        entries: stored.entries.filter((entry) => matcher.line(entry.line)),
      });
    }
    return result;
  }

  /** Value of the aggregation over (at - range, at], or null without entries. */
  private sampleAt(expr: RangeAggregationExpr, entries: Entry[], at: UnixNanos): Sample | null {
    const count = lowerBound(entries, at + 1n) - lowerBound(entries, at - expr.range + 1n);
    if (count === 0) return null;
    const value =
      expr.operation === "rate" ? count / (Number(expr.range) / Number(NANOS_PER_SECOND)) : count;
    return { timestamp: at, value };
  }

  /** Yields every STEPS_PER_YIELD steps and stops once `signal` aborts. */
  private async rangeSeries(
    expr: RangeAggregationExpr,
    params: RangeQueryParams,
    signal: AbortSignal,
  ): Promise<Series[]> {
    const series: Series[] = [];
    let steps = 0;
    for (const { labels, entries } of this.matchingStreams(expr)) {
      const samples: Sample[] = [];
      for (let at = params.start; at <= params.end; at += params.step) {
        if (++steps % STEPS_PER_YIELD === 0) {
          await yieldToEventLoop();
          signal.throwIfAborted();
        }
        const sample = this.sampleAt(expr, entries, at);
        if (sample) samples.push(sample);
      }
      if (samples.length > 0) series.push({ metric: labels, samples });
    }
    return series;
  }

  private instantVector(expr: RangeAggregationExpr, at: UnixNanos): VectorSample[] {
    const vector: VectorSample[] = [];
    for (const { labels, entries } of this.matchingStreams(expr)) {
      const sample = this.sampleAt(expr, entries, at);
      if (sample) vector.push({ metric: labels, sample });
    }
    return vector;
  }
}
