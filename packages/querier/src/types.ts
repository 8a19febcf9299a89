// ---------------------------------------------------------------------------
// Querier Types
// ---------------------------------------------------------------------------

/** Nanoseconds since the Unix epoch. */
export type UnixNanos = bigint;

/** A span of time in nanoseconds. */
export type Nanos = bigint;

export type Direction = "FORWARD" | "BACKWARD";

export const DIRECTIONS: readonly Direction[] = ["FORWARD", "BACKWARD"];

export type LabelSet = Record<string, string>;

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export interface RangeQueryRequest {
  query: string;
  start: UnixNanos;
  end: UnixNanos;
  step: Nanos;
  limit: number;
  direction: Direction;
}

export interface InstantQueryRequest {
  query: string;
  time: UnixNanos;
  limit: number;
  direction: Direction;
}

export interface TailRequest {
  query: string;
  start: UnixNanos;
  limit: number;
  /** Seconds the tailer holds entries so late producers can be ordered. */
  delayFor: number;
}

export interface LabelRequest {
  /** Label whose values are listed; absent when listing label names. */
  name?: string;
  values: boolean;
  start: UnixNanos;
  end: UnixNanos;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface Entry {
  timestamp: UnixNanos;
  line: string;
}

export interface Stream {
  labels: LabelSet;
  entries: Entry[];
}

export interface Sample {
  timestamp: UnixNanos;
  value: number;
}

export interface VectorSample {
  metric: LabelSet;
  sample: Sample;
}

export interface Series {
  metric: LabelSet;
  samples: Sample[];
}

export type QueryResult =
  | { resultType: "streams"; streams: Stream[] }
  | { resultType: "vector"; vector: VectorSample[] }
  | { resultType: "matrix"; matrix: Series[] };

export interface LabelResponse {
  values: string[];
}

export interface DroppedEntry {
  labels: LabelSet;
  timestamp: UnixNanos;
}

export interface TailResponse {
  streams: Stream[];
  droppedEntries: DroppedEntry[];
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface RangeQueryParams {
  query: string;
  start: UnixNanos;
  end: UnixNanos;
  step: Nanos;
  direction: Direction;
  limit: number;
}

export interface InstantQueryParams {
  query: string;
  time: UnixNanos;
  direction: Direction;
  limit: number;
}

export interface Query {
  /** Evaluate the query; implementations stop work once `signal` aborts. */
  exec(signal: AbortSignal): Promise<QueryResult>;
}

export interface QueryEngine {
  newRangeQuery(params: RangeQueryParams): Query;
  newInstantQuery(params: InstantQueryParams): Query;
}

export interface LabelQuerier {
  label(request: LabelRequest): Promise<LabelResponse>;
}

/**
 * A live subscription. Responses and the terminal error are delivered to the
 * registered listeners; whatever arrives before a listener is registered is
 * held and handed over on registration.
 */
export interface TailSubscription {
  onResponse(listener: (response: TailResponse) => void): void;
  onError(listener: (err: Error) => void): void;
  close(): Promise<void>;
}

export interface Tailer {
  tail(request: TailRequest): Promise<TailSubscription>;
}

export type QuerierBackend = QueryEngine & LabelQuerier & Tailer;
