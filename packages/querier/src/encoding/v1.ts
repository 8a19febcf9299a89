import { toUnixSeconds } from "../time.js";
import type {
  DroppedEntry,
  LabelResponse,
  QueryResult,
  Sample,
  Series,
  Stream,
  TailResponse,
  VectorSample,
} from "../types.js";
import {
  type ResponseEncoder,
  formatSampleValue,
  stringify,
  unknownResultType,
} from "./encoder.js";

type SamplePair = [number, string];

function samplePair(sample: Sample): SamplePair {
  return [toUnixSeconds(sample.timestamp), formatSampleValue(sample.value)];
}

export function v1Stream(stream: Stream) {
  return {
    stream: stream.labels,
    values: stream.entries.map((entry) => [entry.timestamp.toString(), entry.line]),
  };
}

function v1Vector(vector: VectorSample[]) {
  return vector.map(({ metric, sample }) => ({ metric, value: samplePair(sample) }));
}

function v1Matrix(matrix: Series[]) {
  return matrix.map(({ metric, samples }) => ({ metric, values: samples.map(samplePair) }));
}

/** Result payload shared by both versions for vector and matrix results. */
export function v1ResultData(result: QueryResult) {
  switch (result.resultType) {
    case "streams":
      return { resultType: result.resultType, result: result.streams.map(v1Stream) };
    case "vector":
      return { resultType: result.resultType, result: v1Vector(result.vector) };
    case "matrix":
      return { resultType: result.resultType, result: v1Matrix(result.matrix) };
    default:
      throw unknownResultType(result);
  }
}

function v1DroppedEntry(dropped: DroppedEntry) {
  return { labels: dropped.labels, timestamp: dropped.timestamp.toString() };
}

export const v1Encoder: ResponseEncoder = {
  version: "v1",

  encodeQueryResult(result: QueryResult): string {
    return stringify({ status: "success", data: v1ResultData(result) });
  },

  encodeLabelResponse(response: LabelResponse): string {
    return stringify({ status: "success", data: response.values });
  },

  encodeTailResponse(response: TailResponse): string {
    const frame: { streams: unknown[]; dropped_entries?: unknown[] } = {
      streams: response.streams.map(v1Stream),
    };
    if (response.droppedEntries.length > 0) {
      frame.dropped_entries = response.droppedEntries.map(v1DroppedEntry);
    }
    return stringify(frame);
  },
};
