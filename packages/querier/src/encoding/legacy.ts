import { formatLabels } from "../logql/index.js";
import { formatRFC3339Nano } from "../time.js";
import type { DroppedEntry, LabelResponse, QueryResult, Stream, TailResponse } from "../types.js";
import { type ResponseEncoder, stringify, unknownResultType } from "./encoder.js";
import { v1ResultData } from "./v1.js";

function legacyStream(stream: Stream) {
  return {
    labels: formatLabels(stream.labels),
    entries: stream.entries.map((entry) => ({
      ts: formatRFC3339Nano(entry.timestamp),
      line: entry.line,
    })),
  };
}

function legacyDroppedEntry(dropped: DroppedEntry) {
  return { labels: formatLabels(dropped.labels), timestamp: formatRFC3339Nano(dropped.timestamp) };
}

/** Encoder of the `/api/prom` routes. */
export const legacyEncoder: ResponseEncoder = {
  version: "legacy",

  encodeQueryResult(result: QueryResult): string {
    switch (result.resultType) {
      case "streams":
        return stringify({ streams: result.streams.map(legacyStream) });
      case "vector":
      case "matrix":
        return stringify(v1ResultData(result));
      default:
        throw unknownResultType(result);
    }
  },

  encodeLabelResponse(response: LabelResponse): string {
    return stringify({ values: response.values });
  },

  encodeTailResponse(response: TailResponse): string {
    const frame: { streams: unknown[]; dropped_entries?: unknown[] } = {
      streams: response.streams.map(legacyStream),
    };
    if (response.droppedEntries.length > 0) {
      frame.dropped_entries = response.droppedEntries.map(legacyDroppedEntry);
    }
    return stringify(frame);
  },
};
