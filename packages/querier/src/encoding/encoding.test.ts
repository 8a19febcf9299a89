import { describe, it, expect } from "vitest";
import { QuerierError } from "../errors.js";
import type { QueryResult, TailResponse } from "../types.js";
import { encoderFor, formatSampleValue, getVersion, legacyEncoder, v1Encoder } from "./index.js";

const TS = 1_568_404_331_324_000_123n;

const streams: QueryResult = {
  resultType: "streams",
  streams: [{ labels: { job: "api", app: "x" }, entries: [{ timestamp: TS, line: "GET /" }] }],
};

const vector: QueryResult = {
  resultType: "vector",
  vector: [{ metric: { app: "x" }, sample: { timestamp: 1_568_404_331_324_000_000n, value: 3 } }],
};

const matrix: QueryResult = {
  resultType: "matrix",
  matrix: [
    {
      metric: { app: "x" },
      samples: [
        { timestamp: 1_568_404_330_000_000_000n, value: 0.5 },
        { timestamp: 1_568_404_331_000_000_000n, value: 1 },
      ],
    },
  ],
};

const tail: TailResponse = {
  streams: [{ labels: { app: "x" }, entries: [{ timestamp: TS, line: "boom" }] }],
  droppedEntries: [{ labels: { app: "x" }, timestamp: 1_568_404_331_000_000_000n }],
};

describe("getVersion", () => {
  it("detects v1 paths case-insensitively", () => {
    expect(getVersion("/loki/api/v1/query_range?query=x")).toBe("v1");
    expect(getVersion("/LOKI/API/V1/tail")).toBe("v1");
  });

  it("treats everything else as legacy", () => {
    expect(getVersion("/api/prom/query")).toBe("legacy");
  });

  it("selects the matching encoder", () => {
    expect(encoderFor("/loki/api/v1/label")).toBe(v1Encoder);
    expect(encoderFor("/api/prom/label")).toBe(legacyEncoder);
  });
});

describe("v1Encoder", () => {
  it("encodes streams with nanosecond string timestamps", () => {
    expect(JSON.parse(v1Encoder.encodeQueryResult(streams))).toEqual({
      status: "success",
      data: {
        resultType: "streams",
        result: [
          { stream: { job: "api", app: "x" }, values: [["1568404331324000123", "GET /"]] },
        ],
      },
    });
  });

  it("encodes a vector as [seconds, string value]", () => {
    expect(JSON.parse(v1Encoder.encodeQueryResult(vector))).toEqual({
      status: "success",
      data: {
        resultType: "vector",
        result: [{ metric: { app: "x" }, value: [1568404331.324, "3"] }],
      },
    });
  });

  it("encodes a matrix", () => {
    expect(v1Encoder.encodeQueryResult(matrix)).toBe(
      '{"status":"success","data":{"resultType":"matrix","result":[{"metric":{"app":"x"},"values":[[1568404330,"0.5"],[1568404331,"1"]]}]}}',
    );
  });

  it("encodes labels", () => {
    expect(v1Encoder.encodeLabelResponse({ values: ["app", "job"] })).toBe(
      '{"status":"success","data":["app","job"]}',
    );
  });

  it("encodes tail frames with dropped entries", () => {
    expect(JSON.parse(v1Encoder.encodeTailResponse(tail))).toEqual({
      streams: [{ stream: { app: "x" }, values: [["1568404331324000123", "boom"]] }],
      dropped_entries: [{ labels: { app: "x" }, timestamp: "1568404331000000000" }],
    });
  });

  it("leaves dropped_entries out when there are none", () => {
    expect(v1Encoder.encodeTailResponse({ streams: [], droppedEntries: [] })).toBe('{"streams":[]}');
  });

  it("fails with EncodeError on an unknown result type", () => {
    const table = JSON.parse('{"resultType":"table"}') as QueryResult;
    try {
      v1Encoder.encodeQueryResult(table);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(QuerierError);
      expect((err as QuerierError).code).toBe("EncodeError");
      expect((err as QuerierError).statusCode).toBe(500);
      expect((err as QuerierError).message).toBe("unsupported result type: table");
    }
  });
});

describe("legacyEncoder", () => {
  it("encodes streams with label strings and RFC 3339 timestamps", () => {
    expect(JSON.parse(legacyEncoder.encodeQueryResult(streams))).toEqual({
      streams: [
        {
          labels: '{app="x", job="api"}',
          entries: [{ ts: "2019-09-13T19:52:11.324000123Z", line: "GET /" }],
        },
      ],
    });
  });

  it("encodes metric results without the status envelope", () => {
    expect(JSON.parse(legacyEncoder.encodeQueryResult(vector))).toEqual({
      resultType: "vector",
      result: [{ metric: { app: "x" }, value: [1568404331.324, "3"] }],
    });
  });

  it("encodes labels as values", () => {
    expect(legacyEncoder.encodeLabelResponse({ values: ["app"] })).toBe('{"values":["app"]}');
  });

  it("encodes tail frames", () => {
    expect(JSON.parse(legacyEncoder.encodeTailResponse(tail))).toEqual({
      streams: [
        { labels: '{app="x"}', entries: [{ ts: "2019-09-13T19:52:11.324000123Z", line: "boom" }] },
      ],
      dropped_entries: [{ labels: '{app="x"}', timestamp: "2019-09-13T19:52:11Z" }],
    });
  });
});

describe("formatSampleValue", () => {
  it("spells non-finite values", () => {
    expect(formatSampleValue(Infinity)).toBe("+Inf");
    expect(formatSampleValue(-Infinity)).toBe("-Inf");
    expect(formatSampleValue(NaN)).toBe("NaN");
    expect(formatSampleValue(0.25)).toBe("0.25");
  });
});
