import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";

vi.mock("@logquery/shared/utils", async (importOriginal) => ({
  ...(await importOriginal<typeof import("@logquery/shared/utils")>()),
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { buildApp } from "./app.js";
import { INSTANT_LOG_QUERY_UNSUPPORTED, InMemoryLogStore } from "./services/memory-store.js";
import type { LabelQuerier, QueryEngine, QueryResult } from "./types.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const pushBody = {
  streams: [
    {
      stream: { app: "api" },
      values: [
        ["1700000001000000000", "one"],
        ["1700000002000000000", "two error"],
      ],
    },
  ],
};

const range = { start: "1700000000", end: "1700000010" };

function engineReturning(exec: () => Promise<QueryResult>): QueryEngine {
  return {
    newRangeQuery: () => ({ exec }),
    newInstantQuery: () => ({ exec }),
  };
}

// ---------------------------------------------------------------------------
// Against the in-memory store
// ---------------------------------------------------------------------------

describe("querier routes", () => {
  let app: FastifyInstance;
  let store: InMemoryLogStore;

  beforeEach(async () => {
    store = new InMemoryLogStore();
    app = await buildApp(
      { engine: store, labels: store, tailer: store, pusher: store },
      { requestLogging: false },
    );
    const pushed = await app.inject({ method: "POST", url: "/loki/api/v1/push", payload: pushBody });
    expect(pushed.statusCode).toBe(204);
  });

  afterEach(async () => {
    await store.stop();
    await app.close();
  });

  describe("GET /health", () => {
    it("reports the service as up", async () => {
      const res = await app.inject({ method: "GET", url: "/health" });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.status).toBe("ok");
      expect(body.service).toBe("querier");
      expect(typeof body.uptime).toBe("number");
    });
  });

  describe("POST /loki/api/v1/push", () => {
    it("rejects a body without streams", async () => {
      const res = await app.inject({ method: "POST", url: "/loki/api/v1/push", payload: { entries: [] } });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: "InvalidParameter",
        message: "body must be an object with a streams array",
      });
    });

    it("rejects timestamps that are not nanosecond strings", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/loki/api/v1/push",
        payload: { streams: [{ stream: { app: "api" }, values: [[1700000001, "x"]] }] },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: "InvalidParameter",
        message: "streams[0].values[0] must hold a nanosecond timestamp string and a line",
      });
    });
  });

  describe("GET /loki/api/v1/query_range", () => {
    it("returns streams in the v1 envelope", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/loki/api/v1/query_range",
        query: { query: '{app="api"}', direction: "forward", ...range },
      });
      expect(res.statusCode).toBe(200);
      expect(res.headers["content-type"]).toBe("application/json; charset=utf-8");
      expect(res.body).toBe(
        '{"status":"success","data":{"resultType":"streams","result":[{"stream":{"app":"api"},"values":[["1700000001000000000","one"],["1700000002000000000","two error"]]}]}}',
      );
    });

    it("returns a matrix for a metric query", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/loki/api/v1/query_range",
        query: {
          query: 'count_over_time({app="api"}[1s])',
          start: "1700000001",
          end: "1700000002",
          step: "1",
        },
      });
      expect(res.statusCode).toBe(200);
      expect(res.body).toBe(
        '{"status":"success","data":{"resultType":"matrix","result":[{"metric":{"app":"api"},"values":[[1700000001,"1"],[1700000002,"1"]]}]}}',
      );
    });

    it("rejects a malformed limit", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/loki/api/v1/query_range",
        query: { query: '{app="api"}', limit: "abc" },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: "InvalidParameter",
        message: 'cannot parse "abc" as an integer for parameter "limit"',
      });
    });

    it("rejects a zero step", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/loki/api/v1/query_range",
        query: { query: '{app="api"}', step: "0", ...range },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: "InvalidParameter",
        message: "zero or negative query resolution step widths are not accepted. Try a positive integer",
      });
    });

    it("rejects a step too fine for a wide range", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/loki/api/v1/query_range",
        query: { query: 'count_over_time({app="api"}[1m])', start: "1000000000", end: "1100000000", step: "1" },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: "InvalidParameter",
        message:
          "exceeded maximum resolution of 11,000 points per timeseries. Try decreasing the query resolution (?step=XX)",
      });
    });

    it("rejects an unknown direction", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/loki/api/v1/query_range",
        query: { query: '{app="api"}', direction: "sideways", ...range },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: "InvalidParameter", message: "invalid direction 'sideways'" });
    });

    it("reports query parse errors as execution errors", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/loki/api/v1/query_range",
        query: { query: "{}", ...range },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe("EngineExecutionError");
    });
  });

  describe("GET /loki/api/v1/query", () => {
    it("returns an instant vector", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/loki/api/v1/query",
        query: { query: 'count_over_time({app="api"}[1m])', time: "1700000010" },
      });
      expect(res.statusCode).toBe(200);
      expect(res.body).toBe(
        '{"status":"success","data":{"resultType":"vector","result":[{"metric":{"app":"api"},"value":[1700000010,"2"]}]}}',
      );
    });

    it("refuses an instant log query", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/loki/api/v1/query",
        query: { query: '{app="api"}', time: "1700000010" },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: "EngineExecutionError", message: INSTANT_LOG_QUERY_UNSUPPORTED });
    });
  });

  describe("GET /api/prom/query", () => {
    it("folds regexp into the query and answers in the legacy shape", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/api/prom/query",
        query: { query: '{app="api"}', regexp: "err.*", ...range },
      });
      expect(res.statusCode).toBe(200);
      expect(res.body).toBe(
        '{"streams":[{"labels":"{app=\\"api\\"}","entries":[{"ts":"2023-11-14T22:13:22Z","line":"two error"}]}]}',
      );
    });

    it("rejects a regexp on an unparseable selector", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/api/prom/query",
        query: { query: "{app=", regexp: "err", ...range },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe("InvalidParameter");
    });
  });

  describe("label routes", () => {
    it("lists label names under v1", async () => {
      const res = await app.inject({ method: "GET", url: "/loki/api/v1/label", query: range });
      expect(res.statusCode).toBe(200);
      expect(res.body).toBe('{"status":"success","data":["app"]}');
    });

    it("lists label values under the legacy path", async () => {
      const res = await app.inject({ method: "GET", url: "/api/prom/label/app/values", query: range });
      expect(res.statusCode).toBe(200);
      expect(res.body).toBe('{"values":["api"]}');
    });

    it("returns nothing outside the window", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/loki/api/v1/label/app/values",
        query: { start: "1600000000", end: "1600000010" },
      });
      expect(res.body).toBe('{"status":"success","data":[]}');
    });
  });

  describe("tail routes", () => {
    it("rejects delay_for above the limit before upgrading", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/loki/api/v1/tail",
        query: { query: '{app="api"}', delay_for: "6" },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: "DelayTooLarge", message: "delay_for can't be greater than 5" });
    });

    it("rejects a bad limit on the legacy path", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/api/prom/tail",
        query: { query: '{app="api"}', limit: "-1" },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe("InvalidParameter");
    });

    it("only serves upgraded connections", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/loki/api/v1/tail",
        query: { query: '{app="api"}', delay_for: "5" },
      });
      expect(res.statusCode).toBe(404);
    });
  });
});

// ---------------------------------------------------------------------------
// Request logging
// ---------------------------------------------------------------------------

describe("request logging", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("configures the Fastify logger like every other service logger", async () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    const store = new InMemoryLogStore();
    const app = await buildApp({ engine: store, labels: store, tailer: store });

    expect(app.log.level).toBe("warn");
    expect(app.log.bindings()).toEqual({ name: "querier" });
    await app.close();
  });
});

// ---------------------------------------------------------------------------
// Against failing collaborators
// ---------------------------------------------------------------------------

describe("querier routes with failing collaborators", () => {
  const labels: LabelQuerier = {
    label: async () => {
      throw new Error("index unavailable");
    },
  };
  const store = new InMemoryLogStore();

  it("answers 400 when the engine misses the deadline", async () => {
    const engine = engineReturning(() => new Promise<QueryResult>(() => undefined));
    const app = await buildApp(
      { engine, labels, tailer: store },
      { requestLogging: false, queryTimeoutMs: 20 },
    );

    const res = await app.inject({
      method: "GET",
      url: "/loki/api/v1/query_range",
      query: { query: '{app="api"}', ...range },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "EngineExecutionError", message: "query timed out after 20ms" });
    await app.close();
  });

  it("answers 500 when the result cannot be encoded", async () => {
    const table = JSON.parse('{"resultType":"table"}') as QueryResult;
    const engine = engineReturning(async () => table);
    const app = await buildApp({ engine, labels, tailer: store }, { requestLogging: false });

    const res = await app.inject({
      method: "GET",
      url: "/loki/api/v1/query",
      query: { query: 'count_over_time({app="api"}[1m])' },
    });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "EncodeError", message: "unsupported result type: table" });
    await app.close();
  });

  it("answers 500 when labels cannot be read", async () => {
    const app = await buildApp({ engine: store, labels, tailer: store }, { requestLogging: false });

    const res = await app.inject({ method: "GET", url: "/loki/api/v1/label" });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "LabelQueryError", message: "index unavailable" });
    await app.close();
  });

  it("has no push route without a pusher", async () => {
    const app = await buildApp({ engine: store, labels, tailer: store }, { requestLogging: false });

    const res = await app.inject({ method: "POST", url: "/loki/api/v1/push", payload: pushBody });
    expect(res.statusCode).toBe(404);
    await app.close();
  });
});
