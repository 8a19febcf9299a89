import type { FastifyInstance, FastifyReply } from "fastify";
import { encoderFor } from "../encoding/index.js";
import { ERR, asQuerierError } from "../errors.js";
import type { QueryValues } from "../http/params.js";
import { parseRegexQuery, toInstantQueryRequest, toRangeQueryRequest } from "../http/requests.js";
import type { Query, QueryEngine, QueryResult } from "../types.js";

export interface QueryRouteOptions {
  engine: QueryEngine;
  /** Deadline for one engine call. */
  queryTimeoutMs: number;
}

interface QueryRoute {
  Querystring: QueryValues;
}

/**
 * Run `query` under a signal that aborts after `timeoutMs`. Any failure,
 * the deadline included, is an EngineExecutionError.
 */
export async function execWithDeadline(query: Query, timeoutMs: number): Promise<QueryResult> {
  const controller = new AbortController();
  const deadline = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
  });
  const timer = setTimeout(
    () => controller.abort(new Error(`query timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  try {
    return await Promise.race([query.exec(controller.signal), deadline]);
  } catch (err) {
    throw asQuerierError(ERR.ENGINE_EXECUTION, err);
  } finally {
    clearTimeout(timer);
  }
}

function sendJson(reply: FastifyReply, body: string): FastifyReply {
  return reply.code(200).type("application/json; charset=utf-8").send(body);
}

/**
 * Register the instant, range and legacy log query routes.
 */
export function registerQueryRoutes(fastify: FastifyInstance, options: QueryRouteOptions): void {
  const { engine, queryTimeoutMs } = options;

  // -------------------------------------------------------------------------
  // GET /loki/api/v1/query - Instant query
  // -------------------------------------------------------------------------
  fastify.get<QueryRoute>("/loki/api/v1/query", async (request, reply) => {
    const params = toInstantQueryRequest(request.query);
    const result = await execWithDeadline(engine.newInstantQuery(params), queryTimeoutMs);
    return sendJson(reply, encoderFor(request.url).encodeQueryResult(result));
  });

  // -------------------------------------------------------------------------
  // GET /loki/api/v1/query_range - Range query
  // -------------------------------------------------------------------------
  fastify.get<QueryRoute>("/loki/api/v1/query_range", async (request, reply) => {
    const params = toRangeQueryRequest(request.query);
    const result = await execWithDeadline(engine.newRangeQuery(params), queryTimeoutMs);
    return sendJson(reply, encoderFor(request.url).encodeQueryResult(result));
  });

  // -------------------------------------------------------------------------
  // GET /api/prom/query - Legacy log query, `regexp` folded into the query
  // -------------------------------------------------------------------------
  fastify.get<QueryRoute>("/api/prom/query", async (request, reply) => {
    const params = {
      ...toRangeQueryRequest(request.query),
      query: parseRegexQuery(request.query),
    };
    const result = await execWithDeadline(engine.newRangeQuery(params), queryTimeoutMs);
    return sendJson(reply, encoderFor(request.url).encodeQueryResult(result));
  });
}
