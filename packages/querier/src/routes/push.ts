import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { invalidParameter } from "../errors.js";
import type { Entry, LabelSet, Stream } from "../types.js";

/** Anything that accepts pushed streams. */
export interface LogPusher {
  push(streams: Stream[]): number;
}

const NANOS = /^\d+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseLabels(value: unknown, index: number): LabelSet {
  if (!isRecord(value) || Object.keys(value).length === 0) {
    throw invalidParameter(`streams[${index}].stream must be a non-empty object of labels`);
  }
  const labels: LabelSet = {};
  for (const [name, labelValue] of Object.entries(value)) {
    if (typeof labelValue !== "string") {
      throw invalidParameter(`streams[${index}].stream.${name} must be a string`);
    }
    labels[name] = labelValue;
  }
  return labels;
}

function parseEntries(value: unknown, index: number): Entry[] {
  if (!Array.isArray(value)) {
    throw invalidParameter(`streams[${index}].values must be an array`);
  }
  return value.map((pair: unknown, i) => {
    if (!Array.isArray(pair) || pair.length !== 2) {
      throw invalidParameter(`streams[${index}].values[${i}] must be a [timestamp, line] pair`);
    }
    const [timestamp, line]: unknown[] = pair;
    if (typeof timestamp !== "string" || !NANOS.test(timestamp) || typeof line !== "string") {
      throw invalidParameter(
        `streams[${index}].values[${i}] must hold a nanosecond timestamp string and a line`,
      );
    }
    return { timestamp: BigInt(timestamp), line };
  });
}

/**
 * Validate a push body: `{"streams":[{"stream":{…},"values":[["<ns>","<line>"]]}]}`.
 */
export function parsePushBody(body: unknown): Stream[] {
  const streams = isRecord(body) ? body["streams"] : undefined;
  if (!Array.isArray(streams)) {
    throw invalidParameter("body must be an object with a streams array");
  }
  return streams.map((stream: unknown, index) => {
    if (!isRecord(stream)) {
      throw invalidParameter(`streams[${index}] must be an object`);
    }
    return {
      labels: parseLabels(stream["stream"], index),
      entries: parseEntries(stream["values"], index),
    };
  });
}

/**
 * Register POST /loki/api/v1/push.
 */
export function registerPushRoute(fastify: FastifyInstance, pusher: LogPusher): void {
  fastify.post("/loki/api/v1/push", async (request: FastifyRequest, reply: FastifyReply) => {
    const streams = parsePushBody(request.body);
    pusher.push(streams);
    return reply.code(204).send();
  });
}
