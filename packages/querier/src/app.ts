import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import { queryErrorHandler } from "@logquery/shared/middleware";
import { createLogger, loggerOptions } from "@logquery/shared/utils";

import { registerHealthRoute } from "./routes/health.js";
import { registerLabelRoutes } from "./routes/labels.js";
import { type LogPusher, registerPushRoute } from "./routes/push.js";
import { registerQueryRoutes } from "./routes/query.js";
import { registerTailRoutes } from "./routes/tail.js";
import { DEFAULT_PING_INTERVAL_MS, socketFailure } from "./services/tail-session.js";
import type { LabelQuerier, QueryEngine, Tailer } from "./types.js";

const logger = createLogger("querier");

export const DEFAULT_QUERY_TIMEOUT_MS = 60_000;

export interface QuerierServices {
  engine: QueryEngine;
  labels: LabelQuerier;
  tailer: Tailer;
  /** Enables POST /loki/api/v1/push when given. */
  pusher?: LogPusher;
}

export interface QuerierAppOptions {
  queryTimeoutMs?: number;
  tailPingIntervalMs?: number;
  /** Fastify request logging; on unless set to false. */
  requestLogging?: boolean;
}

/**
 * Build the querier HTTP application. Routes are registered but the server
 * is not listening; call `listen` or use `inject`.
 */
export async function buildApp(
  services: QuerierServices,
  options: QuerierAppOptions = {},
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.requestLogging === false ? false : loggerOptions("querier"),
  });

  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  await fastify.register(websocket, {
    errorHandler: (error, socket, request) => {
      logger.error(
        { err: socketFailure(error, socket.readyState), url: request.url },
        "Error in websocket handler",
      );
      socket.terminate();
    },
  });

  fastify.setErrorHandler(queryErrorHandler);

  registerHealthRoute(fastify);
  registerQueryRoutes(fastify, {
    engine: services.engine,
    queryTimeoutMs: options.queryTimeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS,
  });
  registerLabelRoutes(fastify, services.labels);
  registerTailRoutes(fastify, {
    tailer: services.tailer,
    pingIntervalMs: options.tailPingIntervalMs ?? DEFAULT_PING_INTERVAL_MS,
  });
  if (services.pusher) {
    registerPushRoute(fastify, services.pusher);
  }

  return fastify;
}
