import type { FastifyInstance } from "fastify";
import { createLogger } from "@logquery/shared/utils";
import { encoderFor } from "../encoding/index.js";
import type { QueryValues } from "../http/params.js";
import { toTailRequest } from "../http/requests.js";
import { TailSession, rejectSubscription } from "../services/tail-session.js";
import type { TailRequest, TailSubscription, Tailer } from "../types.js";

const logger = createLogger("tail-route");

declare module "fastify" {
  interface FastifyRequest {
    /** Set by the tail routes before the connection is upgraded. */
    tailRequest: TailRequest | null;
  }
}

export interface TailRouteOptions {
  tailer: Tailer;
  pingIntervalMs: number;
}

interface TailRoute {
  Querystring: QueryValues;
}

/**
 * Register the WebSocket tail routes. The request is built in a
 * `preValidation` hook so a bad parameter is answered with a 400 before any
 * upgrade; the handler only runs on an upgraded connection.
 */
export function registerTailRoutes(fastify: FastifyInstance, options: TailRouteOptions): void {
  const { tailer, pingIntervalMs } = options;

  fastify.decorateRequest("tailRequest", null);

  for (const path of ["/loki/api/v1/tail", "/api/prom/tail"]) {
    fastify.get<TailRoute>(
      path,
      {
        websocket: true,
        preValidation: async (request) => {
          request.tailRequest = toTailRequest(request.query);
        },
      },
      async (socket, request) => {
        const tailRequest = request.tailRequest;
        if (!tailRequest) {
          rejectSubscription(socket, new Error("tail request was not parsed"), request.id);
          return;
        }

        let subscription: TailSubscription;
        try {
          subscription = await tailer.tail(tailRequest);
        } catch (err) {
          rejectSubscription(socket, err, request.id);
          return;
        }

        logger.debug({ sessionId: request.id, query: tailRequest.query }, "Tail subscription started");
        const session = new TailSession(socket, subscription, encoderFor(request.url), {
          pingIntervalMs,
          sessionId: request.id,
        });
        await session.run();
      },
    );
  }
}
