import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { encoderFor } from "../encoding/index.js";
import { ERR, asQuerierError } from "../errors.js";
import type { QueryValues } from "../http/params.js";
import { toLabelRequest } from "../http/requests.js";
import type { LabelQuerier, LabelResponse } from "../types.js";

interface LabelRoute {
  Querystring: QueryValues;
  Params: { name?: string };
}

/**
 * Register label name and label value routes for both API versions.
 */
export function registerLabelRoutes(fastify: FastifyInstance, labels: LabelQuerier): void {
  const handler = async (request: FastifyRequest<LabelRoute>, reply: FastifyReply) => {
    const labelRequest = toLabelRequest(request.query, request.params.name);

    let response: LabelResponse;
    try {
      response = await labels.label(labelRequest);
    } catch (err) {
      throw asQuerierError(ERR.LABEL_QUERY, err);
    }

    return reply
      .code(200)
      .type("application/json; charset=utf-8")
      .send(encoderFor(request.url).encodeLabelResponse(response));
  };

  for (const prefix of ["/loki/api/v1", "/api/prom"]) {
    fastify.get<LabelRoute>(`${prefix}/label`, handler);
    fastify.get<LabelRoute>(`${prefix}/label/:name/values`, handler);
  }
}
