import { STATUS_CODES } from "node:http";
import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("query-error-handler");

/** Reason phrase for an HTTP status, "Error" for unknown codes. */
export function statusReason(statusCode: number): string {
  return STATUS_CODES[statusCode] ?? "Error";
}

/**
 * Error handler for the query API.
 *
 * Errors that carry a 4xx/5xx `statusCode` were raised on purpose and keep
 * their message; anything else is a 500 whose message is not exposed. The
 * body is `{ error, message }`, where `error` is the error's code when it has
 * one and the status reason phrase otherwise.
 *
 * Usage:
 *   fastify.setErrorHandler(queryErrorHandler);
 */
export function queryErrorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
): void {
  const known = typeof error.statusCode === "number" && error.statusCode >= 400;
  const statusCode = known && error.statusCode !== undefined ? error.statusCode : 500;

  const context = {
    err: error,
    url: request.url,
    method: request.method,
    statusCode,
  };
  if (statusCode >= 500) {
    logger.error(context, "Query request failed");
  } else {
    logger.info(context, "Query request rejected");
  }

  const code =
    typeof error.code === "string" && error.code !== "" ? error.code : statusReason(statusCode);

  reply.code(statusCode).send({
    error: known ? code : statusReason(statusCode),
    message: known ? error.message : "Internal server error. Please try again later.",
  });
}
