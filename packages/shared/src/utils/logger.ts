import pino, { type Logger, type LoggerOptions } from "pino";

/**
 * Create a Pino logger for a service or module.
 *
 * Every line is JSON with an ISO timestamp, the `name` binding and the level
 * as a string label. The level comes from `LOG_LEVEL` (default "info").
 *
 * Usage:
 *   const logger = createLogger("tail-session");
 *   logger.info({ query }, "Tail session started");
 *   logger.error({ err }, "Error writing to websocket");
 *
 * @param serviceName - Value of the `name` binding.
 * @param bindings - Extra bindings attached to every line.
 */
export function createLogger(
  serviceName: string,
  bindings: Record<string, unknown> = {},
): Logger {
  return pino(loggerOptions(serviceName, bindings));
}

/**
 * The options `createLogger` passes to pino; Fastify takes the same shape for
 * its request logger.
 */
export function loggerOptions(
  serviceName: string,
  bindings: Record<string, unknown> = {},
): LoggerOptions {
  return {
    name: serviceName,
    level: process.env["LOG_LEVEL"] ?? "info",
    base: { ...bindings },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
}
