import { QUERIER_ENV_REQUIREMENTS, validateEnvironment } from "@logquery/shared/utils";

export interface QuerierConfig {
  port: number;
  host: string;
  /** Deadline for one query engine call. */
  queryTimeoutMs: number;
  /** Period of liveness pings on tail connections. */
  tailPingIntervalMs: number;
  retentionHours: number;
}

function positiveInt(name: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value ?? ""}"`);
  }
  return parsed;
}

/**
 * Resolve the querier configuration from the environment, applying defaults.
 * Throws when a numeric setting is not a positive integer.
 */
export function loadQuerierConfig(env: NodeJS.ProcessEnv = process.env): QuerierConfig {
  const { values } = validateEnvironment(QUERIER_ENV_REQUIREMENTS, true, env);

  return {
    port: positiveInt("QUERIER_PORT", values["QUERIER_PORT"]),
    host: values["QUERIER_HOST"] ?? "0.0.0.0",
    queryTimeoutMs: positiveInt("QUERIER_QUERY_TIMEOUT_MS", values["QUERIER_QUERY_TIMEOUT_MS"]),
    tailPingIntervalMs: positiveInt(
      "QUERIER_TAIL_PING_INTERVAL_MS",
      values["QUERIER_TAIL_PING_INTERVAL_MS"],
    ),
    retentionHours: positiveInt("QUERIER_RETENTION_HOURS", values["QUERIER_RETENTION_HOURS"]),
  };
}
