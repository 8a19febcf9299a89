/**
 * Environment Variable Validator
 *
 * Checks the environment a service starts with against its declared
 * variables and reports what is missing or falling back to a default.
 */

import { createLogger } from "./logger.js";

const logger = createLogger("env-validator");

export interface EnvRequirement {
  /** Environment variable name */
  name: string;
  /** Whether the variable is required (service won't start without it) */
  required: boolean;
  /** Default value if not set (only for optional vars) */
  default?: string;
  /** Description for error messages */
  description?: string;
}

export interface EnvValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  values: Record<string, string>;
}

/**
 * Validate environment variables against a set of requirements.
 *
 * @param requirements - Variables the service reads
 * @param exitOnError - If true, process.exit(1) on validation failure. Default: true
 * @param env - Environment to read, `process.env` unless given
 * @returns Validation result with resolved values
 */
export function validateEnvironment(
  requirements: EnvRequirement[],
  exitOnError = true,
  env: NodeJS.ProcessEnv = process.env,
): EnvValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const values: Record<string, string> = {};

  for (const req of requirements) {
    const value = env[req.name];
    const suffix = req.description ? ` (${req.description})` : "";

    if (value === undefined || value === "") {
      if (req.required) {
        errors.push(`Missing required env var: ${req.name}${suffix}`);
      } else if (req.default !== undefined) {
        values[req.name] = req.default;
        warnings.push(`${req.name} not set, using default: "${req.default}"`);
      } else {
        warnings.push(`Optional env var ${req.name} not set${suffix}`);
      }
    } else {
      values[req.name] = value;
    }
  }

  if (warnings.length > 0) {
    logger.debug({ warnings }, "Environment variable warnings");
  }

  if (errors.length > 0) {
    logger.error({ errors }, "Environment variable validation failed");
    if (exitOnError) {
      process.exit(1);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    values,
  };
}

// ---------------------------------------------------------------------------
// Service-specific requirement sets
// ---------------------------------------------------------------------------

export const QUERIER_ENV_REQUIREMENTS: EnvRequirement[] = [
  { name: "QUERIER_PORT", required: false, default: "3100", description: "HTTP listen port" },
  { name: "QUERIER_HOST", required: false, default: "0.0.0.0", description: "HTTP listen host" },
  {
    name: "QUERIER_QUERY_TIMEOUT_MS",
    required: false,
    default: "60000",
    description: "Deadline for a single engine call",
  },
  {
    name: "QUERIER_TAIL_PING_INTERVAL_MS",
    required: false,
    default: "1000",
    description: "Period of liveness pings on tail connections",
  },
  {
    name: "QUERIER_RETENTION_HOURS",
    required: false,
    default: "24",
    description: "How long the in-memory store keeps entries",
  },
];
