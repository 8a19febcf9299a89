export { createLogger, loggerOptions } from "./logger.js";
export {
  validateEnvironment,
  type EnvRequirement,
  type EnvValidationResult,
  QUERIER_ENV_REQUIREMENTS,
} from "./env-validator.js";
