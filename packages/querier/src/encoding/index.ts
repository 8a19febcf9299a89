import type { ApiVersion, ResponseEncoder } from "./encoder.js";
import { legacyEncoder } from "./legacy.js";
import { v1Encoder } from "./v1.js";

export { type ApiVersion, type ResponseEncoder, formatSampleValue } from "./encoder.js";
export { legacyEncoder } from "./legacy.js";
export { v1Encoder } from "./v1.js";

const V1_PATH = "/loki/api/v1";

/** `v1` for paths under /loki/api/v1, `legacy` for everything else. */
export function getVersion(url: string): ApiVersion {
  return url.toLowerCase().includes(V1_PATH) ? "v1" : "legacy";
}

export function encoderFor(url: string): ResponseEncoder {
  return getVersion(url) === "v1" ? v1Encoder : legacyEncoder;
}
