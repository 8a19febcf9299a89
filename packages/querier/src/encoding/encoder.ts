import { ERR, QuerierError, errorMessage } from "../errors.js";
import type { LabelResponse, QueryResult, TailResponse } from "../types.js";

export type ApiVersion = "v1" | "legacy";

/**
 * JSON rendering of one API version. Chosen once per request and handed to
 * whatever writes the response or the tail frames.
 */
export interface ResponseEncoder {
  readonly version: ApiVersion;
  encodeQueryResult(result: QueryResult): string;
  encodeLabelResponse(response: LabelResponse): string;
  encodeTailResponse(response: TailResponse): string;
}

/** JSON.stringify that reports failure as an EncodeError. */
export function stringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch (err) {
    throw new QuerierError(ERR.ENCODE, `cannot encode response: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

export function unknownResultType(result: never): QuerierError {
  const value: unknown = result;
  const type =
    typeof value === "object" && value !== null && "resultType" in value
      ? String(value.resultType)
      : typeof value;
  return new QuerierError(ERR.ENCODE, `unsupported result type: ${type}`);
}

/** Sample values are strings; non-finite values use the +Inf/-Inf/NaN spelling. */
export function formatSampleValue(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Infinity) return "+Inf";
  if (value === -Infinity) return "-Inf";
  return String(value);
}
