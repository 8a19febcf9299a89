export const ERR = {
  INVALID_PARAMETER: "InvalidParameter",
  DELAY_TOO_LARGE: "DelayTooLarge",
  ENGINE_EXECUTION: "EngineExecutionError",
  ENCODE: "EncodeError",
  LABEL_QUERY: "LabelQueryError",
  UPGRADE: "UpgradeFailure",
  SUBSCRIPTION: "SubscriptionFailure",
  STREAM_WRITE: "StreamWriteFailure",
} as const;

export type QuerierErrorCode = (typeof ERR)[keyof typeof ERR];

const STATUS_BY_CODE: Record<QuerierErrorCode, number> = {
  InvalidParameter: 400,
  DelayTooLarge: 400,
  EngineExecutionError: 400,
  EncodeError: 500,
  LabelQueryError: 500,
  UpgradeFailure: 500,
  SubscriptionFailure: 500,
  StreamWriteFailure: 500,
};

/**
 * An error with a taxonomy code. The shared error handler answers with
 * `statusCode` and exposes `message`; the streaming failures never reach
 * it and end up in a close frame instead.
 */
export class QuerierError extends Error {
  readonly code: QuerierErrorCode;
  readonly statusCode: number;

  constructor(code: QuerierErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "QuerierError";
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
  }
}

export function invalidParameter(message: string): QuerierError {
  return new QuerierError(ERR.INVALID_PARAMETER, message);
}

/** Message of anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Wrap anything thrown under `code`, keeping an existing QuerierError as is. */
export function asQuerierError(code: QuerierErrorCode, err: unknown): QuerierError {
  if (err instanceof QuerierError) return err;
  return new QuerierError(code, errorMessage(err), { cause: err });
}
