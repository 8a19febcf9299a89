import { describe, it, expect, vi } from "vitest";
import { queryErrorHandler, statusReason } from "./error-handler.js";

// ---------------------------------------------------------------------------
// Mock logger to prevent console noise during tests
// ---------------------------------------------------------------------------
vi.mock("../utils/logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createMockRequest() {
  return { url: "/loki/api/v1/query", method: "GET", headers: {} } as any;
}

function createMockReply() {
  const state = { statusCode: 200, body: undefined as unknown };
  const reply: any = {
    code: (c: number) => { state.statusCode = c; return reply; },
    send: (b: unknown) => { state.body = b; return reply; },
  };
  Object.defineProperty(reply, "_state", { get: () => state });
  return reply;
}

function createError(message: string, statusCode?: number, code?: string) {
  const error: any = new Error(message);
  if (statusCode !== undefined) error.statusCode = statusCode;
  if (code !== undefined) error.code = code;
  return error;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("queryErrorHandler", () => {
  it("keeps the code and message of a 400 error", () => {
    const reply = createMockReply();
    queryErrorHandler(
      createError("invalid direction 'up'", 400, "InvalidParameter"),
      createMockRequest(),
      reply,
    );

    expect(reply._state.statusCode).toBe(400);
    expect(reply._state.body).toEqual({
      error: "InvalidParameter",
      message: "invalid direction 'up'",
    });
  });

  it("keeps the message of a deliberate 500 error", () => {
    const reply = createMockReply();
    queryErrorHandler(
      createError("unknown result type", 500, "EncodeError"),
      createMockRequest(),
      reply,
    );

    expect(reply._state.statusCode).toBe(500);
    expect(reply._state.body).toEqual({ error: "EncodeError", message: "unknown result type" });
  });

  it("falls back to the reason phrase when the error has no code", () => {
    const reply = createMockReply();
    queryErrorHandler(createError("nope", 404), createMockRequest(), reply);

    expect(reply._state.body).toEqual({ error: "Not Found", message: "nope" });
  });

  it("hides the message of an unexpected error", () => {
    const reply = createMockReply();
    queryErrorHandler(createError("db exploded"), createMockRequest(), reply);

    expect(reply._state.statusCode).toBe(500);
    expect(reply._state.body).toEqual({
      error: "Internal Server Error",
      message: "Internal server error. Please try again later.",
    });
  });
});

describe("statusReason", () => {
  it("returns the standard phrase", () => {
    expect(statusReason(400)).toBe("Bad Request");
  });

  it("returns Error for unknown codes", () => {
    expect(statusReason(599)).toBe("Error");
  });
});
