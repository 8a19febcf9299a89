import { createLogger } from "@logquery/shared/utils";
import type { ResponseEncoder } from "../encoding/index.js";
import { ERR, QuerierError, asQuerierError, errorMessage } from "../errors.js";
import type { TailResponse, TailSubscription } from "../types.js";
import { EventQueue } from "./event-queue.js";

const logger = createLogger("tail-session");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The parts of a `ws` WebSocket a session uses. */
export interface TailSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  ping(data?: unknown, mask?: boolean, cb?: (err?: Error) => void): void;
  close(code?: number, data?: string): void;
  once(event: "close", listener: () => void): unknown;
}

export type SessionEvent =
  | { kind: "response"; response: TailResponse }
  | { kind: "error"; error: Error }
  | { kind: "ping" }
  | { kind: "overflow" }
  | { kind: "disconnect" };

export interface TailSessionOptions {
  pingIntervalMs: number;
  /** Identifies the session in log lines. */
  sessionId?: string;
}

export const DEFAULT_PING_INTERVAL_MS = 1_000;
/** Responses buffered behind a slow write before the session gives up. */
export const MAX_PENDING_RESPONSES = 100;

const WS_CONNECTING = 0;
const WS_OPEN = 1;
const WS_CLOSED = 3;
export const CLOSE_NORMAL = 1000;
export const CLOSE_INTERNAL_ERROR = 1011;

/** Close reasons are limited to 123 bytes by the WebSocket protocol. */
const MAX_CLOSE_REASON_BYTES = 123;

/** Cut `reason` to the close-frame limit without splitting a character. */
export function truncateCloseReason(reason: string): string {
  if (Buffer.byteLength(reason) <= MAX_CLOSE_REASON_BYTES) return reason;
  let bytes = 0;
  let text = "";
  for (const ch of reason) {
    const size = Buffer.byteLength(ch);
    if (bytes + size > MAX_CLOSE_REASON_BYTES) break;
    bytes += size;
    text += ch;
  }
  return text;
}

// ---------------------------------------------------------------------------
// Tail Session
// ---------------------------------------------------------------------------

/**
 * Streams one subscription over one upgraded connection.
 *
 * Subscription responses, the subscription's terminal error, ping ticks and
 * the peer going away all land in one queue and are handled in arrival
 * order; a write completes before the next event is taken. At most one ping
 * waits in the queue, and responses past MAX_PENDING_RESPONSES are dropped
 * and end the session with 1011 once the loop reaches them. The first
 * terminal event ends the loop, and `teardown` then releases the timer, the
 * subscription and the socket exactly once.
 */
export class TailSession {
  private readonly events = new EventQueue<SessionEvent>();
  private pingTimer: ReturnType<typeof setInterval> | null = null;
  private closeFrameSent = false;
  private tornDown = false;
  private framesSent = 0;
  private pingPending = false;
  private pendingResponses = 0;
  private droppedResponses = 0;

  constructor(
    private readonly socket: TailSocket,
    private readonly subscription: TailSubscription,
    private readonly encoder: ResponseEncoder,
    private readonly options: TailSessionOptions = { pingIntervalMs: DEFAULT_PING_INTERVAL_MS },
  ) {}

  /** Run until a terminal event; resolves once everything is released. */
  async run(): Promise<void> {
    const sessionId = this.options.sessionId;

    this.socket.once("close", () => this.events.push({ kind: "disconnect" }));
    this.subscription.onResponse((response) => this.enqueueResponse(response));
    this.subscription.onError((error) => this.events.push({ kind: "error", error }));
    this.pingTimer = setInterval(() => {
      if (this.pingPending) return;
      this.pingPending = true;
      this.events.push({ kind: "ping" });
    }, this.options.pingIntervalMs);
    if (this.socket.readyState === WS_CLOSED) this.events.push({ kind: "disconnect" });

    logger.info({ sessionId, version: this.encoder.version }, "Tail session started");

    try {
      let done = false;
      while (!done) {
        done = await this.handle(await this.events.next());
      }
    } finally {
      await this.teardown();
    }
  }

  /** Events waiting for the loop. */
  get queuedEvents(): number {
    return this.events.size;
  }

  private enqueueResponse(response: TailResponse): void {
    if (this.pendingResponses >= MAX_PENDING_RESPONSES) {
      if (this.droppedResponses === 0) this.events.push({ kind: "overflow" });
      this.droppedResponses++;
      return;
    }
    this.pendingResponses++;
    this.events.push({ kind: "response", response });
  }

  /** Handle one event; true when it ends the session. */
  private async handle(event: SessionEvent): Promise<boolean> {
    const sessionId = this.options.sessionId;

    switch (event.kind) {
      case "response": {
        this.pendingResponses--;
        let frame: string;
        try {
          frame = this.encoder.encodeTailResponse(event.response);
        } catch (err) {
          logger.error({ err, sessionId }, "Error encoding tail response");
          this.sendClose(asQuerierError(ERR.ENCODE, err));
          return true;
        }
        try {
          await this.send(frame);
          this.framesSent++;
        } catch (err) {
          logger.error({ err, sessionId }, "Error writing to websocket");
          this.sendClose(asQuerierError(ERR.STREAM_WRITE, err));
          return true;
        }
        return false;
      }

      case "error":
        logger.error({ err: event.error, sessionId }, "Error from tail subscription");
        this.sendClose(event.error);
        return true;

      case "ping":
        this.pingPending = false;
        try {
          await this.ping();
        } catch (err) {
          logger.warn({ err, sessionId }, "Error writing ping message to websocket");
          this.sendClose(asQuerierError(ERR.STREAM_WRITE, err));
          return true;
        }
        return false;

      case "overflow": {
        const err = new QuerierError(
          ERR.STREAM_WRITE,
          `tail client too slow: dropped ${this.droppedResponses} responses`,
        );
        logger.warn({ err, sessionId }, "Tail client is not keeping up");
        this.sendClose(err);
        return true;
      }

      case "disconnect":
        logger.info({ sessionId }, "Tail client disconnected");
        return true;
    }
  }

  private send(frame: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(frame, (err) => (err ? reject(err) : resolve()));
    });
  }

  private ping(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.ping(undefined, undefined, (err) => (err ? reject(err) : resolve()));
    });
  }

  /** Best-effort close frame carrying `err`; at most one per session. */
  private sendClose(err: Error): void {
    if (this.closeFrameSent) return;
    this.closeFrameSent = true;

    if (this.socket.readyState !== WS_OPEN) {
      logger.debug(
        { sessionId: this.options.sessionId, readyState: this.socket.readyState },
        "Socket no longer open, close frame skipped",
      );
      return;
    }

    try {
      this.socket.close(CLOSE_INTERNAL_ERROR, truncateCloseReason(err.message));
    } catch (closeErr) {
      logger.error(
        { err: closeErr, sessionId: this.options.sessionId },
        "Error writing close message to websocket",
      );
    }
  }

  private async teardown(): Promise<void> {
    if (this.tornDown) return;
    this.tornDown = true;
    const sessionId = this.options.sessionId;

    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }

    try {
      await this.subscription.close();
    } catch (err) {
      logger.error({ err, sessionId }, "Error closing tail subscription");
    }

    if (!this.closeFrameSent && this.socket.readyState === WS_OPEN) {
      this.closeFrameSent = true;
      try {
        this.socket.close(CLOSE_NORMAL);
      } catch (err) {
        logger.error({ err, sessionId }, "Error closing websocket");
      }
    }

    logger.info({ sessionId, framesSent: this.framesSent }, "Tail session closed");
  }
}

/**
 * Close an upgraded socket whose subscription could not be started.
 */
export function rejectSubscription(socket: TailSocket, err: unknown, sessionId?: string): void {
  const error = asQuerierError(ERR.SUBSCRIPTION, err);
  logger.error({ err: error, sessionId }, "Error connecting to tailer");
  if (socket.readyState !== WS_OPEN) return;
  try {
    socket.close(CLOSE_INTERNAL_ERROR, truncateCloseReason(errorMessage(error)));
  } catch (closeErr) {
    logger.error({ err: closeErr, sessionId }, "Error writing close message to websocket");
  }
}

/**
 * Error for a failure the websocket plugin reports on `socket`: an
 * UpgradeFailure while the handshake is still in progress, a
 * StreamWriteFailure once the connection is established.
 */
export function socketFailure(err: unknown, readyState: number): QuerierError {
  return asQuerierError(readyState === WS_CONNECTING ? ERR.UPGRADE : ERR.STREAM_WRITE, err);
}
