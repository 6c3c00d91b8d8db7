/**
 * Readiness-driven TCP front end. Node's event loop delivers socket events on
 * one thread, so no connection ever blocks another; each connection carries
 * exactly one request and one response.
 *
 * @module tcp/multiplexer
 */
import net, { type AddressInfo, type Socket } from "node:net";
import {
  REQUEST_HEADER_SIZE,
  ResponseCode,
  clientIdToHex,
  decodeRequestBody,
  decodeRequestHeader,
  encodeResponse,
  type CodecLimits,
  type RequestHeader,
  type Response,
} from "@postbox/protocol";
import type { Store } from "../store/store.js";
import { StoreFailureError } from "../store/errors.js";
import type { RateLimitConfig } from "../config.js";
import { dispatch, type Outcome } from "../requests/handler.js";
import { buildResponse } from "../requests/response.js";
import { ConnectionRegistry, ConnectionState, isReading, type Connection } from "./connections.js";
import { AddressRateLimiter, RateLimitedError } from "./rate-limit.js";

/** Longest wait for the peer to hang up once its response is flushed */
const LINGER_MS = 1_000;

export interface MultiplexerOptions {
  store: Store;
  limits: CodecLimits;
  legacyErrors: boolean;
  idleTimeoutMs: number;
  shutdownGraceMs: number;
  maxConnections: number;
  rateLimit?: RateLimitConfig | null;
}

export interface ListenOptions {
  port: number;
  host?: string;
  /** Aborting starts a graceful shutdown */
  signal?: AbortSignal;
}

export interface MultiplexerStats {
  listening: boolean;
  openConnections: number;
  servedConnections: number;
}

export class Multiplexer {
  private server: net.Server | null = null;
  private readonly connections = new ConnectionRegistry();
  private readonly rateLimiter: AddressRateLimiter | null;
  private sweepTimer: NodeJS.Timeout | null = null;
  private served = 0;
  private closing: Promise<void> | null = null;
  private onDrained: (() => void) | null = null;

  constructor(private readonly options: MultiplexerOptions) {
    const limit = options.rateLimit;
    this.rateLimiter = limit ? new AddressRateLimiter(limit.maxRequests, limit.windowMs) : null;
  }

  /** Bind and start accepting. Rejects if the address cannot be bound. */
  listen({ port, host = "0.0.0.0", signal }: ListenOptions): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error("Multiplexer is already listening"));
    }

    const server = net.createServer({ allowHalfOpen: true }, (socket) => {
      this.accept(socket);
    });
    server.maxConnections = this.options.maxConnections;
    server.on("drop", (data) => {
      console.warn(`[tcp] Dropped connection from ${data?.remoteAddress ?? "unknown"}: too many open connections`);
    });
    this.server = server;

    return new Promise<AddressInfo>((resolve, reject) => {
      const onListenError = (err: Error) => {
        this.server = null;
        reject(err);
      };
      server.once("error", onListenError);

      server.listen(port, host, () => {
        server.off("error", onListenError);
        server.on("error", (err) => {
          console.error("[tcp] Server error:", err);
        });

        const address = server.address();
        if (address === null || typeof address === "string") {
          reject(new Error(`Unexpected listen address: ${String(address)}`));
          return;
        }

        if (this.rateLimiter) {
          const limiter = this.rateLimiter;
          this.sweepTimer = setInterval(() => limiter.sweep(), this.options.rateLimit?.windowMs ?? 60_000);
          this.sweepTimer.unref();
        }

        if (signal) {
          if (signal.aborted) {
            void this.shutdown();
          } else {
            signal.addEventListener("abort", () => void this.shutdown(), { once: true });
          }
        }

        console.log(`[tcp] Listening on ${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  /** Register a freshly accepted socket and wire its events */
  accept(socket: Socket): Connection {
    const conn = this.connections.add(socket);
    console.log(`[tcp] #${conn.id} accepted from ${conn.remoteAddress}`);

    socket.setTimeout(this.options.idleTimeoutMs);
    socket.on("timeout", () => {
      console.warn(`[tcp] #${conn.id} idle for ${this.options.idleTimeoutMs}ms, closing`);
      this.close(conn);
    });
    socket.on("data", (chunk: Buffer) => this.onReadable(conn, chunk));
    socket.on("end", () => {
      // EOF before a full frame: nothing to answer
      if (isReading(conn)) {
        if (conn.inbound.length > 0) {
          console.warn(`[tcp] #${conn.id} closed mid-request after ${conn.inbound.length} bytes`);
        }
        this.close(conn);
      } else if (conn.state === ConnectionState.Closed) {
        socket.destroy();
      }
    });
    socket.on("finish", () => this.onWritable(conn));
    socket.on("error", (err) => {
      console.warn(`[tcp] #${conn.id} socket error: ${err.message}`);
      this.close(conn);
    });
    socket.on("close", () => this.release(conn));

    return conn;
  }

  /** Feed newly arrived bytes through the header/payload state machine */
  onReadable(conn: Connection, chunk: Buffer): void {
    // Anything past the single frame is discarded
    if (!isReading(conn)) return;

    conn.inbound.push(chunk);

    if (conn.state === ConnectionState.AwaitingHeader) {
      if (conn.inbound.length < REQUEST_HEADER_SIZE) return;

      let header: RequestHeader;
      try {
        header = decodeRequestHeader(conn.inbound.take(REQUEST_HEADER_SIZE), this.options.limits);
      } catch (err) {
        conn.inbound.clear();
        this.respond(conn, failure(err));
        return;
      }
      conn.header = header;
      conn.state = ConnectionState.AwaitingPayload;
    }

    const header = conn.header;
    if (conn.state !== ConnectionState.AwaitingPayload || !header) return;
    if (conn.inbound.length < header.payloadSize) return;

    const payload = conn.inbound.take(header.payloadSize);
    conn.inbound.clear();
    conn.state = ConnectionState.ReadyToDispatch;
    this.respond(conn, this.process(conn, header, payload));
  }

  /**
   * The response has been flushed and our side of the socket is shut. Input
   * still arriving is read and dropped until the peer hangs up or the linger
   * bound passes, so the socket is never destroyed with unread bytes pending.
   */
  onWritable(conn: Connection): void {
    if (conn.state !== ConnectionState.AwaitingWrite) return;
    this.served++;
    conn.state = ConnectionState.Closed;

    const socket = conn.socket;
    if (socket.readableEnded) {
      socket.destroy();
      return;
    }
    const linger = setTimeout(() => socket.destroy(), Math.min(LINGER_MS, this.options.idleTimeoutMs));
    socket.once("close", () => clearTimeout(linger));
  }

  /**
   * Stop accepting, give open connections `shutdownGraceMs` to finish, then
   * destroy whatever is left. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    if (!this.closing) {
      this.closing = this.drainAndClose();
    }
    return this.closing;
  }

  stats(): MultiplexerStats {
    return {
      listening: this.server?.listening ?? false,
      openConnections: this.connections.size,
      servedConnections: this.served,
    };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private process(conn: Connection, header: RequestHeader, payload: Buffer): Outcome {
    if (this.rateLimiter && !this.rateLimiter.check(conn.remoteAddress)) {
      return failure(new RateLimitedError(conn.remoteAddress));
    }

    let outcome: Outcome;
    try {
      const body = decodeRequestBody(header.code, payload);
      outcome = dispatch({ header, body }, this.options.store);
    } catch (err) {
      outcome = failure(err);
    }

    const summary =
      `[tcp] #${conn.id} ${clientIdToHex(header.clientId)} request ${header.code} ` +
      `(${header.payloadSize} bytes): ${outcome.ok ? "ok" : outcome.error.message}`;
    if (!outcome.ok && outcome.error instanceof StoreFailureError) {
      console.error(summary, outcome.error.cause);
    } else {
      console.log(summary);
    }
    return outcome;
  }

  private respond(conn: Connection, outcome: Outcome): void {
    const response = buildResponse(outcome, {
      version: this.options.limits.version,
      legacyErrors: this.options.legacyErrors,
    });

    conn.state = ConnectionState.AwaitingWrite;
    conn.socket.end(this.encode(conn, response));
  }

  private encode(conn: Connection, response: Response): Buffer {
    try {
      return encodeResponse(response);
    } catch (err) {
      console.error(`[tcp] #${conn.id} could not encode response ${response.body.code}:`, err);
      return encodeResponse({ version: response.version, body: { code: ResponseCode.GENERIC_ERROR } });
    }
  }

  private close(conn: Connection): void {
    conn.state = ConnectionState.Closed;
    conn.socket.destroy();
  }

  private release(conn: Connection): void {
    conn.state = ConnectionState.Closed;
    if (!this.connections.remove(conn.socket)) return;

    if (this.connections.size === 0 && this.onDrained) {
      const done = this.onDrained;
      this.onDrained = null;
      done();
    }
  }

  private waitForDrain(ms: number): Promise<boolean> {
    if (this.connections.size === 0) return Promise.resolve(true);
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.onDrained = null;
        resolve(false);
      }, ms);
      this.onDrained = () => {
        clearTimeout(timer);
        resolve(true);
      };
    });
  }

  private async drainAndClose(): Promise<void> {
    const server = this.server;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    if (!server) return;

    console.log("[tcp] No longer accepting connections");
    const closed = new Promise<void>((resolve) => {
      server.close(() => resolve());
    });

    const open = this.connections.size;
    if (open > 0) {
      console.log(`[tcp] Waiting up to ${this.options.shutdownGraceMs}ms for ${open} connection(s)`);
      const drained = await this.waitForDrain(this.options.shutdownGraceMs);
      if (!drained) {
        const remaining = this.connections.all();
        console.warn(`[tcp] Force-closing ${remaining.length} connection(s)`);
        for (const conn of remaining) {
          this.close(conn);
        }
      }
    }

    await closed;
    console.log("[tcp] Closed");
  }
}

function failure(err: unknown): Outcome {
  return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
}
