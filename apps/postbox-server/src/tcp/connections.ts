import type { Socket } from "node:net";
import type { RequestHeader } from "@postbox/protocol";

/**
 * Lifecycle of a one-request connection:
 * AwaitingHeader → AwaitingPayload → ReadyToDispatch → AwaitingWrite → Closed.
 * Any state may jump to Closed on EOF, error or idle timeout.
 */
export enum ConnectionState {
  AwaitingHeader = "awaiting-header",
  AwaitingPayload = "awaiting-payload",
  ReadyToDispatch = "ready-to-dispatch",
  AwaitingWrite = "awaiting-write",
  Closed = "closed",
}

/**
 * Received bytes kept as a list of chunks with a running length. Chunks are
 * joined only when a caller takes a complete section, so a frame arriving in
 * many small reads is copied a bounded number of times.
 */
export class InboundBuffer {
  private chunks: Buffer[] = [];
  private byteLength = 0;

  get length(): number {
    return this.byteLength;
  }

  push(chunk: Buffer): void {
    if (chunk.length === 0) return;
    this.chunks.push(chunk);
    this.byteLength += chunk.length;
  }

  /** Remove and return the first `size` bytes */
  take(size: number): Buffer {
    if (size > this.byteLength) {
      throw new RangeError(`Cannot take ${size} bytes, ${this.byteLength} buffered`);
    }
    const joined = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.byteLength);
    const rest = joined.subarray(size);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.byteLength = rest.length;
    return joined.subarray(0, size);
  }

  clear(): void {
    this.chunks = [];
    this.byteLength = 0;
  }
}

export interface Connection {
  id: number;
  socket: Socket;
  remoteAddress: string;
  state: ConnectionState;
  /** Bytes received and not yet consumed by the decoder */
  inbound: InboundBuffer;
  header?: RequestHeader;
  openedAt: number;
}

export class ConnectionRegistry {
  private connections = new Map<Socket, Connection>();
  private nextId = 1;

  add(socket: Socket): Connection {
    const conn: Connection = {
      id: this.nextId++,
      socket,
      remoteAddress: socket.remoteAddress ?? "unknown",
      state: ConnectionState.AwaitingHeader,
      inbound: new InboundBuffer(),
      openedAt: Date.now(),
    };
    this.connections.set(socket, conn);
    return conn;
  }

  remove(socket: Socket): Connection | undefined {
    const conn = this.connections.get(socket);
    this.connections.delete(socket);
    return conn;
  }

  get(socket: Socket): Connection | undefined {
    return this.connections.get(socket);
  }

  all(): Connection[] {
    return Array.from(this.connections.values());
  }

  get size(): number {
    return this.connections.size;
  }
}

/** Reading states: the connection still expects request bytes */
export function isReading(conn: Connection): boolean {
  return conn.state === ConnectionState.AwaitingHeader || conn.state === ConnectionState.AwaitingPayload;
}
