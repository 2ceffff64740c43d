import type net from "node:net";
import { ConnectionDecodeError } from "../errors/fixtureErrors.js";
import type { LogLevel, LogSink } from "../logging/logTypes.js";
import type { LogRecord } from "../records/recordTypes.js";
import { FrameDecoder, type FrameFormat } from "./frameDecoder.js";
import type { PortAcceptor } from "./portAcceptor.js";

type Connection = {
  id: number;
  socket: net.Socket;
  decoder: FrameDecoder;
  remote: string;
};

export type ReactorOptions = {
  acceptor: PortAcceptor;
  shutdown: AbortSignal;
  format: FrameFormat;
  logger: LogSink;
  scope: string;
  /** Receives every decoded record, in per-connection order. */
  onRecord: (record: LogRecord) => void;
};

/**
 * Dispatches accepted sockets and their data on the Node event loop.
 *
 * It does not own the service: records leave through `onRecord`, and the only way to stop
 * it is the shutdown signal.
 */
export class Reactor {
  private readonly opts: ReactorOptions;
  private readonly connections = new Map<net.Socket, Connection>();
  private exited: Promise<void> | null = null;
  private isRunning = false;
  private nextId = 0;

  constructor(opts: ReactorOptions) {
    this.opts = opts;
  }

  get running(): boolean {
    return this.isRunning;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  /**
   * Start dispatching. The returned promise settles when the reactor has exited.
   */
  run(): Promise<void> {
    if (this.exited) return this.exited;
    const { acceptor, shutdown } = this.opts;
    this.isRunning = true;

    this.exited = new Promise<void>((resolve, reject) => {
      const onShutdown = () => {
        this.exit().then(resolve, reject);
      };
      acceptor.accept(
        (socket) => this.register(socket),
        (err) => this.log("error", "Listener error.", { error: err.message })
      );
      if (shutdown.aborted) onShutdown();
      else shutdown.addEventListener("abort", onShutdown, { once: true });
    });
    return this.exited;
  }

  private register(socket: net.Socket): void {
    if (this.opts.shutdown.aborted) {
      socket.destroy();
      return;
    }
    this.nextId += 1;
    const conn: Connection = {
      id: this.nextId,
      socket,
      decoder: new FrameDecoder(this.opts.format),
      remote: `${socket.remoteAddress ?? "?"}:${socket.remotePort ?? "?"}`,
    };
    this.connections.set(socket, conn);

    socket.on("data", (chunk: Buffer) => this.handleData(conn, chunk));
    socket.on("end", () => this.close(conn));
    socket.on("close", () => {
      this.connections.delete(socket);
    });
    socket.on("error", (err) => {
      this.log("warn", "Connection error, closing connection.", { connection: conn.remote, error: err.message });
      this.close(conn);
    });
    socket.resume();
    this.log("debug", "Connection accepted.", { connection: conn.remote, id: conn.id });
  }

  private handleData(conn: Connection, chunk: Buffer): void {
    if (this.opts.shutdown.aborted || !this.connections.has(conn.socket)) return;
    try {
      for (const record of conn.decoder.feed(chunk)) this.opts.onRecord(record);
    } catch (e: unknown) {
      if (e instanceof ConnectionDecodeError) {
        this.log("error", "Failed decoding json, closing socket.", {
          connection: conn.remote,
          reason: e.message,
          frame: e.frame.toString("utf-8"),
        });
      } else {
        this.log("error", "Unknown error occurred, closing connection.", {
          connection: conn.remote,
          error: e instanceof Error ? e.message : String(e),
        });
      }
      this.close(conn);
    }
  }

  private close(conn: Connection): void {
    if (!this.connections.delete(conn.socket)) return;
    conn.socket.destroy();
  }

  private async exit(): Promise<void> {
    for (const conn of [...this.connections.values()]) this.close(conn);
    try {
      await this.opts.acceptor.close();
    } finally {
      this.isRunning = false;
    }
    this.log("debug", "Reactor exited.");
  }

  private log(level: LogLevel, message: string, details?: Record<string, unknown>): void {
    this.opts.logger.append({ level, scope: this.opts.scope, message, details });
  }
}
