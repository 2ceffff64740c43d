import net from "node:net";
import { BindError } from "../errors/fixtureErrors.js";

type AcceptHandler = (socket: net.Socket) => void;
type ErrorHandler = (err: Error) => void;

/**
 * Listening socket bound on all interfaces.
 *
 * Sockets accepted before `accept()` is called are held paused, like a listen backlog,
 * and handed over once a handler is installed.
 */
export class PortAcceptor {
  readonly port: number;
  private readonly server: net.Server;
  private held: net.Socket[] = [];
  private onConnection: AcceptHandler | null = null;
  private onError: ErrorHandler | null = null;

  private constructor(server: net.Server, port: number) {
    this.server = server;
    this.port = port;

    server.on("connection", (socket) => {
      if (this.onConnection) this.onConnection(socket);
      else this.held.push(socket);
    });
    server.on("error", (err) => {
      this.onError?.(err);
    });
  }

  /**
   * Bind `port` (0 lets the OS choose). Rejects with BindError when the port is taken.
   */
  static bind(port: number): Promise<PortAcceptor> {
    const server = net.createServer({ pauseOnConnect: true });

    return new Promise((resolve, reject) => {
      const onListening = () => {
        server.removeListener("error", onError);
        const address = server.address();
        if (address === null || typeof address === "string") {
          server.close();
          reject(new BindError(port, "listener has no TCP address"));
          return;
        }
        resolve(new PortAcceptor(server, address.port));
      };
      const onError = (err: Error) => {
        server.removeListener("listening", onListening);
        reject(new BindError(port, err));
      };

      server.once("listening", onListening);
      server.once("error", onError);
      server.listen({ port, exclusive: true });
    });
  }

  get listening(): boolean {
    return this.server.listening;
  }

  /**
   * Start handing accepted sockets (held ones first) to `handler`. Sockets arrive paused.
   */
  accept(handler: AcceptHandler, onError: ErrorHandler): void {
    this.onConnection = handler;
    this.onError = onError;
    const held = this.held;
    this.held = [];
    for (const socket of held) handler(socket);
  }

  /**
   * Stop accepting and release the port. Resolves once every accepted socket is gone,
   * so callers destroy their connections first.
   */
  close(): Promise<void> {
    for (const socket of this.held) socket.destroy();
    this.held = [];
    this.onConnection = null;
    if (!this.server.listening) return Promise.resolve();

    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
