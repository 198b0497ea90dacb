import * as net from "node:net";
import { StreamLineChannel } from "./streamLineChannel";
import {
  type SerialTransport,
  type TransportChannel,
  TransportConfigError,
  abortError,
} from "./serialTransport";

export interface TcpTransportOptions {
  port: number;
  host?: string;
}

type SocketWaiter = (socket: net.Socket) => void;

/**
 * Serial line over TCP. One client at a time: a new connection replaces
 * the active one.
 */
export class TcpTransport implements SerialTransport {
  readonly kind = "tcp";

  private server: net.Server | null = null;
  private active: StreamLineChannel | null = null;
  private pending: net.Socket | null = null;
  private waiter: SocketWaiter | null = null;

  constructor(private readonly options: TcpTransportOptions) {}

  /** Bound port; differs from the configured one when that was 0. */
  get port(): number {
    const address = this.server?.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    return this.options.port;
  }

  describe(): string {
    return `tcp://${this.options.host ?? "0.0.0.0"}:${this.port}`;
  }

  async start(): Promise<void> {
    try {
      await this.listen();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportConfigError(`Cannot listen on TCP port ${this.options.port}: ${reason}`, {
        cause: err,
      });
    }
    console.log(`[TCP] Listening on ${this.describe()}`);
  }

  private listen(): Promise<void> {
    const server = net.createServer((socket) => this.accept(socket));
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      server.once("error", onError);
      server.listen(this.options.port, this.options.host, () => {
        server.off("error", onError);
        server.on("error", (err) => console.error("[TCP] Server error:", err.message));
        server.on("close", () => {
          if (this.server === server) this.server = null;
        });
        this.server = server;
        resolve();
      });
    });
  }

  private accept(socket: net.Socket) {
    console.log(`[TCP] Client connected from ${socket.remoteAddress}:${socket.remotePort}`);
    socket.setNoDelay(true);
    socket.on("error", (err) => console.error("[TCP] Socket error:", err.message));

    if (this.active && !this.active.isClosed()) {
      console.log("[TCP] Closing previous client");
      this.active.close();
    }
    this.pending?.destroy();
    this.pending = null;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(socket);
    } else {
      this.pending = socket;
    }
  }

  async open(signal: AbortSignal): Promise<TransportChannel> {
    if (signal.aborted) throw abortError();
    if (!this.server) {
      // The listener went away; a failure here is retried by the caller
      await this.listen();
      console.log(`[TCP] Listening again on ${this.describe()}`);
    }

    const socket = this.pending ?? (await this.nextSocket(signal));
    this.pending = null;
    const channel = new StreamLineChannel(socket, socket, () => socket.destroy());
    this.active = channel;
    return channel;
  }

  private nextSocket(signal: AbortSignal): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this.waiter = null;
        reject(abortError());
      };
      this.waiter = (socket) => {
        signal.removeEventListener("abort", onAbort);
        resolve(socket);
      };
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  async close(): Promise<void> {
    this.active?.close();
    this.active = null;
    this.pending?.destroy();
    this.pending = null;

    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    console.log("[TCP] Server closed");
  }
}
