import type { Readable, Writable } from "node:stream";
import { LineFramer } from "./lineFramer";
import type { TransportChannel } from "./serialTransport";

type Waiter = (line: string | null) => void;

/**
 * TransportChannel over a readable/writable stream pair (a socket, or a
 * child process's stdout/stdin).
 */
export class StreamLineChannel implements TransportChannel {
  private readonly framer = new LineFramer();
  private readonly lines: string[] = [];
  private readonly waiters: Waiter[] = [];
  private closed = false;

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
    private readonly onClose?: () => void,
  ) {
    input.setEncoding("latin1");
    input.on("data", this.onData);
    input.on("end", this.onEnd);
    input.on("close", this.onEnd);
    input.on("error", (err) => {
      console.error("[SERIAL] Read error:", err.message);
      this.close();
    });
  }

  private readonly onData = (chunk: string) => {
    for (const line of this.framer.push(chunk)) {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(line);
      } else {
        this.lines.push(line);
      }
    }
  };

  private readonly onEnd = () => this.close();

  isClosed(): boolean {
    return this.closed;
  }

  readLine(): Promise<string | null> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  write(text: string): Promise<void> {
    if (this.closed || this.output.destroyed) {
      return Promise.reject(new Error("Channel is closed"));
    }
    return new Promise((resolve, reject) => {
      this.output.write(text, "latin1", (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    // The input may outlive this channel and feed the next one
    this.input.off("data", this.onData);
    this.input.off("end", this.onEnd);
    this.input.off("close", this.onEnd);
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
    this.onClose?.();
  }
}
