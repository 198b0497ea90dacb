export type TransportKind = "pty" | "tcp";

/** One client session on the virtual serial line. */
export interface TransportChannel {
  /** Next complete line, or null once the channel is closed. */
  readLine(): Promise<string | null>;
  write(text: string): Promise<void>;
  close(): void;
}

export interface SerialTransport {
  readonly kind: TransportKind;
  /** Acquire the underlying resource. Throws TransportConfigError when that is impossible. */
  start(): Promise<void>;
  /** Wait for the next client channel. Rejects with an AbortError when `signal` fires. */
  open(signal: AbortSignal): Promise<TransportChannel>;
  close(): Promise<void>;
  describe(): string;
}

/** The transport can never work with the given settings. */
export class TransportConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransportConfigError";
  }
}

export class ReconnectTimeoutError extends Error {
  constructor(timeoutMs: number, options?: ErrorOptions) {
    super(`Gave up reconnecting after ${timeoutMs}ms`, options);
    this.name = "ReconnectTimeoutError";
  }
}

export function abortError(): Error {
  const err = new Error("The operation was aborted");
  err.name = "AbortError";
  return err;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}
