import type { Emulator } from "../emulator";
import { retryWithBackoff } from "./backoff";
import { type SerialTransport, type TransportChannel, isAbortError } from "./serialTransport";

export interface SerialBridgeOptions {
  reconnectTimeoutMs: number;
  reconnectBackoffMs: number;
  asyncNotifications: boolean;
}

/**
 * Feeds lines from the transport into the emulator and writes the replies
 * back. A lost client is not fatal: the bridge reopens the transport.
 */
export class SerialBridge {
  private readonly controller = new AbortController();
  private channel: TransportChannel | null = null;

  constructor(
    private readonly emulator: Emulator,
    private readonly transport: SerialTransport,
    private readonly options: SerialBridgeOptions,
  ) {}

  /**
   * Resolves after stop(). Rejects only with ReconnectTimeoutError or
   * TransportConfigError.
   */
  async run(): Promise<void> {
    const { signal } = this.controller;
    while (!signal.aborted) {
      let channel: TransportChannel;
      try {
        channel = await retryWithBackoff(
          () => this.transport.open(signal),
          {
            initialDelayMs: this.options.reconnectBackoffMs,
            timeoutMs: this.options.reconnectTimeoutMs,
            onRetry: (err, delayMs) => {
              const reason = err instanceof Error ? err.message : String(err);
              console.error(`[SERIAL] Open failed (${reason}), retrying in ${delayMs}ms`);
            },
          },
          signal,
        );
      } catch (err) {
        if (isAbortError(err)) return;
        throw err;
      }
      await this.serve(channel);
    }
  }

  private async serve(channel: TransportChannel) {
    this.channel = channel;
    console.log(`[SERIAL] Client attached on ${this.transport.describe()}`);

    const unsubscribe = this.options.asyncNotifications
      ? this.emulator.onTransition((event) => {
          if (event.type !== "state") return;
          channel.write(this.emulator.stateNotification(event.to)).catch((err: unknown) => {
            console.error("[SERIAL] Failed to send state notification:", err);
          });
        })
      : () => {};

    try {
      if (this.options.asyncNotifications) {
        await channel.write(this.emulator.bootNotification());
      }
      for (;;) {
        const line = await channel.readLine();
        if (line === null) break;
        const { echo, response } = this.emulator.execute(line);
        await channel.write(`${echo ?? ""}${response}`);
      }
      console.log("[SERIAL] Client disconnected");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[SERIAL] Channel failed: ${reason}`);
    } finally {
      unsubscribe();
      channel.close();
      if (this.channel === channel) this.channel = null;
    }
  }

  async stop(): Promise<void> {
    this.controller.abort();
    this.channel?.close();
    await this.transport.close();
  }
}
