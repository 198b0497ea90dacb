import { type ChildProcessWithoutNullStreams, spawn } from "node:child_process";
import * as fs from "node:fs";
import { StreamLineChannel } from "./streamLineChannel";
import {
  type SerialTransport,
  type TransportChannel,
  TransportConfigError,
  abortError,
} from "./serialTransport";

export type Spawner = (command: string, args: string[]) => ChildProcessWithoutNullStreams;

export interface PtyTransportOptions {
  /** Stable symlink to the slave device; auto-generated device path when omitted */
  path?: string;
  socatCommand?: string;
  spawner?: Spawner;
}

const PTY_NAME_PATTERN = /PTY is (\S+)/;

const defaultSpawner: Spawner = (command, args) => spawn(command, args, { stdio: "pipe" });

/**
 * Serial line over a pseudo-terminal. socat allocates the pair and relays
 * the master side over its stdio; clients open the slave device.
 *
 * One socat process serves every channel, so the device and its symlink
 * stay put while clients come and go. The symlink is removed on close().
 */
export class PtyTransport implements SerialTransport {
  readonly kind = "pty";

  private readonly spawner: Spawner;
  private child: ChildProcessWithoutNullStreams | null = null;
  private channel: StreamLineChannel | null = null;
  private devicePath: string | null = null;

  constructor(private readonly options: PtyTransportOptions = {}) {
    this.spawner = options.spawner ?? defaultSpawner;
  }

  describe(): string {
    return `pty:${this.options.path ?? this.devicePath ?? "(unallocated)"}`;
  }

  getDevicePath(): string | null {
    return this.devicePath;
  }

  async start(): Promise<void> {
    if (this.options.path) {
      this.removeStaleLink(this.options.path);
    }
  }

  private removeStaleLink(path: string) {
    const stats = fs.lstatSync(path, { throwIfNoEntry: false });
    if (!stats) return;
    if (!stats.isSymbolicLink()) {
      throw new TransportConfigError(`Refusing to replace ${path}: it is not a symlink`);
    }
    console.log(`[PTY] Removing stale symlink ${path}`);
    fs.unlinkSync(path);
  }

  async open(signal: AbortSignal): Promise<TransportChannel> {
    if (signal.aborted) throw abortError();
    const child = this.liveChild() ?? (await this.spawnSocat(signal));

    this.channel?.close();
    const channel = new StreamLineChannel(child.stdout, child.stdin, () => {
      if (this.channel === channel) this.channel = null;
    });
    this.channel = channel;
    return channel;
  }

  // stdout can end before the exit event arrives
  private liveChild(): ChildProcessWithoutNullStreams | null {
    const child = this.child;
    if (!child || !child.stdout.readableEnded) return child;
    child.kill();
    this.child = null;
    return null;
  }

  private async spawnSocat(signal: AbortSignal): Promise<ChildProcessWithoutNullStreams> {
    if (this.options.path) {
      this.removeStaleLink(this.options.path);
    }

    // ignoreeof: a client closing the slave must not end socat
    const link = this.options.path ? `,link=${this.options.path}` : "";
    const child = this.spawner(this.options.socatCommand ?? "socat", [
      "-d",
      "-d",
      `PTY,raw,echo=0,ignoreeof${link}`,
      "STDIO",
    ]);

    const devicePath = await waitForDevice(child, signal);
    this.child = child;
    this.devicePath = devicePath;

    child.on("error", (err) => console.error("[PTY] socat error:", err.message));
    child.once("exit", (code) => {
      console.log(`[PTY] socat exited with code ${code}`);
      if (this.child === child) {
        this.child = null;
        this.channel?.close();
      }
    });

    console.log(`[PTY] Serial device ready at ${this.options.path ?? devicePath}`);
    return child;
  }

  async close(): Promise<void> {
    this.channel?.close();
    this.channel = null;

    const child = this.child;
    this.child = null;
    if (child && child.exitCode === null && child.signalCode === null) {
      child.kill();
    }

    if (this.options.path) {
      const stats = fs.lstatSync(this.options.path, { throwIfNoEntry: false });
      if (stats?.isSymbolicLink()) {
        fs.unlinkSync(this.options.path);
        console.log(`[PTY] Removed symlink ${this.options.path}`);
      }
    }
  }
}

function waitForDevice(child: ChildProcessWithoutNullStreams, signal: AbortSignal): Promise<string> {
  return new Promise((resolve, reject) => {
    let stderr = "";
    let settled = false;

    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      signal.removeEventListener("abort", onAbort);
      fn();
    };
    const onAbort = () =>
      settle(() => {
        child.kill();
        reject(abortError());
      });

    // socat keeps logging on stderr; keep draining it
    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => {
      if (settled) return;
      stderr += chunk;
      const match = PTY_NAME_PATTERN.exec(stderr);
      if (match?.[1]) {
        const device = match[1];
        settle(() => resolve(device));
      }
    });
    child.once("error", (err) => settle(() => reject(err)));
    child.once("exit", (code) =>
      settle(() => reject(new Error(`socat exited with code ${code} before allocating a PTY`))),
    );
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
