import type { Emulator } from "./emulator";

export interface SimulationClockOptions {
  intervalMs: number;
  now?: () => number;
}

/** Ticks the emulator every `intervalMs` with the wall time that really elapsed. */
export class SimulationClock {
  private timer: NodeJS.Timeout | null = null;
  private lastTick = 0;
  private readonly now: () => number;

  constructor(
    private readonly emulator: Emulator,
    private readonly options: SimulationClockOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  start() {
    if (this.timer) return;
    this.lastTick = this.now();
    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
    console.log(`[SIM] Clock started (${this.options.intervalMs}ms)`);
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    console.log("[SIM] Clock stopped");
  }

  private tick() {
    const now = this.now();
    const deltaSeconds = (now - this.lastTick) / 1000;
    this.lastTick = now;
    try {
      this.emulator.tick(deltaSeconds);
    } catch (err) {
      console.error("[SIM] Tick failed:", err);
    }
  }
}
