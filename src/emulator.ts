import { EvSimulator, type EvOptions, type EvSnapshot } from "./evSimulator";
import {
  EvseStateMachine,
  type EvseOptions,
  type EvseSnapshot,
  type EvseTransition,
} from "./evseStateMachine";
import { FaultRegistry, type FaultSnapshot } from "./faultRegistry";
import type { RapiTarget } from "./rapi/rapiCommand";
import { RapiEngine, type RapiEngineOptions, type RapiExchange } from "./rapi/rapiEngine";
import { bootNotification, stateNotification } from "./rapi/notifications";
import {
  EvseStateCode,
  FAULT_NAMES,
  type EvErrorMode,
  type FaultName,
  type TemperatureSensor,
} from "./types";

export interface EmulatorOptions {
  evse: EvseOptions;
  ev: EvOptions;
  rapi?: RapiEngineOptions;
  now?: () => number;
}

export type EmulatorEvent =
  | { type: "state"; from: EvseStateCode; to: EvseStateCode; at: number }
  | { type: "fault"; fault: FaultName; active: boolean; count: number; at: number };

export type EmulatorListener = (event: EmulatorEvent) => void;

export interface EmulatorSnapshot {
  evse: EvseSnapshot;
  ev: EvSnapshot;
  faults: FaultSnapshot;
}

const DEFAULT_MAX_BUFFERED_EVENTS = 1000;

/**
 * Owns the EVSE, the EV and the fault registry. Every command and every
 * tick runs as one synchronous critical section; listeners hear about the
 * committed changes after it has been left.
 */
export class Emulator {
  private readonly evse: EvseStateMachine;
  private readonly ev: EvSimulator;
  private readonly faults = new FaultRegistry();
  private readonly engine: RapiEngine;
  private readonly now: () => number;

  private listeners = new Set<EmulatorListener>();
  private inTransaction = false;
  private pendingTransitions: EvseTransition[] = [];

  constructor(options: EmulatorOptions) {
    this.evse = new EvseStateMachine(options.evse);
    this.ev = new EvSimulator(options.ev);
    this.engine = new RapiEngine(options.rapi);
    this.now = options.now ?? Date.now;
  }

  private get target(): RapiTarget {
    return { evse: this.evse, ev: this.ev, faults: this.faults };
  }

  // Critical section

  private transact<T>(fn: () => T): T {
    const [result, events] = this.runExclusive(fn);
    this.publish(events);
    return result;
  }

  private runExclusive<T>(fn: () => T): [T, EmulatorEvent[]] {
    if (this.inTransaction) {
      throw new Error("Emulator state accessed re-entrantly");
    }
    this.inTransaction = true;
    this.pendingTransitions = [];
    const faultsBefore = this.faults.snapshot();

    try {
      const result = fn();
      this.reconcile();
      return [result, this.collectEvents(faultsBefore)];
    } finally {
      this.inTransaction = false;
    }
  }

  private reconcile() {
    const transition = this.evse.reconcile(this.ev, this.faults);
    if (transition) {
      this.pendingTransitions.push(transition);
    }
  }

  private collectEvents(before: FaultSnapshot): EmulatorEvent[] {
    const at = this.now();
    const after = this.faults.snapshot();
    const events: EmulatorEvent[] = [];

    for (const fault of FAULT_NAMES) {
      const count = after.counters[fault];
      const tripped = count > before.counters[fault];
      const wasActive = before.active.includes(fault);
      const isActive = after.active.includes(fault);
      if (tripped) {
        events.push({ type: "fault", fault, active: true, count, at });
      }
      if ((wasActive || tripped) && !isActive) {
        events.push({ type: "fault", fault, active: false, count, at });
      }
    }

    for (const { from, to } of this.pendingTransitions) {
      events.push({ type: "state", from, to, at });
    }
    return events;
  }

  private publish(events: EmulatorEvent[]) {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          console.error("[EMULATOR] Event listener failed:", err);
        }
      }
    }
  }

  // Events

  onTransition(listener: EmulatorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Events as an async sequence. Slow consumers lose the oldest events once
   * more than `maxBuffered` are waiting.
   */
  async *transitions(
    signal?: AbortSignal,
    maxBuffered = DEFAULT_MAX_BUFFERED_EVENTS,
  ): AsyncGenerator<EmulatorEvent> {
    const buffer: EmulatorEvent[] = [];
    let wake: (() => void) | null = null;
    const notify = () => {
      const resolve = wake;
      wake = null;
      resolve?.();
    };

    const unsubscribe = this.onTransition((event) => {
      buffer.push(event);
      if (buffer.length > maxBuffered) {
        buffer.shift();
      }
      notify();
    });
    signal?.addEventListener("abort", notify);

    try {
      while (!signal?.aborted) {
        const next = buffer.shift();
        if (next !== undefined) {
          yield next;
          continue;
        }
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
      }
    } finally {
      unsubscribe();
      signal?.removeEventListener("abort", notify);
    }
  }

  // Queries

  getSnapshot(): EmulatorSnapshot {
    return {
      evse: this.evse.snapshot(),
      ev: this.ev.snapshot(),
      faults: this.faults.snapshot(),
    };
  }

  getState(): EvseStateCode {
    return this.evse.getState();
  }

  bootNotification(): string {
    return bootNotification(this.evse.firmwareVersion);
  }

  stateNotification(state?: EvseStateCode): string {
    return stateNotification(this.target, state);
  }

  // Commands

  /** Run one RAPI line. */
  execute(line: string): RapiExchange {
    return this.transact(() => this.engine.process(line, this.target));
  }

  /** Advance the physical simulation by `deltaSeconds`. */
  tick(deltaSeconds: number) {
    const dt = Math.max(0, deltaSeconds);
    this.transact(() => {
      if (
        this.ev.getErrorMode() === "diode_check_failure" &&
        this.ev.isConnected() &&
        !this.faults.isActive("diode_check")
      ) {
        this.faults.trigger("diode_check");
      }
      this.reconcile();

      if (this.evse.getState() === EvseStateCode.CHARGING) {
        const volts = this.evse.getVoltageMillivolts() / 1000;
        const draw = this.ev.draw(this.evse.getCurrentCapacity(), volts, dt);
        this.evse.applyDraw(draw, dt, this.ev);
      } else {
        this.ev.idle();
      }

      this.evse.updateTemperatures(dt, this.faults);
    });
  }

  connectEv() {
    this.transact(() => this.ev.connect());
  }

  disconnectEv() {
    this.transact(() => this.ev.disconnect());
  }

  requestCharge(): boolean {
    return this.transact(() => this.ev.requestCharge(true));
  }

  stopCharge() {
    this.transact(() => this.ev.cancelChargeRequest());
  }

  setSoc(percent: number) {
    this.transact(() => this.ev.setSoc(percent));
  }

  setDirectMode(enabled: boolean, currentAmps?: number) {
    this.transact(() => this.ev.setDirectMode(enabled, currentAmps));
  }

  setDirectCurrent(amps: number) {
    this.transact(() => this.ev.setDirectCurrent(amps));
  }

  setCurrentVariance(enabled: boolean) {
    this.transact(() => this.ev.setCurrentVariance(enabled));
  }

  setEvErrorMode(mode: EvErrorMode | null) {
    this.transact(() => this.ev.setErrorMode(mode));
  }

  setBatteryCapacity(kwh: number) {
    this.transact(() => this.ev.setBatteryCapacity(kwh));
  }

  setMaxChargeRate(kw: number) {
    this.transact(() => this.ev.setMaxChargeRate(kw));
  }

  triggerFault(fault: FaultName): boolean {
    return this.transact(() => this.faults.trigger(fault));
  }

  clearFault(fault: FaultName): boolean {
    return this.transact(() => this.faults.clear(fault));
  }

  clearAllFaults(): FaultName[] {
    return this.transact(() => this.faults.clearAll());
  }

  setVentilationRequired(required: boolean) {
    this.transact(() => this.evse.setVentilationRequired(required));
  }

  setTemperatures(temperatures: Partial<Record<TemperatureSensor, number>>) {
    this.transact(() => {
      if (temperatures.ds !== undefined) this.evse.setTemperature("ds", temperatures.ds);
      if (temperatures.mcp !== undefined) this.evse.setTemperature("mcp", temperatures.mcp);
    });
  }

  setSensorError(sensor: TemperatureSensor, failed: boolean) {
    this.transact(() => this.evse.setSensorError(sensor, failed));
  }

  setGfciSelfTestFailure(failing: boolean) {
    this.transact(() => this.evse.setGfciSelfTestFailure(failing));
  }
}
