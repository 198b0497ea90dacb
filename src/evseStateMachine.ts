import type { EvDraw, EvSimulator } from "./evSimulator";
import type { FaultRegistry } from "./faultRegistry";
import { SessionClock } from "./sessionClock";
import {
  EvseStateCode,
  stateName,
  type ServiceLevel,
  type TemperatureSensor,
} from "./types";

// Temperatures are kept in tenths of a degree Celsius
export const OVER_TEMPERATURE_THRESHOLD = 650;
const AMBIENT_TEMPERATURE = 250;
const HEAT_PER_AMP = 8;
const THERMAL_TIME_CONSTANT_SEC = 300;

const HARDWARE_MIN_AMPS = 6;
const HARDWARE_MAX_AMPS = 80;

// $GE settings flags
const SETTINGS_L2 = 0x0001;
const SETTINGS_AUTO_SVC_LEVEL_DISABLED = 0x0020;
const SETTINGS_GFCI_TEST_DISABLED = 0x0200;

export interface EvseOptions {
  firmwareVersion: string;
  protocolVersion: string;
  defaultCurrentAmps: number;
  minCurrentAmps?: number;
  maxCurrentAmps?: number;
  serviceLevel?: ServiceLevel;
  gfciSelfTest?: boolean;
  temperatureSimulation?: boolean;
}

export interface EvseTransition {
  from: EvseStateCode;
  to: EvseStateCode;
}

export interface EvseSnapshot {
  state: EvseStateCode;
  stateName: keyof typeof EvseStateCode;
  currentCapacityAmps: number;
  minCurrentAmps: number;
  maxCurrentAmps: number;
  hardwareMaxAmps: number;
  maxCapacityLocked: boolean;
  actualCurrentMilliamps: number;
  voltageMillivolts: number;
  temperatures: Record<TemperatureSensor, number>;
  sensorErrors: Record<TemperatureSensor, boolean>;
  sessionEnergyWh: number;
  sessionElapsedSeconds: number;
  serviceLevel: ServiceLevel;
  firmwareVersion: string;
  protocolVersion: string;
  echoMode: boolean;
  gfciSelfTest: boolean;
  timeLimitMinutes: number;
  energyLimitKwh: number;
  ventilationRequired: boolean;
  sleeping: boolean;
}

export class EvseStateMachine {
  readonly firmwareVersion: string;
  readonly protocolVersion: string;
  readonly session = new SessionClock();

  private state = EvseStateCode.READY;
  private sleeping = false;
  private ventilationRequired = false;

  private readonly minCurrentAmps: number;
  private readonly hardwareMaxAmps: number;
  private maxConfiguredAmps: number;
  private maxCapacityLocked = false;
  private capacityAmps: number;
  private persistedCapacityAmps: number;
  private actualCurrentMilliamps = 0;

  private serviceLevel: ServiceLevel;
  private echoMode = false;
  private gfciSelfTest: boolean;
  private gfciSelfTestFailure = false;
  private readonly temperatureSimulation: boolean;
  private temperatures: Record<TemperatureSensor, number> = {
    ds: AMBIENT_TEMPERATURE,
    mcp: AMBIENT_TEMPERATURE,
  };
  private sensorErrors: Record<TemperatureSensor, boolean> = { ds: false, mcp: false };

  private timeLimitMinutes = 0;
  private energyLimitKwh = 0;

  constructor(options: EvseOptions) {
    this.firmwareVersion = options.firmwareVersion;
    this.protocolVersion = options.protocolVersion;
    this.minCurrentAmps = options.minCurrentAmps ?? HARDWARE_MIN_AMPS;
    this.hardwareMaxAmps = Math.max(this.minCurrentAmps, options.maxCurrentAmps ?? HARDWARE_MAX_AMPS);
    this.maxConfiguredAmps = this.hardwareMaxAmps;
    this.capacityAmps = this.clampCapacity(options.defaultCurrentAmps);
    this.persistedCapacityAmps = this.capacityAmps;
    this.serviceLevel = options.serviceLevel ?? "L2";
    this.gfciSelfTest = options.gfciSelfTest ?? true;
    this.temperatureSimulation = options.temperatureSimulation ?? true;
  }

  getState(): EvseStateCode {
    return this.state;
  }

  /**
   * Re-derive the J1772 state from faults, the ventilation condition, the
   * sleep flag and the EV's plug/request flags, applying entry/exit effects.
   */
  reconcile(ev: EvSimulator, faults: FaultRegistry): EvseTransition | null {
    const from = this.state;
    let to = this.derive(ev, faults);

    if (to === EvseStateCode.CHARGING && from !== EvseStateCode.CHARGING) {
      if (this.gfciSelfTest && this.gfciSelfTestFailure) {
        faults.trigger("gfci_self_test_failed");
        to = EvseStateCode.ERROR;
      } else {
        this.session.reset();
      }
    }

    if (to === EvseStateCode.ERROR) {
      this.sleeping = false;
      ev.cancelChargeRequest();
    } else if (to === EvseStateCode.VENTILATION_REQUIRED) {
      ev.cancelChargeRequest();
    }

    if (to !== EvseStateCode.CHARGING) {
      this.actualCurrentMilliamps = 0;
      ev.idle();
    }

    this.state = to;
    return from === to ? null : { from, to };
  }

  private derive(ev: EvSimulator, faults: FaultRegistry): EvseStateCode {
    if (faults.hasActive()) return EvseStateCode.ERROR;
    if (this.ventilationRequired && ev.isConnected()) return EvseStateCode.VENTILATION_REQUIRED;
    if (this.sleeping) return EvseStateCode.SLEEP;
    if (!ev.isConnected()) return EvseStateCode.READY;
    if (ev.isChargeRequested()) return EvseStateCode.CHARGING;
    return EvseStateCode.CONNECTED;
  }

  // Current capacity

  private clampCapacity(amps: number): number {
    const allowedMax = Math.min(this.maxConfiguredAmps, this.hardwareMaxAmps);
    return Math.max(this.minCurrentAmps, Math.min(allowedMax, amps));
  }

  /** Clamps into [min, configured max]; returns the value applied. */
  setCurrentCapacity(amps: number, persist: boolean): number {
    this.capacityAmps = this.clampCapacity(amps);
    if (persist) this.persistedCapacityAmps = this.capacityAmps;
    return this.capacityAmps;
  }

  /** One-shot: returns null once the configured max has been locked. */
  setMaxCapacity(amps: number): number | null {
    if (this.maxCapacityLocked) return null;
    this.maxConfiguredAmps = Math.max(this.minCurrentAmps, Math.min(this.hardwareMaxAmps, amps));
    this.maxCapacityLocked = true;
    this.capacityAmps = this.clampCapacity(this.capacityAmps);
    this.persistedCapacityAmps = this.clampCapacity(this.persistedCapacityAmps);
    return this.maxConfiguredAmps;
  }

  getCurrentCapacity(): number {
    return this.capacityAmps;
  }

  getActualCurrentMilliamps(): number {
    return this.actualCurrentMilliamps;
  }

  // Settings

  setServiceLevel(level: ServiceLevel) {
    this.serviceLevel = level;
  }

  getServiceLevel(): ServiceLevel {
    return this.serviceLevel;
  }

  getVoltageMillivolts(): number {
    return this.serviceLevel === "L1" ? 120000 : 240000;
  }

  setEchoMode(enabled: boolean) {
    this.echoMode = enabled;
  }

  isEchoMode(): boolean {
    return this.echoMode;
  }

  setGfciSelfTest(enabled: boolean) {
    this.gfciSelfTest = enabled;
  }

  setGfciSelfTestFailure(failing: boolean) {
    this.gfciSelfTestFailure = failing;
  }

  setVentilationRequired(required: boolean) {
    this.ventilationRequired = required;
  }

  setTimeLimit(minutes: number) {
    this.timeLimitMinutes = minutes;
  }

  getTimeLimit(): number {
    return this.timeLimitMinutes;
  }

  setEnergyLimit(kwh: number) {
    this.energyLimitKwh = kwh;
  }

  getEnergyLimit(): number {
    return this.energyLimitKwh;
  }

  getSettingsFlags(): number {
    let flags = 0;
    if (this.serviceLevel === "L2") flags |= SETTINGS_L2;
    if (this.serviceLevel !== "Auto") flags |= SETTINGS_AUTO_SVC_LEVEL_DISABLED;
    if (!this.gfciSelfTest) flags |= SETTINGS_GFCI_TEST_DISABLED;
    return flags;
  }

  // Sleep / enable / reset

  /** $FE: leave sleep. Refused while any fault is latched. */
  enable(faults: FaultRegistry): boolean {
    if (faults.hasActive()) return false;
    this.sleeping = false;
    return true;
  }

  /** $FD: enter sleep unless faulted. */
  disable(faults: FaultRegistry) {
    if (faults.hasActive()) return;
    this.sleeping = true;
  }

  /** $FR: back to power-on defaults. Fault counters and persisted settings survive. */
  reset(ev: EvSimulator, faults: FaultRegistry) {
    this.capacityAmps = this.persistedCapacityAmps;
    this.echoMode = false;
    this.sleeping = false;
    this.ventilationRequired = false;
    this.timeLimitMinutes = 0;
    this.energyLimitKwh = 0;
    this.actualCurrentMilliamps = 0;
    this.session.reset();
    faults.clearAll();
    ev.resetCharging();
  }

  // Simulation

  /** Account one CHARGING tick: telemetry, session totals and limits. */
  applyDraw(draw: EvDraw, deltaSeconds: number, ev: EvSimulator) {
    this.actualCurrentMilliamps = Math.round(draw.currentAmps * 1000);
    this.session.advance(deltaSeconds, draw.energyWh);

    const timeUp =
      this.timeLimitMinutes > 0 && this.session.getElapsedSeconds() >= this.timeLimitMinutes * 60;
    const energyUp =
      this.energyLimitKwh > 0 && this.session.getEnergyWh() >= this.energyLimitKwh * 1000;
    if (timeUp || energyUp) {
      ev.cancelChargeRequest();
    }
  }

  updateTemperatures(deltaSeconds: number, faults: FaultRegistry) {
    if (this.temperatureSimulation && deltaSeconds > 0) {
      const target =
        this.state === EvseStateCode.CHARGING
          ? AMBIENT_TEMPERATURE + (this.actualCurrentMilliamps / 1000) * HEAT_PER_AMP
          : AMBIENT_TEMPERATURE;
      const k = 1 - Math.exp(-deltaSeconds / THERMAL_TIME_CONSTANT_SEC);
      this.temperatures.ds += (target - this.temperatures.ds) * k;
      this.temperatures.mcp += (target - this.temperatures.mcp) * k;
    }

    // Latched: dropping below the threshold again does not clear it
    const overheated = (["ds", "mcp"] as const).some(
      (sensor) => !this.sensorErrors[sensor] && this.temperatures[sensor] > OVER_TEMPERATURE_THRESHOLD
    );
    if (overheated && !faults.isActive("over_temperature")) {
      faults.trigger("over_temperature");
    }
  }

  setTemperature(sensor: TemperatureSensor, tenthsCelsius: number) {
    this.temperatures[sensor] = tenthsCelsius;
  }

  getTemperature(sensor: TemperatureSensor): number {
    return Math.round(this.temperatures[sensor]);
  }

  setSensorError(sensor: TemperatureSensor, failed: boolean) {
    this.sensorErrors[sensor] = failed;
  }

  hasSensorError(sensor: TemperatureSensor): boolean {
    return this.sensorErrors[sensor];
  }

  snapshot(): EvseSnapshot {
    return {
      state: this.state,
      stateName: stateName(this.state),
      currentCapacityAmps: this.capacityAmps,
      minCurrentAmps: this.minCurrentAmps,
      maxCurrentAmps: this.maxConfiguredAmps,
      hardwareMaxAmps: this.hardwareMaxAmps,
      maxCapacityLocked: this.maxCapacityLocked,
      actualCurrentMilliamps: this.actualCurrentMilliamps,
      voltageMillivolts: this.getVoltageMillivolts(),
      temperatures: { ds: this.getTemperature("ds"), mcp: this.getTemperature("mcp") },
      sensorErrors: { ...this.sensorErrors },
      sessionEnergyWh: Math.round(this.session.getEnergyWh()),
      sessionElapsedSeconds: this.session.getElapsedSeconds(),
      serviceLevel: this.serviceLevel,
      firmwareVersion: this.firmwareVersion,
      protocolVersion: this.protocolVersion,
      echoMode: this.echoMode,
      gfciSelfTest: this.gfciSelfTest,
      timeLimitMinutes: this.timeLimitMinutes,
      energyLimitKwh: this.energyLimitKwh,
      ventilationRequired: this.ventilationRequired,
      sleeping: this.sleeping,
    };
  }
}
