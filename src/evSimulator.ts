import type { EvErrorMode } from "./types";

// Charge curve: full power up to TAPER_START_SOC, then a linear drop
// to (1 - MAX_TAPER) of it at 100%
const TAPER_START_SOC = 80;
const TAPER_RANGE = 20;
const MAX_TAPER = 0.3;

const DIRECT_VARIANCE = 0.01; // +/- 1%
const BATTERY_VARIANCE = 0.01; // -1% only
const DIRECT_OVERDRAW_FACTOR = 1.1;

export interface EvOptions {
  batteryCapacityKwh: number;
  maxChargeRateKw: number;
  initialSocPercent?: number;
  realisticChargeCurve?: boolean;
  random?: () => number;
}

export interface EvDraw {
  currentAmps: number;
  powerKw: number;
  energyWh: number;
}

export interface EvSnapshot {
  connected: boolean;
  chargeRequested: boolean;
  socPercent: number;
  directMode: boolean;
  directCurrentAmps: number;
  batteryCapacityKwh: number;
  maxChargeRateKw: number;
  currentVarianceEnabled: boolean;
  errorMode: EvErrorMode | null;
  actualChargeRateKw: number;
  pilotState: "A" | "B" | "C";
}

const NO_DRAW: EvDraw = { currentAmps: 0, powerKw: 0, energyWh: 0 };

export class EvSimulator {
  private connected = false;
  private chargeRequested = false;
  private soc: number; // percent, 0-100
  private directMode = false;
  private directCurrentAmps = 0;
  private batteryCapacityKwh: number;
  private maxChargeRateKw: number;
  private varianceEnabled = false;
  private errorMode: EvErrorMode | null = null;
  private actualChargeRateKw = 0;
  private readonly realisticChargeCurve: boolean;
  private readonly random: () => number;

  constructor(options: EvOptions) {
    this.batteryCapacityKwh = options.batteryCapacityKwh;
    this.maxChargeRateKw = options.maxChargeRateKw;
    this.soc = clampSoc(options.initialSocPercent ?? 50);
    this.realisticChargeCurve = options.realisticChargeCurve ?? true;
    this.random = options.random ?? Math.random;
  }

  isConnected(): boolean {
    return this.connected;
  }

  isChargeRequested(): boolean {
    return this.chargeRequested;
  }

  getSocPercent(): number {
    return this.soc;
  }

  getErrorMode(): EvErrorMode | null {
    return this.errorMode;
  }

  isDirectMode(): boolean {
    return this.directMode;
  }

  connect() {
    this.connected = true;
  }

  disconnect() {
    this.connected = false;
    this.chargeRequested = false;
    this.actualChargeRateKw = 0;
  }

  /**
   * Raise or drop the EV's charge request. Raising fails while unplugged,
   * with an invalid pilot, or (in battery mode) with a full battery.
   */
  requestCharge(requested: boolean): boolean {
    if (!requested) {
      this.cancelChargeRequest();
      return true;
    }
    if (!this.connected || this.errorMode === "invalid_pilot") return false;
    if (!this.directMode && this.soc >= 100) return false;
    this.chargeRequested = true;
    return true;
  }

  cancelChargeRequest() {
    this.chargeRequested = false;
    this.actualChargeRateKw = 0;
  }

  setSoc(percent: number) {
    this.soc = clampSoc(percent);
  }

  setDirectMode(enabled: boolean, currentAmps?: number) {
    this.directMode = enabled;
    if (currentAmps !== undefined) this.setDirectCurrent(currentAmps);
  }

  setDirectCurrent(amps: number) {
    this.directCurrentAmps = Math.max(0, amps);
  }

  setCurrentVariance(enabled: boolean) {
    this.varianceEnabled = enabled;
  }

  setErrorMode(mode: EvErrorMode | null) {
    this.errorMode = mode;
    if (mode === "invalid_pilot") this.cancelChargeRequest();
  }

  setBatteryCapacity(kwh: number) {
    this.batteryCapacityKwh = kwh;
  }

  setMaxChargeRate(kw: number) {
    this.maxChargeRateKw = kw;
  }

  /** Clears the charging-related fields only; SoC, plug and modes are kept. */
  resetCharging() {
    this.chargeRequested = false;
    this.actualChargeRateKw = 0;
  }

  idle() {
    this.actualChargeRateKw = 0;
  }

  pilotState(): "A" | "B" | "C" {
    if (!this.connected) return "A";
    return this.chargeRequested ? "C" : "B";
  }

  /**
   * Draw power from the EVSE for one tick.
   *
   * @param offeredAmps - current capacity advertised by the EVSE
   * @param voltage - supply voltage in volts
   * @param deltaSeconds - tick length
   */
  draw(offeredAmps: number, voltage: number, deltaSeconds: number): EvDraw {
    if (!this.connected || !this.chargeRequested || voltage <= 0) {
      this.actualChargeRateKw = 0;
      return NO_DRAW;
    }

    if (this.errorMode === "comm_timeout") {
      this.actualChargeRateKw = 0;
      return NO_DRAW;
    }

    if (this.directMode) {
      let amps = Math.min(this.directCurrentAmps, offeredAmps * DIRECT_OVERDRAW_FACTOR);
      if (this.varianceEnabled) {
        amps *= 1 + (this.random() * 2 - 1) * DIRECT_VARIANCE;
      }
      const powerKw = (amps * voltage) / 1000;
      this.actualChargeRateKw = powerKw;
      return { currentAmps: amps, powerKw, energyWh: (powerKw * deltaSeconds * 1000) / 3600 };
    }

    if (this.soc >= 100) {
      this.cancelChargeRequest();
      return NO_DRAW;
    }

    const offeredKw = (offeredAmps * voltage) / 1000;
    let powerKw = Math.min(offeredKw, this.maxChargeRateKw) * this.taperFactor();
    if (this.varianceEnabled) {
      powerKw *= 1 - this.random() * BATTERY_VARIANCE;
    }

    const energyKwh = (powerKw * deltaSeconds) / 3600;
    this.soc = Math.min(100, this.soc + (energyKwh / this.batteryCapacityKwh) * 100);
    this.actualChargeRateKw = powerKw;

    const result: EvDraw = {
      currentAmps: (powerKw * 1000) / voltage,
      powerKw,
      energyWh: energyKwh * 1000,
    };

    if (this.soc >= 100) {
      this.cancelChargeRequest();
    }

    return result;
  }

  taperFactor(): number {
    if (!this.realisticChargeCurve || this.soc <= TAPER_START_SOC) return 1;
    const progress = Math.min(1, (this.soc - TAPER_START_SOC) / TAPER_RANGE);
    return 1 - progress * MAX_TAPER;
  }

  snapshot(): EvSnapshot {
    return {
      connected: this.connected,
      chargeRequested: this.chargeRequested,
      socPercent: Math.round(this.soc * 10) / 10,
      directMode: this.directMode,
      directCurrentAmps: Math.round(this.directCurrentAmps * 10) / 10,
      batteryCapacityKwh: this.batteryCapacityKwh,
      maxChargeRateKw: this.maxChargeRateKw,
      currentVarianceEnabled: this.varianceEnabled,
      errorMode: this.errorMode,
      actualChargeRateKw: Math.round(this.actualChargeRateKw * 100) / 100,
      pilotState: this.pilotState(),
    };
  }
}

function clampSoc(percent: number): number {
  return Math.max(0, Math.min(100, percent));
}
