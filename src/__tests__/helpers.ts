import { Emulator, type EmulatorOptions } from "../emulator";

export const FIRMWARE_VERSION = "8.2.1";
export const PROTOCOL_VERSION = "5.0.1";

export function createTestEmulator(overrides: Partial<EmulatorOptions> = {}): Emulator {
  return new Emulator({
    evse: {
      firmwareVersion: FIRMWARE_VERSION,
      protocolVersion: PROTOCOL_VERSION,
      defaultCurrentAmps: 32,
      temperatureSimulation: false,
      ...overrides.evse,
    },
    ev: {
      batteryCapacityKwh: 75,
      maxChargeRateKw: 7.2,
      initialSocPercent: 50,
      random: () => 0.5,
      ...overrides.ev,
    },
    rapi: overrides.rapi,
    now: overrides.now ?? (() => 1000),
  });
}

/** Response of one RAPI line, terminator included. */
export function rapi(emulator: Emulator, line: string): string {
  return emulator.execute(line).response;
}
