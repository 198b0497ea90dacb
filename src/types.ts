// J1772 states as reported by $GS / $GG (decimal) and $AT (hex)
export enum EvseStateCode {
  READY = 0x01,
  CONNECTED = 0x02,
  CHARGING = 0x03,
  VENTILATION_REQUIRED = 0x04,
  SLEEP = 0xfd,
  ERROR = 0xfe,
}

export const FAULT_NAMES = [
  "gfci",
  "stuck_relay",
  "no_ground",
  "diode_check",
  "over_temperature",
  "gfci_self_test_failed",
] as const;

export type FaultName = (typeof FAULT_NAMES)[number];

export const FAULT_BITS: Record<FaultName, number> = {
  gfci: 0x01,
  stuck_relay: 0x02,
  no_ground: 0x04,
  diode_check: 0x08,
  over_temperature: 0x10,
  gfci_self_test_failed: 0x20,
};

export type ServiceLevel = "L1" | "L2" | "Auto";

export const EV_ERROR_MODES = [
  "diode_check_failure",
  "invalid_pilot",
  "comm_timeout",
] as const;

export type EvErrorMode = (typeof EV_ERROR_MODES)[number];

export type TemperatureSensor = "ds" | "mcp";

export function stateName(code: EvseStateCode): keyof typeof EvseStateCode {
  switch (code) {
    case EvseStateCode.READY:
      return "READY";
    case EvseStateCode.CONNECTED:
      return "CONNECTED";
    case EvseStateCode.CHARGING:
      return "CHARGING";
    case EvseStateCode.VENTILATION_REQUIRED:
      return "VENTILATION_REQUIRED";
    case EvseStateCode.SLEEP:
      return "SLEEP";
    case EvseStateCode.ERROR:
      return "ERROR";
  }
}
