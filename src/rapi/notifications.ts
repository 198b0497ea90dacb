import { EvseStateCode } from "../types";
import { appendChecksum, toHex } from "./checksum";
import type { RapiTarget } from "./rapiCommand";

const PILOT_CODES = { A: 0x01, B: 0x02, C: 0x03 } as const;

const VFLAG_CHARGING = 0x0040;
const VFLAG_EV_CONNECTED = 0x0100;

/** `$AB 00 <fw>`: sent once when a client channel opens. */
export function bootNotification(firmwareVersion: string): string {
  return `${appendChecksum(`$AB 00 ${firmwareVersion}`)}\r`;
}

/**
 * `$AT <state> <pilot> <capacity> <vflags>`: sent after each state transition.
 * `state` defaults to the current one; pass a transition's target to report it.
 */
export function stateNotification(
  { evse, ev, faults }: RapiTarget,
  state: EvseStateCode = evse.getState(),
): string {
  let vflags = faults.getFlags();
  if (state === EvseStateCode.CONNECTED || state === EvseStateCode.CHARGING) {
    vflags |= VFLAG_EV_CONNECTED;
  }
  if (state === EvseStateCode.CHARGING) {
    vflags |= VFLAG_CHARGING;
  }

  const text = [
    "$AT",
    toHex(state, 2),
    toHex(PILOT_CODES[ev.pilotState()], 2),
    evse.getCurrentCapacity(),
    toHex(vflags, 4),
  ].join(" ");
  return `${appendChecksum(text)}\r`;
}
