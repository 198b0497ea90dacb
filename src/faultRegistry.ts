import { FAULT_BITS, FAULT_NAMES, type FaultName } from "./types";

export interface FaultSnapshot {
  active: FaultName[];
  flags: number;
  counters: Record<FaultName, number>;
}

function zeroCounters(): Record<FaultName, number> {
  return {
    gfci: 0,
    stuck_relay: 0,
    no_ground: 0,
    diode_check: 0,
    over_temperature: 0,
    gfci_self_test_failed: 0,
  };
}

/**
 * Latched fault flags with lifetime trip counters.
 *
 * A flag only goes away through clear()/clearAll(); counters only grow,
 * including on a repeat trip while the flag is still latched.
 * The owning emulator re-evaluates the EVSE state after any change.
 */
export class FaultRegistry {
  private active = new Set<FaultName>();
  private counters = zeroCounters();

  /** Counts every trip. Returns false when the fault was already latched. */
  trigger(fault: FaultName): boolean {
    this.counters[fault] += 1;
    if (this.active.has(fault)) return false;
    this.active.add(fault);
    return true;
  }

  clear(fault: FaultName): boolean {
    return this.active.delete(fault);
  }

  clearAll(): FaultName[] {
    const cleared = this.activeFaults();
    this.active.clear();
    return cleared;
  }

  isActive(fault: FaultName): boolean {
    return this.active.has(fault);
  }

  hasActive(): boolean {
    return this.active.size > 0;
  }

  activeFaults(): FaultName[] {
    return FAULT_NAMES.filter((fault) => this.active.has(fault));
  }

  getFlags(): number {
    let flags = 0;
    for (const fault of this.active) {
      flags |= FAULT_BITS[fault];
    }
    return flags;
  }

  getCount(fault: FaultName): number {
    return this.counters[fault];
  }

  snapshot(): FaultSnapshot {
    return {
      active: this.activeFaults(),
      flags: this.getFlags(),
      counters: { ...this.counters },
    };
  }
}
