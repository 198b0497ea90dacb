import { describe, expect, it } from "vitest";
import { FaultRegistry } from "../faultRegistry";

describe("FaultRegistry", () => {
  it("latches a fault and counts a repeat trip while latched", () => {
    const faults = new FaultRegistry();

    expect(faults.trigger("gfci")).toBe(true);
    expect(faults.trigger("gfci")).toBe(false);

    expect(faults.isActive("gfci")).toBe(true);
    expect(faults.activeFaults()).toEqual(["gfci"]);
    expect(faults.getCount("gfci")).toBe(2);
  });

  it("keeps counters when flags are cleared", () => {
    const faults = new FaultRegistry();
    faults.trigger("no_ground");
    faults.clear("no_ground");
    faults.trigger("no_ground");

    expect(faults.clearAll()).toEqual(["no_ground"]);
    expect(faults.hasActive()).toBe(false);
    expect(faults.getCount("no_ground")).toBe(2);
  });

  it("reports active faults in a stable order with their bits", () => {
    const faults = new FaultRegistry();
    faults.trigger("over_temperature");
    faults.trigger("gfci");

    expect(faults.snapshot()).toEqual({
      active: ["gfci", "over_temperature"],
      flags: 0x11,
      counters: {
        gfci: 1,
        stuck_relay: 0,
        no_ground: 0,
        diode_check: 0,
        over_temperature: 1,
        gfci_self_test_failed: 0,
      },
    });
  });

  it("returns false when clearing an inactive fault", () => {
    const faults = new FaultRegistry();
    expect(faults.clear("stuck_relay")).toBe(false);
  });
});
