import { describe, expect, it } from "vitest";
import { createTestEmulator, rapi } from "../../__tests__/helpers";
import { EvseStateCode } from "../../types";

describe("RAPI commands", () => {
  describe("SC", () => {
    it("clamps values above the maximum and below the minimum", () => {
      const emulator = createTestEmulator();

      expect(rapi(emulator, "$SC 9999")).toBe("$OK\r");
      expect(rapi(emulator, "$GC")).toBe("$OK 80\r");

      expect(rapi(emulator, "$SC 1")).toBe("$OK\r");
      expect(rapi(emulator, "$GC")).toBe("$OK 6\r");
    });

    it("sets the configured maximum only once", () => {
      const emulator = createTestEmulator();

      expect(rapi(emulator, "$SC 40 M")).toBe("$OK\r");
      expect(rapi(emulator, "$GC")).toBe("$OK 32\r");
      expect(rapi(emulator, "$SC 50")).toBe("$OK\r");
      expect(rapi(emulator, "$GC")).toBe("$OK 40\r");

      expect(rapi(emulator, "$SC 60 M")).toBe("$NK\r");
      expect(emulator.getSnapshot().evse.maxCurrentAmps).toBe(40);
    });

    it("lowers the capacity when the new maximum is below it", () => {
      const emulator = createTestEmulator();
      expect(rapi(emulator, "$SC 16 m")).toBe("$OK\r");
      expect(rapi(emulator, "$GC")).toBe("$OK 16\r");
    });
  });

  describe("SL", () => {
    it("switches voltage with the service level", () => {
      const emulator = createTestEmulator();

      expect(rapi(emulator, "$SL 1")).toBe("$OK\r");
      expect(rapi(emulator, "$GG")).toBe("$OK 0 120000 1 0\r");

      expect(rapi(emulator, "$SL a")).toBe("$OK\r");
      expect(emulator.getSnapshot().evse.serviceLevel).toBe("Auto");
      expect(rapi(emulator, "$GG")).toBe("$OK 0 240000 1 0\r");
    });
  });

  describe("GE", () => {
    it("reports capacity and settings flags", () => {
      const emulator = createTestEmulator();
      expect(rapi(emulator, "$GE")).toBe("$OK 32 0021\r");

      rapi(emulator, "$SL A");
      expect(rapi(emulator, "$GE")).toBe("$OK 32 0000\r");

      rapi(emulator, "$F0");
      rapi(emulator, "$SL 1");
      expect(rapi(emulator, "$GE")).toBe("$OK 32 0220\r");

      rapi(emulator, "$F1");
      expect(rapi(emulator, "$GE")).toBe("$OK 32 0020\r");
    });
  });

  describe("GF", () => {
    it("reports gfci, no-ground and stuck-relay counters", () => {
      const emulator = createTestEmulator();
      emulator.triggerFault("gfci");
      emulator.clearFault("gfci");
      emulator.triggerFault("gfci");
      emulator.triggerFault("no_ground");
      emulator.triggerFault("over_temperature");

      expect(rapi(emulator, "$GF")).toBe("$OK 2 1 0\r");
    });

    it("counts a second trip while the first is still latched", () => {
      const emulator = createTestEmulator();
      emulator.triggerFault("gfci");
      emulator.triggerFault("gfci");

      expect(rapi(emulator, "$GF")).toBe("$OK 2 0 0\r");
    });
  });

  describe("GP", () => {
    it("reports both sensors and their error flags", () => {
      const emulator = createTestEmulator();
      expect(rapi(emulator, "$GP")).toBe("$OK 250 250 0 0\r");

      emulator.setSensorError("mcp", true);
      emulator.setTemperatures({ ds: 312 });
      expect(rapi(emulator, "$GP")).toBe("$OK 312 250 0 1\r");
    });
  });

  describe("limits", () => {
    it("stores time and energy limits", () => {
      const emulator = createTestEmulator();
      expect(rapi(emulator, "$GT")).toBe("$OK 0\r");
      expect(rapi(emulator, "$GH")).toBe("$OK 0\r");

      expect(rapi(emulator, "$ST 90")).toBe("$OK\r");
      expect(rapi(emulator, "$SH 5")).toBe("$OK\r");

      expect(rapi(emulator, "$GT")).toBe("$OK 90\r");
      expect(rapi(emulator, "$GH")).toBe("$OK 5\r");
    });

    it("clears limits on reset", () => {
      const emulator = createTestEmulator();
      rapi(emulator, "$ST 90");

      rapi(emulator, "$FR");

      expect(rapi(emulator, "$GT")).toBe("$OK 0\r");
    });
  });

  describe("notifications", () => {
    it("formats the boot notification", () => {
      const emulator = createTestEmulator();
      expect(emulator.bootNotification()).toBe("$AB 00 8.2.1^1C\r");
    });

    it("formats state notifications with pilot and vehicle flags", () => {
      const emulator = createTestEmulator();
      expect(emulator.stateNotification()).toBe("$AT 01 01 32 0000^30\r");

      emulator.connectEv();
      expect(emulator.stateNotification()).toBe("$AT 02 02 32 0100^31\r");

      emulator.requestCharge();
      expect(emulator.stateNotification()).toBe("$AT 03 03 32 0140^35\r");
    });

    it("reports the state it is given rather than the current one", () => {
      const emulator = createTestEmulator();
      emulator.connectEv();
      emulator.requestCharge();

      expect(emulator.stateNotification(EvseStateCode.CONNECTED)).toBe("$AT 02 03 32 0100^30\r");
    });
  });
});
