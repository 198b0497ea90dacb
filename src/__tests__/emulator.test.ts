import { describe, expect, it, vi } from "vitest";
import type { EmulatorEvent } from "../emulator";
import { EvseStateCode } from "../types";
import { createTestEmulator, rapi } from "./helpers";

describe("Emulator", () => {
  describe("charging states", () => {
    it("walks through READY, CONNECTED and CHARGING", () => {
      const emulator = createTestEmulator();
      expect(rapi(emulator, "$GS")).toBe("$OK 1 0\r");

      emulator.connectEv();
      expect(rapi(emulator, "$GS")).toBe("$OK 2 0\r");

      expect(emulator.requestCharge()).toBe(true);
      emulator.tick(10);
      expect(rapi(emulator, "$GS")).toBe("$OK 3 10\r");
      expect(rapi(emulator, "$GG")).toBe("$OK 30000 240000 3 0\r");
    });

    it("freezes the session on disconnect and resets it on the next charge", () => {
      const emulator = createTestEmulator();
      emulator.connectEv();
      emulator.requestCharge();
      emulator.tick(10);

      emulator.disconnectEv();
      emulator.tick(10);
      expect(rapi(emulator, "$GS")).toBe("$OK 1 10\r");
      expect(rapi(emulator, "$GG")).toBe("$OK 0 240000 1 0\r");

      emulator.connectEv();
      emulator.requestCharge();
      expect(rapi(emulator, "$GS")).toBe("$OK 3 0\r");
      expect(rapi(emulator, "$GU")).toBe("$OK 0 0\r");
    });

    it("stops charging when the battery fills up", () => {
      const emulator = createTestEmulator();
      emulator.connectEv();
      expect(rapi(emulator, "$GS")).toBe("$OK 2 0\r");

      emulator.requestCharge();
      emulator.tick(5);
      expect(rapi(emulator, "$GS")).toBe("$OK 3 5\r");

      emulator.setSoc(99.9);
      emulator.tick(60);

      const { ev } = emulator.getSnapshot();
      expect(ev.socPercent).toBe(100);
      expect(ev.chargeRequested).toBe(false);
      expect(rapi(emulator, "$GS")).toBe("$OK 2 65\r");
    });

    it("keeps charging with no current on an EV comm timeout", () => {
      const emulator = createTestEmulator();
      emulator.connectEv();
      emulator.requestCharge();
      emulator.setEvErrorMode("comm_timeout");
      emulator.tick(10);

      expect(rapi(emulator, "$GS")).toBe("$OK 3 10\r");
      expect(rapi(emulator, "$GG")).toBe("$OK 0 240000 3 0\r");
    });

    it("ends the session at the time limit", () => {
      const emulator = createTestEmulator();
      expect(rapi(emulator, "$ST 1")).toBe("$OK\r");
      emulator.connectEv();
      emulator.requestCharge();

      emulator.tick(30);
      expect(emulator.getState()).toBe(EvseStateCode.CHARGING);

      emulator.tick(30);
      expect(rapi(emulator, "$GS")).toBe("$OK 2 60\r");
    });

    it("ends the session at the energy limit", () => {
      const emulator = createTestEmulator();
      expect(rapi(emulator, "$SH 1")).toBe("$OK\r");
      emulator.connectEv();
      emulator.requestCharge();

      emulator.tick(600);

      expect(emulator.getState()).toBe(EvseStateCode.CONNECTED);
      expect(rapi(emulator, "$GU")).toBe("$OK 1200 4320000\r");
    });
  });

  describe("faults", () => {
    it("forces ERROR and returns to CONNECTED once cleared", () => {
      const emulator = createTestEmulator();
      emulator.connectEv();
      emulator.requestCharge();

      emulator.triggerFault("gfci");
      expect(rapi(emulator, "$GS")).toBe("$OK 254 0\r");
      expect(emulator.getSnapshot().ev.chargeRequested).toBe(false);

      emulator.clearAllFaults();
      expect(rapi(emulator, "$GS")).toBe("$OK 2 0\r");
    });

    it("returns to READY when cleared without an EV", () => {
      const emulator = createTestEmulator();
      emulator.triggerFault("stuck_relay");
      expect(emulator.getState()).toBe(EvseStateCode.ERROR);

      emulator.clearFault("stuck_relay");
      expect(emulator.getState()).toBe(EvseStateCode.READY);
    });

    it("raises a diode check fault from the EV error mode on the next tick", () => {
      const emulator = createTestEmulator();
      emulator.connectEv();
      emulator.setEvErrorMode("diode_check_failure");
      expect(emulator.getState()).toBe(EvseStateCode.CONNECTED);

      emulator.tick(1);

      expect(emulator.getState()).toBe(EvseStateCode.ERROR);
      expect(emulator.getSnapshot().faults.active).toEqual(["diode_check"]);

      emulator.tick(1);
      expect(emulator.getSnapshot().faults.counters.diode_check).toBe(1);
    });

    it("latches over-temperature until cleared", () => {
      const emulator = createTestEmulator();
      emulator.connectEv();
      emulator.setTemperatures({ ds: 700 });
      emulator.tick(1);
      emulator.tick(1);
      expect(emulator.getState()).toBe(EvseStateCode.ERROR);
      expect(emulator.getSnapshot().faults.counters.over_temperature).toBe(1);

      emulator.setTemperatures({ ds: 250 });
      emulator.tick(1);
      expect(emulator.getState()).toBe(EvseStateCode.ERROR);

      emulator.clearFault("over_temperature");
      expect(emulator.getState()).toBe(EvseStateCode.CONNECTED);
    });

    it("ignores a failed sensor for over-temperature", () => {
      const emulator = createTestEmulator();
      emulator.setSensorError("ds", true);
      emulator.setTemperatures({ ds: 900 });
      emulator.tick(1);

      expect(emulator.getState()).toBe(EvseStateCode.READY);
      expect(rapi(emulator, "$GP")).toBe("$OK 900 250 1 0\r");
    });

    it("fails the GFCI self-test when entering CHARGING", () => {
      const emulator = createTestEmulator();
      emulator.setGfciSelfTestFailure(true);
      emulator.connectEv();
      emulator.requestCharge();

      expect(emulator.getState()).toBe(EvseStateCode.ERROR);
      expect(emulator.getSnapshot().faults.counters.gfci_self_test_failed).toBe(1);
    });

    it("skips the GFCI self-test when it is disabled", () => {
      const emulator = createTestEmulator();
      emulator.setGfciSelfTestFailure(true);
      expect(rapi(emulator, "$F0")).toBe("$OK\r");
      emulator.connectEv();
      emulator.requestCharge();

      expect(emulator.getState()).toBe(EvseStateCode.CHARGING);
    });
  });

  describe("sleep and ventilation", () => {
    it("sleeps on FD and resumes charging on FE", () => {
      const emulator = createTestEmulator();
      emulator.connectEv();
      emulator.requestCharge();

      expect(rapi(emulator, "$FD")).toBe("$OK\r");
      expect(rapi(emulator, "$GS")).toBe("$OK 253 0\r");
      emulator.tick(10);
      expect(rapi(emulator, "$GG")).toBe("$OK 0 240000 253 0\r");

      expect(rapi(emulator, "$FE")).toBe("$OK\r");
      expect(rapi(emulator, "$GS")).toBe("$OK 3 0\r");
    });

    it("refuses FE while a fault is active and ignores FD in ERROR", () => {
      const emulator = createTestEmulator();
      emulator.triggerFault("no_ground");

      expect(rapi(emulator, "$FE")).toBe("$NK\r");
      expect(rapi(emulator, "$FD")).toBe("$OK\r");

      emulator.clearAllFaults();
      expect(emulator.getState()).toBe(EvseStateCode.READY);
    });

    it("requires ventilation only with an EV connected", () => {
      const emulator = createTestEmulator();
      emulator.setVentilationRequired(true);
      expect(emulator.getState()).toBe(EvseStateCode.READY);

      emulator.connectEv();
      expect(emulator.getState()).toBe(EvseStateCode.VENTILATION_REQUIRED);
      expect(emulator.requestCharge()).toBe(true);
      expect(emulator.getState()).toBe(EvseStateCode.VENTILATION_REQUIRED);

      emulator.setVentilationRequired(false);
      expect(emulator.getState()).toBe(EvseStateCode.CONNECTED);
    });
  });

  describe("reset", () => {
    it("returns to CONNECTED with a zeroed session", () => {
      const emulator = createTestEmulator();
      emulator.connectEv();
      emulator.requestCharge();
      emulator.tick(30);
      emulator.triggerFault("gfci");

      expect(rapi(emulator, "$FR")).toBe("$OK\r");

      expect(rapi(emulator, "$GS")).toBe("$OK 2 0\r");
      expect(rapi(emulator, "$GF")).toBe("$OK 1 0 0\r");
    });

    it("returns to READY without an EV", () => {
      const emulator = createTestEmulator();
      rapi(emulator, "$FD");

      rapi(emulator, "$FR");

      expect(rapi(emulator, "$GS")).toBe("$OK 1 0\r");
    });

    it("restores the persisted capacity", () => {
      const emulator = createTestEmulator();
      rapi(emulator, "$SC 20");
      rapi(emulator, "$SC 16 V");
      expect(rapi(emulator, "$GC")).toBe("$OK 16\r");

      rapi(emulator, "$FR");

      expect(rapi(emulator, "$GC")).toBe("$OK 20\r");
    });
  });

  describe("temperature model", () => {
    it("heats up while charging", () => {
      const emulator = createTestEmulator({
        evse: {
          firmwareVersion: "8.2.1",
          protocolVersion: "5.0.1",
          defaultCurrentAmps: 32,
          temperatureSimulation: true,
        },
      });
      emulator.connectEv();
      emulator.requestCharge();

      emulator.tick(300);

      expect(rapi(emulator, "$GP")).toBe("$OK 402 402 0 0\r");
    });
  });

  describe("events", () => {
    it("publishes state transitions after each command", () => {
      const emulator = createTestEmulator();
      const events: EmulatorEvent[] = [];
      emulator.onTransition((event) => events.push(event));

      emulator.connectEv();

      expect(events).toEqual([
        { type: "state", from: EvseStateCode.READY, to: EvseStateCode.CONNECTED, at: 1000 },
      ]);
    });

    it("publishes fault events before the state change they cause", () => {
      const emulator = createTestEmulator();
      emulator.connectEv();
      const events: EmulatorEvent[] = [];
      emulator.onTransition((event) => events.push(event));

      emulator.triggerFault("gfci");
      emulator.clearFault("gfci");

      expect(events).toEqual([
        { type: "fault", fault: "gfci", active: true, count: 1, at: 1000 },
        { type: "state", from: EvseStateCode.CONNECTED, to: EvseStateCode.ERROR, at: 1000 },
        { type: "fault", fault: "gfci", active: false, count: 1, at: 1000 },
        { type: "state", from: EvseStateCode.ERROR, to: EvseStateCode.CONNECTED, at: 1000 },
      ]);
    });

    it("stops notifying after unsubscribe", () => {
      const emulator = createTestEmulator();
      const events: EmulatorEvent[] = [];
      const unsubscribe = emulator.onTransition((event) => events.push(event));
      unsubscribe();

      emulator.connectEv();

      expect(events).toEqual([]);
    });

    it("keeps delivering when a listener throws", () => {
      const emulator = createTestEmulator();
      const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
      const events: EmulatorEvent[] = [];
      emulator.onTransition(() => {
        throw new Error("listener failed");
      });
      emulator.onTransition((event) => events.push(event));

      emulator.connectEv();

      expect(events).toHaveLength(1);
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(emulator.getState()).toBe(EvseStateCode.CONNECTED);
      errorSpy.mockRestore();
    });

    it("lets listeners issue commands of their own", () => {
      const emulator = createTestEmulator();
      emulator.onTransition((event) => {
        if (event.type === "state" && event.to === EvseStateCode.CONNECTED) {
          emulator.requestCharge();
        }
      });

      emulator.connectEv();

      expect(emulator.getState()).toBe(EvseStateCode.CHARGING);
    });

    it("streams events through the async iterator", async () => {
      const emulator = createTestEmulator();
      const controller = new AbortController();
      const stream = emulator.transitions(controller.signal);

      const first = stream.next();
      emulator.connectEv();
      expect((await first).value).toEqual({
        type: "state",
        from: EvseStateCode.READY,
        to: EvseStateCode.CONNECTED,
        at: 1000,
      });

      const pending = stream.next();
      controller.abort();
      expect((await pending).done).toBe(true);
    });

    it("drops the oldest buffered events beyond the bound", async () => {
      const emulator = createTestEmulator();
      const controller = new AbortController();
      const stream = emulator.transitions(controller.signal, 2);

      const first = stream.next();
      emulator.connectEv();
      emulator.requestCharge();
      emulator.stopCharge();

      expect((await first).value).toMatchObject({ from: EvseStateCode.CONNECTED, to: EvseStateCode.CHARGING });
      expect((await stream.next()).value).toMatchObject({
        from: EvseStateCode.CHARGING,
        to: EvseStateCode.CONNECTED,
      });
      controller.abort();
      await stream.return(undefined);
    });
  });
});
