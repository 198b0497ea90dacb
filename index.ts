import "dotenv/config";

import { startDashboard } from "./dashboard/server";
import { type AppConfig, ConfigError, loadConfig } from "./src/config";
import { Emulator } from "./src/emulator";
import { SimulationClock } from "./src/simulationClock";
import { createTransport } from "./src/transport/createTransport";
import { SerialBridge } from "./src/transport/serialBridge";
import { stateName } from "./src/types";

(async () => {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[CONFIG] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const emulator = new Emulator({
    evse: {
      ...config.evse,
      temperatureSimulation: config.simulation.temperature,
    },
    ev: {
      ...config.ev,
      realisticChargeCurve: config.simulation.realisticChargeCurve,
    },
    rapi: { appendChecksum: config.rapi.appendChecksum },
  });

  emulator.onTransition((event) => {
    if (event.type === "state") {
      console.log(`[EVSE] ${stateName(event.from)} -> ${stateName(event.to)}`);
    } else {
      console.log(`[EVSE] Fault ${event.fault} ${event.active ? "raised" : "cleared"}`);
    }
  });

  const clock = new SimulationClock(emulator, { intervalMs: config.simulation.updateIntervalMs });
  const transport = createTransport(config.serial);
  const bridge = new SerialBridge(emulator, transport, {
    reconnectTimeoutMs: config.serial.reconnectTimeoutMs,
    reconnectBackoffMs: config.serial.reconnectBackoffMs,
    asyncNotifications: config.rapi.asyncNotifications,
  });

  await transport.start();
  clock.start();
  const dashboard = startDashboard(emulator, config.web);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`Received ${signal}, shutting down...`);
    clock.stop();
    await bridge.stop();
    await dashboard.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      });
    });
  }

  try {
    await bridge.run();
  } catch (err) {
    console.error("[SERIAL] Serial bridge stopped:", err instanceof Error ? err.message : err);
    clock.stop();
    await dashboard.close();
    process.exit(1);
  }
})().catch((err: unknown) => {
  console.error("Fatal:", err);
  process.exit(1);
});
