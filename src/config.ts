import { z } from "zod";

const BooleanEnv = z
  .enum(["true", "false", "1", "0", "yes", "no", "on", "off"])
  .transform((value) => ["true", "1", "yes", "on"].includes(value));

const EnvSchema = z.object({
  SERIAL_MODE: z.enum(["pty", "tcp"]).default("pty"),
  SERIAL_TCP_PORT: z.coerce.number().int().min(0).max(65535).default(8023),
  SERIAL_PTY_PATH: z.string().min(1).optional(),
  SERIAL_RECONNECT_TIMEOUT: z.coerce.number().min(0).default(60),
  SERIAL_RECONNECT_BACKOFF: z.coerce.number().int().min(0).default(1000),

  EVSE_FIRMWARE_VERSION: z.string().min(1).default("8.2.1"),
  EVSE_PROTOCOL_VERSION: z.string().min(1).default("5.0.1"),
  EVSE_DEFAULT_CURRENT: z.coerce.number().int().min(6).max(80).default(32),
  EVSE_MAX_CURRENT: z.coerce.number().int().min(6).max(80).default(80),
  EVSE_SERVICE_LEVEL: z.enum(["L1", "L2", "Auto"]).default("L2"),
  EVSE_GFCI_SELF_TEST: BooleanEnv.default("true"),

  EV_BATTERY_CAPACITY_KWH: z.coerce.number().positive().default(75),
  EV_MAX_CHARGE_RATE_KW: z.coerce.number().positive().default(7.2),

  SIMULATION_UPDATE_INTERVAL_MS: z.coerce.number().int().min(10).default(1000),
  SIMULATION_TEMPERATURE: BooleanEnv.default("true"),
  SIMULATION_REALISTIC_CHARGE_CURVE: BooleanEnv.default("true"),

  RAPI_CHECKSUM: BooleanEnv.default("false"),
  RAPI_ASYNC_NOTIFICATIONS: BooleanEnv.default("true"),

  WEB_HOST: z.string().min(1).default("0.0.0.0"),
  WEB_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
});

export interface SerialConfig {
  mode: "pty" | "tcp";
  tcpPort: number;
  ptyPath?: string;
  reconnectTimeoutMs: number;
  reconnectBackoffMs: number;
}

export interface AppConfig {
  serial: SerialConfig;
  evse: {
    firmwareVersion: string;
    protocolVersion: string;
    defaultCurrentAmps: number;
    maxCurrentAmps: number;
    serviceLevel: "L1" | "L2" | "Auto";
    gfciSelfTest: boolean;
  };
  ev: {
    batteryCapacityKwh: number;
    maxChargeRateKw: number;
  };
  simulation: {
    updateIntervalMs: number;
    temperature: boolean;
    realisticChargeCurve: boolean;
  };
  rapi: {
    appendChecksum: boolean;
    asyncNotifications: boolean;
  };
  web: {
    host: string;
    port: number;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

// Unset and empty variables both fall back to the default
function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") result[key] = value.trim();
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutEmpty(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const vars = parsed.data;

  return {
    serial: {
      mode: vars.SERIAL_MODE,
      tcpPort: vars.SERIAL_TCP_PORT,
      ptyPath: vars.SERIAL_PTY_PATH,
      reconnectTimeoutMs: vars.SERIAL_RECONNECT_TIMEOUT * 1000,
      reconnectBackoffMs: vars.SERIAL_RECONNECT_BACKOFF,
    },
    evse: {
      firmwareVersion: vars.EVSE_FIRMWARE_VERSION,
      protocolVersion: vars.EVSE_PROTOCOL_VERSION,
      defaultCurrentAmps: vars.EVSE_DEFAULT_CURRENT,
      maxCurrentAmps: vars.EVSE_MAX_CURRENT,
      serviceLevel: vars.EVSE_SERVICE_LEVEL,
      gfciSelfTest: vars.EVSE_GFCI_SELF_TEST,
    },
    ev: {
      batteryCapacityKwh: vars.EV_BATTERY_CAPACITY_KWH,
      maxChargeRateKw: vars.EV_MAX_CHARGE_RATE_KW,
    },
    simulation: {
      updateIntervalMs: vars.SIMULATION_UPDATE_INTERVAL_MS,
      temperature: vars.SIMULATION_TEMPERATURE,
      realisticChargeCurve: vars.SIMULATION_REALISTIC_CHARGE_CURVE,
    },
    rapi: {
      appendChecksum: vars.RAPI_CHECKSUM,
      asyncNotifications: vars.RAPI_ASYNC_NOTIFICATIONS,
    },
    web: {
      host: vars.WEB_HOST,
      port: vars.WEB_PORT,
    },
  };
}
