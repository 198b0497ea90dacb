import { type Context, Hono } from "hono";
import { cors } from "hono/cors";
import { z } from "zod";
import type { Emulator } from "../src/emulator";
import { EV_ERROR_MODES, FAULT_NAMES, type FaultName } from "../src/types";

const RapiBodySchema = z.object({ command: z.string().min(1) });
const EnabledBodySchema = z.object({ enabled: z.boolean() });
const ChargeBodySchema = z.object({ requested: z.boolean() });
const SocBodySchema = z.object({ soc: z.number().min(0).max(100) });
const DirectModeBodySchema = z.object({
  enabled: z.boolean(),
  currentAmps: z.number().min(0).optional(),
});
const DirectCurrentBodySchema = z.object({ currentAmps: z.number().min(0) });
const ErrorModeBodySchema = z.object({ mode: z.enum(EV_ERROR_MODES).nullable() });
const BatteryBodySchema = z.object({
  capacityKwh: z.number().positive().optional(),
  maxChargeRateKw: z.number().positive().optional(),
});
const VentilationBodySchema = z.object({ required: z.boolean() });
const TemperatureBodySchema = z.object({
  ds: z.number().int().optional(),
  mcp: z.number().int().optional(),
});
const SensorErrorBodySchema = z.object({
  sensor: z.enum(["ds", "mcp"]),
  failed: z.boolean(),
});
const SelfTestFailureBodySchema = z.object({ failing: z.boolean() });
const FaultParamSchema = z.enum(FAULT_NAMES);

type BodyResult<T> = { ok: true; data: T } | { ok: false; error: string };

async function readBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
): Promise<BodyResult<z.infer<T>>> {
  const body: unknown = await c.req.json().catch(() => undefined);
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const error = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    return { ok: false, error };
  }
  return { ok: true, data: parsed.data };
}

function parseFault(value: string): FaultName | null {
  const parsed = FaultParamSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/** REST surface over the emulator. No protocol logic lives here. */
export function createDashboardApp(emulator: Emulator): Hono {
  const app = new Hono();

  app.use("/*", cors());

  const api = new Hono();

  api.get("/status", (c) => c.json(emulator.getSnapshot()));

  // Runs a RAPI line through the same engine the serial port uses
  api.post("/rapi", async (c) => {
    const body = await readBody(c, RapiBodySchema);
    if (!body.ok) return c.json({ error: body.error }, 400);
    const { echo, response } = emulator.execute(body.data.command);
    return c.json({ command: body.data.command, echo, response: response.replace(/\r$/, "") });
  });

  // --- EV ---

  api.post("/ev/connect", (c) => {
    emulator.connectEv();
    return c.json({ success: true });
  });

  api.post("/ev/disconnect", (c) => {
    emulator.disconnectEv();
    return c.json({ success: true });
  });

  api.post("/ev/charge", async (c) => {
    const body = await readBody(c, ChargeBodySchema);
    if (!body.ok) return c.json({ error: body.error }, 400);
    if (!body.data.requested) {
      emulator.stopCharge();
      return c.json({ success: true });
    }
    if (emulator.requestCharge()) {
      return c.json({ success: true });
    }
    return c.json({ error: "EV cannot request charge" }, 409);
  });

  api.post("/ev/soc", async (c) => {
    const body = await readBody(c, SocBodySchema);
    if (!body.ok) return c.json({ error: body.error }, 400);
    emulator.setSoc(body.data.soc);
    return c.json({ success: true });
  });

  api.post("/ev/direct-mode", async (c) => {
    const body = await readBody(c, DirectModeBodySchema);
    if (!body.ok) return c.json({ error: body.error }, 400);
    emulator.setDirectMode(body.data.enabled, body.data.currentAmps);
    return c.json({ success: true });
  });

  api.post("/ev/direct-current", async (c) => {
    const body = await readBody(c, DirectCurrentBodySchema);
    if (!body.ok) return c.json({ error: body.error }, 400);
    emulator.setDirectCurrent(body.data.currentAmps);
    return c.json({ success: true });
  });

  api.post("/ev/variance", async (c) => {
    const body = await readBody(c, EnabledBodySchema);
    if (!body.ok) return c.json({ error: body.error }, 400);
    emulator.setCurrentVariance(body.data.enabled);
    return c.json({ success: true });
  });

  api.post("/ev/error-mode", async (c) => {
    const body = await readBody(c, ErrorModeBodySchema);
    if (!body.ok) return c.json({ error: body.error }, 400);
    emulator.setEvErrorMode(body.data.mode);
    return c.json({ success: true });
  });

  api.post("/ev/battery", async (c) => {
    const body = await readBody(c, BatteryBodySchema);
    if (!body.ok) return c.json({ error: body.error }, 400);
    if (body.data.capacityKwh !== undefined) emulator.setBatteryCapacity(body.data.capacityKwh);
    if (body.data.maxChargeRateKw !== undefined) emulator.setMaxChargeRate(body.data.maxChargeRateKw);
    return c.json({ success: true });
  });

  // --- EVSE ---

  api.post("/evse/ventilation", async (c) => {
    const body = await readBody(c, VentilationBodySchema);
    if (!body.ok) return c.json({ error: body.error }, 400);
    emulator.setVentilationRequired(body.data.required);
    return c.json({ success: true });
  });

  api.post("/evse/temperature", async (c) => {
    const body = await readBody(c, TemperatureBodySchema);
    if (!body.ok) return c.json({ error: body.error }, 400);
    emulator.setTemperatures(body.data);
    return c.json({ success: true });
  });

  api.post("/evse/sensor-error", async (c) => {
    const body = await readBody(c, SensorErrorBodySchema);
    if (!body.ok) return c.json({ error: body.error }, 400);
    emulator.setSensorError(body.data.sensor, body.data.failed);
    return c.json({ success: true });
  });

  api.post("/evse/gfci-self-test-failure", async (c) => {
    const body = await readBody(c, SelfTestFailureBodySchema);
    if (!body.ok) return c.json({ error: body.error }, 400);
    emulator.setGfciSelfTestFailure(body.data.failing);
    return c.json({ success: true });
  });

  // --- Faults ---

  api.get("/faults", (c) => c.json(emulator.getSnapshot().faults));

  api.post("/faults/clear-all", (c) => {
    const cleared = emulator.clearAllFaults();
    return c.json({ success: true, cleared });
  });

  api.post("/faults/:fault/trigger", (c) => {
    const fault = parseFault(c.req.param("fault"));
    if (!fault) return c.json({ error: "Unknown fault" }, 404);
    const triggered = emulator.triggerFault(fault);
    return c.json({ success: true, triggered });
  });

  api.post("/faults/:fault/clear", (c) => {
    const fault = parseFault(c.req.param("fault"));
    if (!fault) return c.json({ error: "Unknown fault" }, 404);
    const cleared = emulator.clearFault(fault);
    return c.json({ success: true, cleared });
  });

  app.route("/api", api);

  return app;
}
