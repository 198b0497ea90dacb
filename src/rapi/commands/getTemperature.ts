import type { z } from "zod";
import { RapiCommand, type RapiTarget, ok } from "../rapiCommand";
import { NoParamsSchema } from "./_common";

type GetTemperatureParamsType = typeof NoParamsSchema;

class GetTemperatureRapiCommand extends RapiCommand<GetTemperatureParamsType> {
  handler = (target: RapiTarget, _params: z.infer<GetTemperatureParamsType>) => {
    const { evse } = target;
    return ok(
      evse.getTemperature("ds"),
      evse.getTemperature("mcp"),
      evse.hasSensorError("ds") ? 1 : 0,
      evse.hasSensorError("mcp") ? 1 : 0,
    );
  };
}

export const getTemperatureRapiCommand = new GetTemperatureRapiCommand("GP", NoParamsSchema);
