import type { z } from "zod";
import { RapiCommand, type RapiTarget, ok } from "../rapiCommand";
import { NoParamsSchema } from "./_common";

type GetEnergyParamsType = typeof NoParamsSchema;

// $GU: session energy as Wh and watt-seconds
class GetEnergyRapiCommand extends RapiCommand<GetEnergyParamsType> {
  handler = (target: RapiTarget, _params: z.infer<GetEnergyParamsType>) => {
    const wh = target.evse.session.getEnergyWh();
    return ok(Math.round(wh), Math.round(wh * 3600));
  };
}

export const getEnergyRapiCommand = new GetEnergyRapiCommand("GU", NoParamsSchema);
