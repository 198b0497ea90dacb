import { z } from "zod";
import { RapiCommand, type RapiTarget, ok } from "../rapiCommand";
import { NoParamsSchema, NonNegativeIntParam } from "./_common";

type GetEnergyLimitParamsType = typeof NoParamsSchema;

const SetEnergyLimitParamsSchema = z.tuple([NonNegativeIntParam]);
type SetEnergyLimitParamsType = typeof SetEnergyLimitParamsSchema;

class GetEnergyLimitRapiCommand extends RapiCommand<GetEnergyLimitParamsType> {
  handler = (target: RapiTarget, _params: z.infer<GetEnergyLimitParamsType>) =>
    ok(target.evse.getEnergyLimit());
}

// kWh per session, 0 disables the limit
class SetEnergyLimitRapiCommand extends RapiCommand<SetEnergyLimitParamsType> {
  handler = (target: RapiTarget, [kwh]: z.infer<SetEnergyLimitParamsType>) => {
    target.evse.setEnergyLimit(kwh);
    return ok();
  };
}

export const getEnergyLimitRapiCommand = new GetEnergyLimitRapiCommand("GH", NoParamsSchema);
export const setEnergyLimitRapiCommand = new SetEnergyLimitRapiCommand(
  "SH",
  SetEnergyLimitParamsSchema,
);
