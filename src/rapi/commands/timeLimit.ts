import { z } from "zod";
import { RapiCommand, type RapiTarget, ok } from "../rapiCommand";
import { NoParamsSchema, NonNegativeIntParam } from "./_common";

type GetTimeLimitParamsType = typeof NoParamsSchema;

const SetTimeLimitParamsSchema = z.tuple([NonNegativeIntParam]);
type SetTimeLimitParamsType = typeof SetTimeLimitParamsSchema;

class GetTimeLimitRapiCommand extends RapiCommand<GetTimeLimitParamsType> {
  handler = (target: RapiTarget, _params: z.infer<GetTimeLimitParamsType>) =>
    ok(target.evse.getTimeLimit());
}

// Minutes of charging per session, 0 disables the limit
class SetTimeLimitRapiCommand extends RapiCommand<SetTimeLimitParamsType> {
  handler = (target: RapiTarget, [minutes]: z.infer<SetTimeLimitParamsType>) => {
    target.evse.setTimeLimit(minutes);
    return ok();
  };
}

export const getTimeLimitRapiCommand = new GetTimeLimitRapiCommand("GT", NoParamsSchema);
export const setTimeLimitRapiCommand = new SetTimeLimitRapiCommand(
  "ST",
  SetTimeLimitParamsSchema,
);
