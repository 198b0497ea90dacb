import type { z } from "zod";
import { RapiCommand, type RapiTarget, ok } from "../rapiCommand";
import { NoParamsSchema } from "./_common";

type GetFaultCountersParamsType = typeof NoParamsSchema;

class GetFaultCountersRapiCommand extends RapiCommand<GetFaultCountersParamsType> {
  handler = (target: RapiTarget, _params: z.infer<GetFaultCountersParamsType>) => {
    const { faults } = target;
    return ok(
      faults.getCount("gfci"),
      faults.getCount("no_ground"),
      faults.getCount("stuck_relay"),
    );
  };
}

export const getFaultCountersRapiCommand = new GetFaultCountersRapiCommand(
  "GF",
  NoParamsSchema,
);
