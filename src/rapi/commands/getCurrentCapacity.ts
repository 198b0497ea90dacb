import type { z } from "zod";
import { RapiCommand, type RapiTarget, ok } from "../rapiCommand";
import { NoParamsSchema } from "./_common";

type GetCurrentCapacityParamsType = typeof NoParamsSchema;

class GetCurrentCapacityRapiCommand extends RapiCommand<GetCurrentCapacityParamsType> {
  handler = (target: RapiTarget, _params: z.infer<GetCurrentCapacityParamsType>) =>
    ok(target.evse.getCurrentCapacity());
}

export const getCurrentCapacityRapiCommand = new GetCurrentCapacityRapiCommand(
  "GC",
  NoParamsSchema,
);
