import type { z } from "zod";
import { RapiCommand, type RapiTarget, ok } from "../rapiCommand";
import { NoParamsSchema } from "./_common";

type GetStateParamsType = typeof NoParamsSchema;

class GetStateRapiCommand extends RapiCommand<GetStateParamsType> {
  handler = (target: RapiTarget, _params: z.infer<GetStateParamsType>) =>
    ok(target.evse.getState(), target.evse.session.getElapsedSeconds());
}

export const getStateRapiCommand = new GetStateRapiCommand("GS", NoParamsSchema);
