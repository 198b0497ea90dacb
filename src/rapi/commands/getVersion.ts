import type { z } from "zod";
import { RapiCommand, type RapiTarget, ok } from "../rapiCommand";
import { NoParamsSchema } from "./_common";

type GetVersionParamsType = typeof NoParamsSchema;

class GetVersionRapiCommand extends RapiCommand<GetVersionParamsType> {
  handler = (target: RapiTarget, _params: z.infer<GetVersionParamsType>) =>
    ok(target.evse.firmwareVersion, target.evse.protocolVersion);
}

export const getVersionRapiCommand = new GetVersionRapiCommand("GV", NoParamsSchema);
