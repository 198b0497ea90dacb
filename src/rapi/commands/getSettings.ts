import type { z } from "zod";
import { toHex } from "../checksum";
import { RapiCommand, type RapiTarget, ok } from "../rapiCommand";
import { NoParamsSchema } from "./_common";

type GetSettingsParamsType = typeof NoParamsSchema;

class GetSettingsRapiCommand extends RapiCommand<GetSettingsParamsType> {
  handler = (target: RapiTarget, _params: z.infer<GetSettingsParamsType>) =>
    ok(target.evse.getCurrentCapacity(), toHex(target.evse.getSettingsFlags(), 4));
}

export const getSettingsRapiCommand = new GetSettingsRapiCommand("GE", NoParamsSchema);
