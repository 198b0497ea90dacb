import type { z } from "zod";
import { RapiCommand, type RapiTarget, ok } from "../rapiCommand";
import { NoParamsSchema } from "./_common";

type GetCurrentVoltageParamsType = typeof NoParamsSchema;

// $GG: milliamps, millivolts, J1772 state, fault flags
class GetCurrentVoltageRapiCommand extends RapiCommand<GetCurrentVoltageParamsType> {
  handler = (target: RapiTarget, _params: z.infer<GetCurrentVoltageParamsType>) =>
    ok(
      target.evse.getActualCurrentMilliamps(),
      target.evse.getVoltageMillivolts(),
      target.evse.getState(),
      target.faults.getFlags(),
    );
}

export const getCurrentVoltageRapiCommand = new GetCurrentVoltageRapiCommand(
  "GG",
  NoParamsSchema,
);
