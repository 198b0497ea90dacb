import type { z } from "zod";
import { RapiCommand, type RapiTarget, ok, rejected } from "../rapiCommand";
import { NoParamsSchema } from "./_common";

type FunctionParamsType = typeof NoParamsSchema;

// $FE: wake from sleep
class EnableRapiCommand extends RapiCommand<FunctionParamsType> {
  handler = (target: RapiTarget, _params: z.infer<FunctionParamsType>) =>
    target.evse.enable(target.faults) ? ok() : rejected();
}

// $FD: sleep
class DisableRapiCommand extends RapiCommand<FunctionParamsType> {
  handler = (target: RapiTarget, _params: z.infer<FunctionParamsType>) => {
    target.evse.disable(target.faults);
    return ok();
  };
}

// $FR: soft reset
class ResetRapiCommand extends RapiCommand<FunctionParamsType> {
  handler = (target: RapiTarget, _params: z.infer<FunctionParamsType>) => {
    target.evse.reset(target.ev, target.faults);
    return ok();
  };
}

// $F1 / $F0: GFCI self-test on / off
class GfciSelfTestRapiCommand extends RapiCommand<FunctionParamsType> {
  constructor(
    code: string,
    private readonly enabled: boolean,
  ) {
    super(code, NoParamsSchema);
  }

  handler = (target: RapiTarget, _params: z.infer<FunctionParamsType>) => {
    target.evse.setGfciSelfTest(this.enabled);
    return ok();
  };
}

export const enableRapiCommand = new EnableRapiCommand("FE", NoParamsSchema);
export const disableRapiCommand = new DisableRapiCommand("FD", NoParamsSchema);
export const resetRapiCommand = new ResetRapiCommand("FR", NoParamsSchema);
export const gfciSelfTestOnRapiCommand = new GfciSelfTestRapiCommand("F1", true);
export const gfciSelfTestOffRapiCommand = new GfciSelfTestRapiCommand("F0", false);
