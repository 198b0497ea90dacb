import { z } from "zod";
import { RapiCommand, type RapiTarget, ok } from "../rapiCommand";
import { IntParam } from "./_common";

// Any integer: non-zero turns echo on
const SetEchoParamsSchema = z.tuple([IntParam.transform((value) => value !== 0)]);
type SetEchoParamsType = typeof SetEchoParamsSchema;

class SetEchoRapiCommand extends RapiCommand<SetEchoParamsType> {
  handler = (target: RapiTarget, [enabled]: z.infer<SetEchoParamsType>) => {
    target.evse.setEchoMode(enabled);
    return ok();
  };
}

export const setEchoRapiCommand = new SetEchoRapiCommand("SE", SetEchoParamsSchema);
