import { z } from "zod";
import type { ServiceLevel } from "../../types";
import { RapiCommand, type RapiTarget, ok } from "../rapiCommand";

const SetServiceLevelParamsSchema = z.tuple([
  z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(["1", "2", "A"])),
]);
type SetServiceLevelParamsType = typeof SetServiceLevelParamsSchema;

const LEVELS: Record<z.infer<SetServiceLevelParamsType>[0], ServiceLevel> = {
  "1": "L1",
  "2": "L2",
  A: "Auto",
};

class SetServiceLevelRapiCommand extends RapiCommand<SetServiceLevelParamsType> {
  handler = (target: RapiTarget, [level]: z.infer<SetServiceLevelParamsType>) => {
    target.evse.setServiceLevel(LEVELS[level]);
    return ok();
  };
}

export const setServiceLevelRapiCommand = new SetServiceLevelRapiCommand(
  "SL",
  SetServiceLevelParamsSchema,
);
