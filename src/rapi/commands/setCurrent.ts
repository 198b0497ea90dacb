import { z } from "zod";
import { RapiCommand, type RapiTarget, ok, rejected } from "../rapiCommand";
import { IntParam } from "./_common";

const CapacityModeSchema = z
  .string()
  .transform((value) => value.toUpperCase())
  .pipe(z.enum(["V", "M"]));

const SetCurrentParamsSchema = z.union([
  z.tuple([IntParam]),
  z.tuple([IntParam, CapacityModeSchema]),
]);
type SetCurrentParamsType = typeof SetCurrentParamsSchema;

/**
 * $SC amps [V|M]
 *
 * Out-of-range values are clamped, not rejected. `V` applies the value
 * without persisting it; `M` sets the configured maximum once.
 */
class SetCurrentRapiCommand extends RapiCommand<SetCurrentParamsType> {
  handler = (target: RapiTarget, params: z.infer<SetCurrentParamsType>) => {
    const amps = params[0];
    const mode = params.length === 2 ? params[1] : undefined;
    if (mode === "M") {
      return target.evse.setMaxCapacity(amps) === null ? rejected() : ok();
    }
    target.evse.setCurrentCapacity(amps, mode !== "V");
    return ok();
  };
}

export const setCurrentRapiCommand = new SetCurrentRapiCommand("SC", SetCurrentParamsSchema);
