import type { z } from "zod";
import type { EvSimulator } from "../evSimulator";
import type { EvseStateMachine } from "../evseStateMachine";
import type { FaultRegistry } from "../faultRegistry";

export interface RapiTarget {
  evse: EvseStateMachine;
  ev: EvSimulator;
  faults: FaultRegistry;
}

export type RapiField = string | number;

export type RapiReply = { ok: true; fields: RapiField[] } | { ok: false };

export const ok = (...fields: RapiField[]): RapiReply => ({ ok: true, fields });

export const rejected = (): RapiReply => ({ ok: false });

export interface RapiCommandDescriptor {
  readonly code: string;
  dispatch(target: RapiTarget, tokens: string[]): RapiReply;
}

/**
 * One RAPI command: a two-letter code, a schema over its parameter tokens
 * and a synchronous handler. A handler must not mutate anything on a path
 * that returns rejected().
 */
export abstract class RapiCommand<ParamsType extends z.ZodTypeAny>
  implements RapiCommandDescriptor
{
  constructor(
    public readonly code: string,
    public readonly paramsSchema: ParamsType,
  ) {}

  abstract handler: (target: RapiTarget, params: z.infer<ParamsType>) => RapiReply;

  dispatch(target: RapiTarget, tokens: string[]): RapiReply {
    const parsed = this.paramsSchema.safeParse(tokens);
    if (!parsed.success) {
      return rejected();
    }
    return this.handler(target, parsed.data);
  }
}
