import { z } from "zod";

export const NoParamsSchema = z.tuple([]);

export const IntParam = z
  .string()
  .regex(/^-?\d+$/)
  .transform((value) => Number(value));

export const NonNegativeIntParam = z
  .string()
  .regex(/^\d+$/)
  .transform((value) => Number(value));
