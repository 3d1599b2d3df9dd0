import type { z } from "zod";
import { ValidationError } from "./errors.js";

/** Parse untrusted input; failures become a 400 carrying zod's flattened issues. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw new ValidationError("validation_failed", parsed.error.flatten());
  return parsed.data;
}
