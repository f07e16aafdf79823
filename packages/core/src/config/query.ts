import { z } from "zod";
import { InputValidationError } from "../errors.js";

export const DEFAULT_LANGUAGE = "fr";

// Form fields arrive as strings; an empty field means "not set".
const optionalPositiveInt = z.preprocess(
  (v) => (v === "" || v === null ? undefined : v),
  z.coerce.number().int().positive().optional(),
);

export const processLogQuerySchema = z.object({
  language: z.preprocess(
    (v) => (v === "" || v === null ? undefined : v),
    z.string().trim().min(1).default(DEFAULT_LANGUAGE),
  ),
  topK: optionalPositiveInt,
  minCount: optionalPositiveInt,
});

export type ProcessLogQuery = z.infer<typeof processLogQuerySchema>;

export function parseProcessLogQuery(raw: unknown): ProcessLogQuery {
  const result = processLogQuerySchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new InputValidationError(
      "Invalid parameters",
      result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    );
  }
  return result.data;
}
