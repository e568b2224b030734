import { z } from "zod";

/** Field name → every problem found with that field. Empty means valid. */
export const ProblemMapSchema = z.record(z.string(), z.array(z.string()));
export type ProblemMap = z.infer<typeof ProblemMapSchema>;

export const ErrorResponseSchema = z.object({
  error: z.string(),
  statusCode: z.number().int(),
  errors: ProblemMapSchema.optional(),
});
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
