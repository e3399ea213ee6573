import { z } from "zod";
import { ClientKeySchema } from "@turnstile/schemas";

// ── Rate limit administration ────────────────────────────────────────

// Positivity is checked by AdmissionController.configure.
export const UpdateRateLimitBodySchema = z
  .object({
    limit: z.number().int().optional(),
    windowMs: z.number().int().optional(),
    rate: z.string().min(1).max(100).optional(),
  })
  .strict()
  .refine((body) => body.limit !== undefined || body.windowMs !== undefined || body.rate !== undefined, {
    message: "one of limit, windowMs or rate is required",
  })
  .refine((body) => body.rate === undefined || (body.limit === undefined && body.windowMs === undefined), {
    message: "rate cannot be combined with limit or windowMs",
  });
export type UpdateRateLimitBody = z.infer<typeof UpdateRateLimitBodySchema>;

export const ClientKeyParamsSchema = z.object({
  key: ClientKeySchema,
});
